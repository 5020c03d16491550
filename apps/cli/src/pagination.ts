import type { PageSize, SearchCriteria } from '@sapjobs/search-sdk';
import type { SearchSettings } from './config.js';

export interface PageState {
  offset: number;
  limit: PageSize;
}

export function createPageState(limit: PageSize): PageState {
  return { offset: 0, limit };
}

export function pageNumber(state: PageState): number {
  return Math.floor(state.offset / state.limit) + 1;
}

export function hasPreviousPage(state: PageState): boolean {
  return state.offset > 0;
}

/**
 * Next is offered when the raw result count filled the page, skipped items included.
 */
export function hasNextPage(state: PageState, total: number): boolean {
  return total === state.limit;
}

export function previousPage(state: PageState): PageState {
  return { ...state, offset: Math.max(0, state.offset - state.limit) };
}

export function nextPage(state: PageState): PageState {
  return { ...state, offset: state.offset + state.limit };
}

export function toCriteria(settings: SearchSettings, state: PageState): SearchCriteria {
  return {
    daysBack: settings.daysBack,
    location: settings.location,
    remoteOnly: settings.remoteOnly,
    limit: state.limit,
    offset: state.offset,
  };
}
