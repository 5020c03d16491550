import { ALL_LOCATIONS, type SearchCriteria } from '@sapjobs/search-sdk';

export const ACTIVE_JOBS_PATH = '/active-jb-7d';
export const TITLE_FILTER = 'SAP';
export const DESCRIPTION_TYPE = 'text';

export interface SearchRequest {
  url: string;
  params: URLSearchParams;
  postedAfter: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Earliest posting date a search accepts, as a local `YYYY-MM-DD` date.
 * Works on calendar days, so DST shifts do not move the result.
 */
export function formatPostedAfter(now: Date, daysBack: number): string {
  const cutoff = new Date(now.getTime());
  cutoff.setDate(cutoff.getDate() - daysBack);
  return `${cutoff.getFullYear()}-${pad(cutoff.getMonth() + 1)}-${pad(cutoff.getDate())}`;
}

export function resolveLocationFilter(location: string | undefined): string | undefined {
  const trimmed = location?.trim();
  if (!trimmed || trimmed === ALL_LOCATIONS) {
    return undefined;
  }

  return trimmed;
}

export function resolveBaseUrl(host: string): string {
  return `https://${host}${ACTIVE_JOBS_PATH}`;
}

export function buildSearchParams(criteria: SearchCriteria): URLSearchParams {
  const params = new URLSearchParams();
  params.set('title_filter', TITLE_FILTER);
  params.set('limit', String(criteria.limit));
  params.set('offset', String(criteria.offset));
  params.set('description_type', DESCRIPTION_TYPE);

  const location = resolveLocationFilter(criteria.location);
  if (location) {
    params.set('location_filter', location);
  }

  // The API has no "exclude remote" switch, so false and absent both send nothing.
  if (criteria.remoteOnly === true) {
    params.set('remote', 'true');
  }

  return params;
}

export function buildSearchRequest(baseUrl: string, criteria: SearchCriteria, now: Date): SearchRequest {
  const params = buildSearchParams(criteria);

  return {
    url: `${baseUrl}?${params.toString()}`,
    params,
    postedAfter: formatPostedAfter(now, criteria.daysBack),
  };
}
