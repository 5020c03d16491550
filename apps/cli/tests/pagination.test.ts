import { describe, expect, it } from 'vitest';
import {
  createPageState,
  hasNextPage,
  hasPreviousPage,
  nextPage,
  pageNumber,
  previousPage,
  toCriteria,
} from '../src/pagination.js';

describe('pagination', () => {
  it('starts on page 1 with no previous page', () => {
    const state = createPageState(25);

    expect(state).toEqual({ offset: 0, limit: 25 });
    expect(pageNumber(state)).toBe(1);
    expect(hasPreviousPage(state)).toBe(false);
  });

  it('moves forward and back by one page size', () => {
    const second = nextPage(createPageState(10));
    const third = nextPage(second);

    expect(third.offset).toBe(20);
    expect(pageNumber(third)).toBe(3);
    expect(previousPage(third)).toEqual(second);
    expect(hasPreviousPage(second)).toBe(true);
  });

  it('never goes below offset 0', () => {
    expect(previousPage({ offset: 5, limit: 10 }).offset).toBe(0);
  });

  it('offers a next page only after a full page', () => {
    const state = createPageState(50);

    expect(hasNextPage(state, 50)).toBe(true);
    expect(hasNextPage(state, 49)).toBe(false);
    expect(hasNextPage(state, 0)).toBe(false);
  });

  it('builds criteria from settings and page state', () => {
    const criteria = toCriteria(
      { daysBack: 3, location: 'Noida', remoteOnly: false, limit: 100 },
      { offset: 200, limit: 100 },
    );

    expect(criteria).toEqual({ daysBack: 3, location: 'Noida', remoteOnly: false, limit: 100, offset: 200 });
  });
});
