import {
  ALL_LOCATIONS,
  MAX_DAYS_BACK,
  MIN_DAYS_BACK,
  PAGE_SIZE_OPTIONS,
  isPageSize,
  searchCriteriaSchema,
  type PageSize,
} from '@sapjobs/search-sdk';
import type { SearchSettings } from './config.js';
import type { SessionIo } from './session.js';

export const LOCATION_OPTIONS = [
  ALL_LOCATIONS,
  'India',
  'Mumbai',
  'Delhi',
  'Bangalore',
  'Hyderabad',
  'Chennai',
  'Pune',
  'Kolkata',
  'Ahmedabad',
  'Gurugram',
  'Noida',
  'Chandigarh',
  'Jaipur',
  'Remote',
] as const;

const YES_ANSWERS = new Set(['y', 'yes', 'true', '1']);
const NO_ANSWERS = new Set(['n', 'no', 'false', '0']);

type Answer<T> = { ok: true; value: T } | { ok: false; message: string };

export function parseLocation(input: string): Answer<string> {
  if (/^\d+$/.test(input)) {
    const option = LOCATION_OPTIONS[Number(input) - 1];
    if (option) {
      return { ok: true, value: option };
    }
  }

  const match = LOCATION_OPTIONS.find((option) => option.toLowerCase() === input.toLowerCase());
  if (match) {
    return { ok: true, value: match };
  }

  return { ok: false, message: `Choose a location by number (1-${LOCATION_OPTIONS.length}) or name.` };
}

export function parseRemoteOnly(input: string): Answer<boolean> {
  const answer = input.toLowerCase();
  if (YES_ANSWERS.has(answer)) return { ok: true, value: true };
  if (NO_ANSWERS.has(answer)) return { ok: true, value: false };
  return { ok: false, message: 'Answer y or n.' };
}

export function parseDaysBack(input: string): Answer<number> {
  const result = searchCriteriaSchema.shape.daysBack.safeParse(Number(input));
  if (!result.success) {
    return { ok: false, message: `Days back must be a whole number from ${MIN_DAYS_BACK} to ${MAX_DAYS_BACK}.` };
  }

  return { ok: true, value: result.data };
}

export function parsePageSize(input: string): Answer<PageSize> {
  const value = Number(input);
  if (!isPageSize(value)) {
    return { ok: false, message: `Page size must be one of ${PAGE_SIZE_OPTIONS.join(', ')}.` };
  }

  return { ok: true, value };
}

export function renderLocationOptions(): string {
  return LOCATION_OPTIONS.map((option, index) => `  ${String(index + 1).padStart(2)}. ${option}`).join('\n');
}

/**
 * Asks until the answer parses. A blank answer keeps the current value,
 * null means input ended.
 */
async function ask<T>(
  io: SessionIo,
  question: string,
  current: T,
  parse: (input: string) => Answer<T>,
): Promise<T | null> {
  while (true) {
    const input = await io.prompt(question);
    if (input === null) {
      return null;
    }

    const trimmed = input.trim();
    if (!trimmed) {
      return current;
    }

    const answer = parse(trimmed);
    if (answer.ok) {
      return answer.value;
    }

    io.write(`${answer.message}\n`);
  }
}

/**
 * Walks through location, remote-only, days back and page size.
 * Resolves to null when input ends before every answer is in.
 */
export async function promptFilters(io: SessionIo, current: SearchSettings): Promise<SearchSettings | null> {
  io.write(`Locations:\n${renderLocationOptions()}\n`);
  const location = await ask(io, `Location [${current.location}]: `, current.location, parseLocation);
  if (location === null) return null;

  const remoteOnly = await ask(
    io,
    `Remote jobs only (y/n) [${current.remoteOnly ? 'y' : 'n'}]: `,
    current.remoteOnly,
    parseRemoteOnly,
  );
  if (remoteOnly === null) return null;

  const daysBack = await ask(
    io,
    `Posted within days (${MIN_DAYS_BACK}-${MAX_DAYS_BACK}) [${current.daysBack}]: `,
    current.daysBack,
    parseDaysBack,
  );
  if (daysBack === null) return null;

  const limit = await ask(
    io,
    `Results per page (${PAGE_SIZE_OPTIONS.join('/')}) [${current.limit}]: `,
    current.limit,
    parsePageSize,
  );
  if (limit === null) return null;

  return { location, remoteOnly, daysBack, limit };
}
