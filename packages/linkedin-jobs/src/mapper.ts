import type { JobRecord } from '@sapjobs/search-sdk';

type JsonRecord = Record<string, unknown>;

const NOT_AVAILABLE = 'N/A';
const NO_DESCRIPTION = 'No description available';
const NO_APPLY_URL = '#';
const NOT_SPECIFIED = 'Not specified';
const MAX_LOCATIONS = 2;

export class JobParseError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'JobParseError';
    this.field = field;
  }
}

export interface ParseJobsOptions {
  onSkip?: (error: unknown, item: unknown, index: number) => void;
}

export interface ParsedJobs {
  jobs: JobRecord[];
  /** Raw list length, skipped items included. */
  total: number;
  skipped: number;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(item: JsonRecord, field: string): string | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new JobParseError(`Expected "${field}" to be a string, got ${typeof value}`, field);
  }

  return value;
}

function readBoolean(item: JsonRecord, field: string): boolean | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw new JobParseError(`Expected "${field}" to be a boolean, got ${typeof value}`, field);
  }

  return value;
}

function readStringList(item: JsonRecord, field: string): string[] | undefined {
  const value = item[field];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new JobParseError(`Expected "${field}" to be a list of strings`, field);
  }

  return value;
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function deriveLocation(item: JsonRecord): string {
  const derived = readStringList(item, 'locations_derived');
  if (derived && derived.length > 0) {
    return derived.slice(0, MAX_LOCATIONS).join(', ');
  }

  return readString(item, 'location') || NOT_AVAILABLE;
}

function deriveEmploymentType(item: JsonRecord): string {
  const types = readStringList(item, 'employment_type');
  return types && types.length > 0 ? types.join(', ') : NOT_AVAILABLE;
}

/**
 * Formats a schema.org MonetaryAmount, e.g. `USD 90000-120000/year`.
 * Returns undefined when no amount can be read.
 */
export function formatMonetaryAmount(amount: JsonRecord): string | undefined {
  const quantity: JsonRecord = isRecord(amount.value) ? amount.value : {};
  const min = asFiniteNumber(quantity.minValue);
  const max = asFiniteNumber(quantity.maxValue);
  const single = asFiniteNumber(quantity.value);

  let range: string;
  if (min !== undefined && max !== undefined) {
    range = min === max ? String(min) : `${min}-${max}`;
  } else if (min !== undefined || max !== undefined || single !== undefined) {
    range = String(min ?? max ?? single);
  } else {
    return undefined;
  }

  const currency = typeof amount.currency === 'string' ? amount.currency.trim() : '';
  const unit = typeof quantity.unitText === 'string' ? quantity.unitText.trim().toLowerCase() : '';

  return `${currency ? `${currency} ` : ''}${range}${unit ? `/${unit}` : ''}`;
}

function deriveSalary(item: JsonRecord): string {
  const value = item.salary_raw;
  if (value === undefined || value === null) {
    return NOT_SPECIFIED;
  }

  if (typeof value === 'string') {
    return value;
  }

  if (!isRecord(value)) {
    throw new JobParseError(`Expected "salary_raw" to be a string or an object, got ${typeof value}`, 'salary_raw');
  }

  return formatMonetaryAmount(value) ?? NOT_SPECIFIED;
}

export function mapJob(item: unknown): JobRecord {
  if (!isRecord(item)) {
    throw new JobParseError(`Expected job to be an object, got ${Array.isArray(item) ? 'array' : typeof item}`);
  }

  return {
    title: readString(item, 'title') ?? NOT_AVAILABLE,
    company: readString(item, 'organization') ?? NOT_AVAILABLE,
    location: deriveLocation(item),
    postedDate: readString(item, 'date_posted') ?? readString(item, 'posted_at') ?? NOT_AVAILABLE,
    description: readString(item, 'description_text') ?? readString(item, 'description') ?? NO_DESCRIPTION,
    applyUrl: readString(item, 'url') ?? readString(item, 'apply_url') ?? NO_APPLY_URL,
    employmentType: deriveEmploymentType(item),
    remote: readBoolean(item, 'remote_derived') ?? readBoolean(item, 'remote') ?? false,
    salary: deriveSalary(item),
    industry: readString(item, 'linkedin_org_industry') ?? NOT_AVAILABLE,
  };
}

/**
 * Returns the job list of a response, or null when the payload is neither a
 * bare list nor an object holding a `jobs` list.
 */
export function extractJobList(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) {
    return payload;
  }

  if (isRecord(payload) && Array.isArray(payload.jobs)) {
    return payload.jobs;
  }

  return null;
}

/**
 * Best-effort normalization: each item is mapped on its own and a bad item
 * is dropped without affecting the rest. Order is preserved.
 */
export function parseJobs(payload: unknown, options?: ParseJobsOptions): ParsedJobs {
  const items = extractJobList(payload);
  if (!items) {
    return { jobs: [], total: 0, skipped: 0 };
  }

  const jobs: JobRecord[] = [];
  let skipped = 0;

  items.forEach((item, index) => {
    try {
      jobs.push(mapJob(item));
    } catch (error) {
      skipped += 1;
      options?.onSkip?.(error, item, index);
    }
  });

  return { jobs, total: items.length, skipped };
}
