import { z } from 'zod';
import {
  ALL_LOCATIONS,
  searchCriteriaSchema,
  type Credentials,
  type PageSize,
} from '@sapjobs/search-sdk';

const DEFAULT_DAYS_BACK = 7;
const DEFAULT_PAGE_SIZE: PageSize = 25;
const TRUE_VALUES = new Set(['true', '1', 'yes']);

const CRITERIA_ENV_NAMES: Record<string, string> = {
  daysBack: 'SEARCH_DAYS_BACK',
  limit: 'SEARCH_LIMIT',
  location: 'SEARCH_LOCATION',
  remoteOnly: 'SEARCH_REMOTE_ONLY',
};

const envSchema = z.object({
  RAPIDAPI_KEY: z.string().optional(),
  RAPIDAPI_HOST: z.string().optional(),
  SEARCH_LOCATION: z.string().default(ALL_LOCATIONS),
  SEARCH_REMOTE_ONLY: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => TRUE_VALUES.has(value))
    .default('false'),
  SEARCH_DAYS_BACK: z.coerce.number().default(DEFAULT_DAYS_BACK),
  SEARCH_LIMIT: z.coerce.number().default(DEFAULT_PAGE_SIZE),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Search settings that stay fixed for a whole session. */
export interface SearchSettings {
  daysBack: number;
  location: string;
  remoteOnly: boolean;
  limit: PageSize;
}

export interface CliConfig {
  credentials: Partial<Credentials>;
  search: SearchSettings;
}

type Env = Record<string, string | undefined>;

/** Trimmed copy of the environment with blank values removed. */
function compactEnv(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) {
      result[key] = trimmed;
    }
  }

  return result;
}

function formatIssues(issues: z.ZodIssue[], nameFor: (key: string) => string): string[] {
  return issues.map((issue) => {
    const key = String(issue.path[0] ?? 'config');
    return `${nameFor(key)}: ${issue.message}`;
  });
}

/**
 * Reads credentials and search defaults from the environment. Missing
 * credentials are allowed: the client reports them on the first search.
 */
export function loadConfig(env: Env = process.env): CliConfig {
  const parsedEnv = envSchema.safeParse(compactEnv(env));
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error.issues, (key) => key));
  }

  const values = parsedEnv.data;
  const criteria = searchCriteriaSchema.safeParse({
    daysBack: values.SEARCH_DAYS_BACK,
    location: values.SEARCH_LOCATION,
    remoteOnly: values.SEARCH_REMOTE_ONLY,
    limit: values.SEARCH_LIMIT,
    offset: 0,
  });

  if (!criteria.success) {
    throw new ConfigError(formatIssues(criteria.error.issues, (key) => CRITERIA_ENV_NAMES[key] ?? key));
  }

  return {
    credentials: {
      key: values.RAPIDAPI_KEY,
      host: values.RAPIDAPI_HOST,
    },
    search: {
      daysBack: criteria.data.daysBack,
      location: criteria.data.location ?? ALL_LOCATIONS,
      remoteOnly: criteria.data.remoteOnly ?? false,
      limit: criteria.data.limit,
    },
  };
}
