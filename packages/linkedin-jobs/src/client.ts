import pino, { type Logger } from 'pino';
import {
  failure,
  success,
  type Credentials,
  type JobSearchClient,
  type SearchCriteria,
  type SearchOutcome,
} from '@sapjobs/search-sdk';
import { parseJobs } from './mapper.js';
import { buildSearchRequest, resolveBaseUrl } from './request.js';
import type { FetchLike } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export const CREDENTIALS_MISSING_MESSAGE = 'API credentials not configured';
export const RATE_LIMIT_MESSAGE = 'Rate limit exceeded. Please wait a moment and try again.';
export const TIMEOUT_MESSAGE = 'Request timed out. Please try again.';

export interface LinkedInJobsClientOptions {
  credentials?: Partial<Credentials> | null;
  /** Full endpoint URL. Defaults to the 7-day active jobs endpoint on the credentials host. */
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
  logger?: Logger;
}

interface HttpResult {
  status: number;
  body: string;
}

function resolveCredentials(input: Partial<Credentials> | null | undefined): Credentials | null {
  const key = input?.key?.trim();
  const host = input?.host?.trim();
  if (!key || !host) {
    return null;
  }

  return { key, host };
}

function isTimeoutError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }

  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

/**
 * Message of an error plus the message of its cause, which is where
 * fetch keeps the socket-level reason.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }

  return error.message;
}

/**
 * Single-shot client for the LinkedIn Job Search API on RapidAPI.
 * Holds only read-only configuration; every search is independent and
 * resolves to a SearchOutcome, never a rejection.
 */
export class LinkedInJobsClient implements JobSearchClient {
  private readonly credentials: Credentials | null;
  private readonly baseUrl?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: LinkedInJobsClientOptions = {}) {
    this.credentials = resolveCredentials(options.credentials);
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? pino({ level: 'silent' });
  }

  async search(criteria: SearchCriteria): Promise<SearchOutcome> {
    const startedAt = Date.now();

    let outcome: SearchOutcome;
    try {
      outcome = await this.execute(criteria);
    } catch (error) {
      outcome = failure('unexpected', `Unexpected error: ${describeError(error)}`);
    }

    if (outcome.kind === 'success') {
      this.logger.info(
        {
          event: 'search_completed',
          offset: criteria.offset,
          limit: criteria.limit,
          total: outcome.total,
          returned: outcome.jobs.length,
          skipped: outcome.skipped,
          durationMs: Date.now() - startedAt,
        },
        'Search completed',
      );
    } else {
      this.logger.warn(
        {
          event: 'search_failed',
          reason: outcome.reason,
          status: outcome.status,
          durationMs: Date.now() - startedAt,
        },
        outcome.errorMessage,
      );
    }

    return outcome;
  }

  private async execute(criteria: SearchCriteria): Promise<SearchOutcome> {
    const credentials = this.credentials;
    if (!credentials) {
      return failure('configuration', CREDENTIALS_MISSING_MESSAGE);
    }

    const request = buildSearchRequest(this.baseUrl ?? resolveBaseUrl(credentials.host), criteria, this.now());
    this.logger.debug(
      {
        event: 'search_started',
        url: request.url,
        postedAfter: request.postedAfter,
      },
      'Search started',
    );

    let response: HttpResult;
    try {
      response = await this.get(request.url, credentials);
    } catch (error) {
      if (isTimeoutError(error)) {
        return failure('timeout', TIMEOUT_MESSAGE);
      }

      return failure('network', `Network error: ${describeError(error)}`);
    }

    if (response.status === 429) {
      return failure('rate_limited', RATE_LIMIT_MESSAGE, response.status);
    }

    if (response.status !== 200) {
      return failure('api_error', `API error: ${response.status} - ${response.body}`, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      return failure('malformed_response', `Malformed API response: ${describeError(error)}`, response.status);
    }

    const parsed = parseJobs(payload, {
      onSkip: (error, _item, index) => {
        this.logger.warn({ event: 'job_skipped', index, error: describeError(error) }, 'Skipping malformed job');
      },
    });

    return success(parsed.jobs, parsed.total, parsed.skipped);
  }

  private async get(url: string, credentials: Credentials): Promise<HttpResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'X-RapidAPI-Key': credentials.key,
          'X-RapidAPI-Host': credentials.host,
        },
      });

      // The timeout also covers reading the body.
      const body = await response.text();
      return { status: response.status, body };
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * One-off search with explicit credentials.
 */
export function searchJobs(
  criteria: SearchCriteria,
  credentials: Partial<Credentials> | null | undefined,
  options: Omit<LinkedInJobsClientOptions, 'credentials'> = {},
): Promise<SearchOutcome> {
  return new LinkedInJobsClient({ ...options, credentials }).search(criteria);
}
