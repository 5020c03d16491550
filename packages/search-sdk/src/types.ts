export interface SearchCriteria {
  daysBack: number;
  location?: string;
  remoteOnly?: boolean;
  limit: PageSize;
  offset: number;
}

export type PageSize = 10 | 25 | 50 | 100;

export interface Credentials {
  key: string;
  host: string;
}

export interface JobRecord {
  title: string;
  company: string;
  location: string;
  postedDate: string;
  description: string;
  applyUrl: string;
  employmentType: string;
  remote: boolean;
  salary: string;
  industry: string;
}

/**
 * Why a search failed. Callers only see `errorMessage`; the tag is kept for
 * logging and tests.
 */
export type SearchFailureReason =
  | 'configuration'
  | 'rate_limited'
  | 'api_error'
  | 'timeout'
  | 'network'
  | 'malformed_response'
  | 'unexpected';

export interface SearchSuccess {
  kind: 'success';
  jobs: JobRecord[];
  /** Length of the raw list the normalizer walked, not `jobs.length`. */
  total: number;
  skipped: number;
}

export interface SearchFailure {
  kind: 'failure';
  reason: SearchFailureReason;
  errorMessage: string;
  status?: number;
}

export type SearchOutcome = SearchSuccess | SearchFailure;

/**
 * Anything that can answer a search. The terminal shell depends on this only.
 */
export interface JobSearchClient {
  search(criteria: SearchCriteria): Promise<SearchOutcome>;
}
