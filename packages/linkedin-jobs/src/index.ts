export {
  LinkedInJobsClient,
  searchJobs,
  describeError,
  CREDENTIALS_MISSING_MESSAGE,
  RATE_LIMIT_MESSAGE,
  TIMEOUT_MESSAGE,
} from './client.js';
export type { LinkedInJobsClientOptions } from './client.js';
export { parseJobs, mapJob, extractJobList, formatMonetaryAmount, JobParseError } from './mapper.js';
export type { ParseJobsOptions, ParsedJobs } from './mapper.js';
export {
  buildSearchParams,
  buildSearchRequest,
  formatPostedAfter,
  resolveBaseUrl,
  resolveLocationFilter,
  ACTIVE_JOBS_PATH,
  TITLE_FILTER,
  DESCRIPTION_TYPE,
} from './request.js';
export type { SearchRequest } from './request.js';
export type { LinkedInJobPayload, LinkedInMonetaryAmount, LinkedInSearchResponse, FetchLike } from './types.js';
