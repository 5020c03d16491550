export type {
  SearchCriteria,
  PageSize,
  Credentials,
  JobRecord,
  SearchFailureReason,
  SearchSuccess,
  SearchFailure,
  SearchOutcome,
  JobSearchClient,
} from './types.js';
export {
  ALL_LOCATIONS,
  PAGE_SIZE_OPTIONS,
  MIN_DAYS_BACK,
  MAX_DAYS_BACK,
  searchCriteriaSchema,
  jobRecordSchema,
  isPageSize,
} from './schema.js';
export { success, failure } from './outcome.js';
