export {
  FindSGJobsClient,
  FindSGJobsHttpError,
  buildSearchQuery,
  DEFAULT_CURRENCY_ID,
  DEFAULT_INTERVAL_ID,
  DEFAULT_PER_PAGE,
} from './client.js';
export type { FindSGJobsClientOptions } from './client.js';
export { unwrapSearchResponse } from './envelope.js';
export { jobSummarySchema, toJobSummary, toJobSummaries, toJobRecord, describeSalary, filterSummaries } from './summary.js';
export type { JobSummary } from './summary.js';
export type { FindSGJobsSearchParams, SearchResultItem, SortDirection, SummaryFilters } from './types.js';
