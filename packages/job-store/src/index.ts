export { toStoredDocuments, chunkText, resolveLogicalJobId, DOCUMENT_CHUNK_SIZE } from './documents.js';
export type { StoredDocument } from './documents.js';
export { storeJobs } from './store.js';
export type { StoreJobsResult } from './store.js';
export { searchStoredJobs, DEFAULT_SEARCH_LIMIT } from './search.js';
export type { StoredJobHit, SearchStoredJobsOptions } from './search.js';
