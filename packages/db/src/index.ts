export { createDatabase, closeDatabase } from './client.js';
export type { Database } from './client.js';
export { storedJobs } from './schema.js';
export type { StoredJobRow, NewStoredJobRow } from './schema.js';
