import { asText, getCompanyName, getDescription, getJobTitle, getRequirements, isRecord } from '@jobfit/matching';
import type { JobRecord } from '@jobfit/matching';

export const DOCUMENT_CHUNK_SIZE = 800;

const JOB_ID_KEYS = ['sid', 'job_sid', 'id', 'JobID'] as const;
const LOCATION_KEYS = ['JobLocation', 'Location'] as const;
const SALARY_KEYS = ['SalaryDisplay', 'SalaryText', 'salary'] as const;
const URL_KEYS = ['JobURL', 'JobUrl', 'url'] as const;

export interface StoredDocument {
  id: string;
  jobId: string;
  title: string;
  company: string;
  location: string;
  salary: string;
  url: string;
  document: string;
}

function fieldText(job: JobRecord, keys: readonly string[]): string {
  for (const key of keys) {
    const value = job[key];
    const text = isRecord(value) ? asText(value.caption) : asText(value);
    if (text) {
      return text;
    }
  }

  return '';
}

/**
 * Logical posting id from the first non-empty id field, else `job-<row>`.
 */
export function resolveLogicalJobId(job: JobRecord, row: number): string {
  for (const key of JOB_ID_KEYS) {
    const value = job[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    const text = asText(value);
    if (text) {
      return text;
    }
  }

  return `job-${row}`;
}

/**
 * Fixed-width slices of `text`. Empty text gives a single empty chunk.
 */
export function chunkText(text: string, size = DOCUMENT_CHUNK_SIZE): string[] {
  if (!text) return [''];

  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += size) {
    chunks.push(text.slice(start, start + size));
  }

  return chunks;
}

type DocumentFields = Pick<StoredDocument, 'title' | 'company' | 'location' | 'salary'>;

function documentText(fields: DocumentFields, requirements: string, description: string): string {
  return [
    fields.title,
    `Company: ${fields.company}`,
    `Location: ${fields.location}`,
    `Salary: ${fields.salary}`,
    '',
    'Requirements:',
    requirements,
    '',
    'Description:',
    description,
  ].join('\n');
}

/**
 * Expand postings into searchable chunk rows with ids `<jobId>-chunk<n>`,
 * stable across fetches whatever the posting's position. A later posting
 * repeating an id already seen in the batch gets `<jobId>-row<row>-chunk<n>`.
 */
export function toStoredDocuments(jobs: readonly JobRecord[]): StoredDocument[] {
  const documents: StoredDocument[] = [];
  const seenJobIds = new Set<string>();

  jobs.forEach((job, row) => {
    const jobId = resolveLogicalJobId(job, row);
    const idPrefix = seenJobIds.has(jobId) ? `${jobId}-row${row}` : jobId;
    seenJobIds.add(jobId);
    const fields: DocumentFields = {
      title: getJobTitle(job),
      company: getCompanyName(job),
      location: fieldText(job, LOCATION_KEYS),
      salary: fieldText(job, SALARY_KEYS),
    };
    const url = fieldText(job, URL_KEYS);
    const text = documentText(fields, getRequirements(job), getDescription(job));

    chunkText(text).forEach((chunk, index) => {
      documents.push({
        id: `${idPrefix}-chunk${index}`,
        jobId,
        ...fields,
        url,
        document: chunk.trim(),
      });
    });
  });

  return documents;
}
