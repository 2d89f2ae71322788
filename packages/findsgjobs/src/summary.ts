import { getDescription, getJobTitle, isRecord, stripMarkup } from '@jobfit/matching';
import { z } from 'zod';
import type { SearchResultItem, SummaryFilters } from './types.js';

/**
 * Flat, display-ready row for one search result.
 */
export const jobSummarySchema = z.object({
  jobId: z.string().min(1),
  title: z.string(),
  company: z.string(),
  nearestMrt: z.string(),
  salaryRange: z.string(),
  minSalary: z.number().int().nullable(),
  employmentType: z.string(),
  minEducation: z.string(),
  minExperience: z.string(),
  description: z.string(),
});

export type JobSummary = z.infer<typeof jobSummarySchema>;

const DEFAULT_CURRENCY = 'SGD';
const DEFAULT_INTERVAL = 'Month';

function captionOf(value: unknown): string {
  if (!isRecord(value)) return '';
  const caption = value.caption;
  return typeof caption === 'string' ? caption : '';
}

function joinCaptions(value: unknown): string {
  if (!Array.isArray(value)) return '';
  return value
    .map(captionOf)
    .filter((caption) => caption.length > 0)
    .join(', ');
}

function hasValue(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0 && value !== false;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }

  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }

  return null;
}

function amountText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : String(value);
}

function resolveJobId(job: Record<string, unknown>, index: number): string {
  for (const key of ['sid', 'id']) {
    const value = job[key];
    if (hasValue(value) && (typeof value === 'string' || typeof value === 'number')) {
      return String(value);
    }
  }

  return `job-${index}`;
}

interface SalaryInfo {
  salaryRange: string;
  minSalary: number | null;
}

/**
 * Human-readable salary and the numeric lower bound used for filtering.
 * Hidden salaries produce an empty range.
 */
export function describeSalary(job: Record<string, unknown>): SalaryInfo {
  if (hasValue(job.id_Job_Donotdisplaysalary)) {
    return { salaryRange: '', minSalary: null };
  }

  const currency = captionOf(job.id_Job_Currency) || DEFAULT_CURRENCY;
  const interval = captionOf(job.id_Job_Interval) || DEFAULT_INTERVAL;

  const rangeCaption = captionOf(job.Salaryrange);
  if (rangeCaption) {
    const firstNumber = rangeCaption.match(/\d[\d,]*/)?.[0];
    return {
      salaryRange: `${currency} ${rangeCaption} per ${interval}`,
      minSalary: firstNumber ? Number.parseInt(firstNumber.replace(/,/g, ''), 10) : null,
    };
  }

  const min = job.id_Job_Salary;
  const max = job.id_Job_MaxSalary;
  const minSalary = hasValue(min) ? toInteger(min) : null;

  if (hasValue(min) && hasValue(max)) {
    return { salaryRange: `${currency} ${amountText(min)}–${amountText(max)} per ${interval}`, minSalary };
  }
  if (hasValue(min)) {
    return { salaryRange: `${currency} ${amountText(min)}+ per ${interval}`, minSalary };
  }
  if (hasValue(max)) {
    return { salaryRange: `${currency} up to ${amountText(max)} per ${interval}`, minSalary };
  }

  return { salaryRange: '', minSalary };
}

export function toJobSummary(item: SearchResultItem, index: number): JobSummary {
  const { job, company } = item;
  const companyName = company.CompanyName;

  return {
    jobId: resolveJobId(job, index),
    title: getJobTitle(job),
    company: typeof companyName === 'string' ? companyName.trim() : '',
    nearestMrt: joinCaptions(job.id_Job_NearestMRTStation),
    ...describeSalary(job),
    employmentType: joinCaptions(job.EmploymentType),
    minEducation: captionOf(job.MinimumEducationLevel),
    minExperience: captionOf(job.MinimumYearsofExperience),
    description: stripMarkup(getDescription(job)),
  };
}

/**
 * The posting record with the company name copied in from the company side
 * when the posting itself has none.
 */
export function toJobRecord(item: SearchResultItem): Record<string, unknown> {
  const { job, company } = item;
  if (job.CompanyName !== undefined || company.CompanyName === undefined) {
    return { ...job };
  }

  return { ...job, CompanyName: company.CompanyName };
}

export function toJobSummaries(items: readonly SearchResultItem[]): JobSummary[] {
  return items.map((item, index) => toJobSummary(item, index));
}

function containsIgnoreCase(value: string, needle: string | undefined): boolean {
  const trimmed = needle?.trim();
  if (!trimmed) return true;
  return value.toLowerCase().includes(trimmed.toLowerCase());
}

/**
 * Client-side filters over summary rows. A row without a salary counts as 0
 * against the minimum.
 */
export function filterSummaries(rows: readonly JobSummary[], filters: SummaryFilters = {}): JobSummary[] {
  const minSalary = filters.minSalary ?? 0;

  return rows.filter(
    (row) =>
      containsIgnoreCase(row.company, filters.company) &&
      containsIgnoreCase(row.nearestMrt, filters.nearestMrt) &&
      containsIgnoreCase(row.employmentType, filters.employmentType) &&
      containsIgnoreCase(row.minEducation, filters.education) &&
      (minSalary <= 0 || (row.minSalary ?? 0) >= minSalary),
  );
}
