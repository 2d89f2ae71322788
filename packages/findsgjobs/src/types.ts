export type SortDirection = 'asc' | 'desc';

/**
 * Query for the searchable jobs endpoint. Id lists are sent comma-joined; unset values are omitted.
 */
export interface FindSGJobsSearchParams {
  page?: number;
  perPage?: number;
  keywords?: string;
  employmentTypes?: readonly number[];
  jobCategories?: readonly number[];
  minEducationLevels?: readonly number[];
  minYearsOfExperience?: readonly number[];
  mrtStations?: readonly number[];
  position?: string;
  currency?: number;
  minSalary?: number;
  maxSalary?: number;
  interval?: number;
  sortField?: string;
  sortDirection?: SortDirection;
}

/**
 * One `data.result[]` entry. Either side may be an empty mapping.
 */
export interface SearchResultItem {
  job: Record<string, unknown>;
  company: Record<string, unknown>;
}

export interface SummaryFilters {
  company?: string;
  nearestMrt?: string;
  employmentType?: string;
  education?: string;
  minSalary?: number;
}
