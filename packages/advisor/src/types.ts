import type { JobRecord } from '@jobfit/matching';

export interface AdvisorLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface AdviceInput {
  job: JobRecord;
  resumeText: string;
  keywordOverlap: readonly string[];
  keywordGaps: readonly string[];
}

export type AdviceSource = 'deterministic' | 'llm';

export interface AdviceResult {
  analysis: string;
  courses: string;
  source: AdviceSource;
}

export interface GapAdvisor {
  advise(input: AdviceInput): Promise<AdviceResult>;
}

export interface CourseSearchResult {
  title: string;
  url: string;
  content: string;
}

export interface CourseSearch {
  search(query: string): Promise<CourseSearchResult[]>;
}
