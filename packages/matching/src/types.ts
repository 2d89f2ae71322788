/**
 * One posting as returned by the job-board API. No key is guaranteed; the same
 * field may live under several names or one level down under caption/value/text.
 */
export type JobRecord = Readonly<Record<string, unknown>>;

/**
 * Shape of the values a JobRecord carries once parsed from JSON.
 */
export type JobNode = string | number | boolean | null | readonly JobNode[] | { readonly [key: string]: JobNode };

export type KeywordSet = ReadonlySet<string>;

/**
 * Partition of a job's skill list. Both lists keep the input order.
 */
export interface SkillMatchResult {
  matched: string[];
  missing: string[];
}

/**
 * Integer percentages in [0, 100].
 * `hasKeywordMetric` / `hasSkillMetric` say whether the metric had a non-zero denominator.
 */
export interface CoverageMetrics {
  keywordCoverage: number;
  skillCoverage: number;
  overallMatch: number;
  hasKeywordMetric: boolean;
  hasSkillMetric: boolean;
}

export interface KeywordOverlap {
  jobKeywords: Set<string>;
  overlap: string[];
  gaps: string[];
}

export type RequirementTier = 'known-keys' | 'legacy-keys' | 'fuzzy-keys' | 'description';

export interface LocatedRequirements {
  text: string;
  tier: RequirementTier | null;
}

export interface CourseRule {
  id: string;
  keywords: readonly string[];
  recommendation: string;
}

/**
 * Output of the deterministic analysis flow for one job/résumé pair.
 */
export interface FitAnalysis {
  title: string;
  company: string;
  description: string;
  requirements: string;
  requirementsTier: RequirementTier | null;
  skills: string[];
  jobKeywords: string[];
  overlap: string[];
  gaps: string[];
  skillMatch: SkillMatchResult | null;
  coverage: CoverageMetrics;
  narrative: string;
  course: string;
}
