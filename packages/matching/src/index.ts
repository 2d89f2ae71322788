// Pipeline
export { analyzeFit, buildJobText } from './analyze.js';
export type { AnalyzeFitOptions } from './analyze.js';

// Individual stages
export {
  getDescription,
  getRequirements,
  locateRequirements,
  carveRequirementsFromDescription,
  getJobSkills,
  getJobTitle,
  getCompanyName,
  isRequirementKey,
  REQUIREMENT_STRATEGIES,
  DESCRIPTION_KEYS,
  REQUIREMENT_KEYS,
  LEGACY_REQUIREMENT_KEYS,
  REQUIREMENT_KEY_HINTS,
  MAX_WALK_DEPTH,
} from './extract.js';
export type { RequirementStrategy } from './extract.js';
export { stripMarkup, normalizeWhitespace, normalizeSkillText } from './text.js';
export {
  extractKeywords,
  buildKeywordOverlap,
  sortKeywords,
  DEFAULT_STOPWORDS,
  DEFAULT_MIN_KEYWORD_LENGTH,
} from './keywords.js';
export type { KeywordOptions } from './keywords.js';
export { matchSkills, toSkillString, resumeMentionsSkill } from './skills.js';
export { scoreCoverage, percentage } from './coverage.js';
export { generateNarrative, DEFAULT_TOP_N, DEFAULT_ROLE_TITLE } from './narrative.js';
export type { NarrativeInput, SkillNarrativeInput } from './narrative.js';
export { recommendCourse, findCourseRule, DEFAULT_COURSE_RULES, DEFAULT_COURSE_RECOMMENDATION } from './courses.js';
export type { CourseOptions } from './courses.js';
export { formatFitReport, formatMatchOverview, formatCourseSection } from './report.js';
export { isRecord, asText } from './guards.js';

// Types
export type {
  JobRecord,
  JobNode,
  KeywordSet,
  KeywordOverlap,
  SkillMatchResult,
  CoverageMetrics,
  RequirementTier,
  LocatedRequirements,
  CourseRule,
  FitAnalysis,
} from './types.js';
