import type { CoverageMetrics } from './types.js';

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * Integer share of `part` in `whole`, rounded half up. 0 when `whole` is 0.
 */
export function percentage(part: number, whole: number): number {
  if (!(whole > 0)) return 0;
  return clampPercent(Math.round((100 * part) / whole));
}

export function scoreCoverage(
  jobKeywords: Iterable<string>,
  resumeKeywords: Iterable<string>,
  matchedSkills: readonly string[] = [],
  missingSkills: readonly string[] = [],
): CoverageMetrics {
  const job = new Set(jobKeywords);
  const resume = new Set(resumeKeywords);

  let shared = 0;
  for (const keyword of job) {
    if (resume.has(keyword)) shared += 1;
  }

  const skillTotal = matchedSkills.length + missingSkills.length;
  const keywordCoverage = percentage(shared, job.size);
  const skillCoverage = percentage(matchedSkills.length, skillTotal);
  const hasKeywordMetric = job.size > 0;
  const hasSkillMetric = skillTotal > 0;

  // Only metrics with a non-zero denominator take part in the average.
  const available: number[] = [];
  if (hasKeywordMetric) available.push(keywordCoverage);
  if (hasSkillMetric) available.push(skillCoverage);

  const overallMatch =
    available.length > 0 ? clampPercent(Math.round(available.reduce((sum, value) => sum + value, 0) / available.length)) : 0;

  return {
    keywordCoverage,
    skillCoverage,
    overallMatch,
    hasKeywordMetric,
    hasSkillMetric,
  };
}
