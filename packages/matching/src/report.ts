import type { FitAnalysis } from './types.js';

function listOr(values: readonly string[], fallback: string): string {
  return values.length > 0 ? values.join(', ') : fallback;
}

/**
 * Overview block: skill breakdown when the posting listed skills, keyword counts otherwise.
 */
export function formatMatchOverview(analysis: FitAnalysis): string {
  if (analysis.skillMatch) {
    return [
      '**SKILL MATCH OVERVIEW**',
      '',
      `- Job skills (from posting): ${listOr(analysis.skills, 'Not specified')}`,
      `- Matched skills in your resume: ${listOr(analysis.skillMatch.matched, 'None clearly detected')}`,
      `- Skill gaps to work on: ${listOr(analysis.skillMatch.missing, 'No obvious skill gaps based on text')}`,
      `- Job match: ${analysis.coverage.overallMatch}% (skill coverage ${analysis.coverage.skillCoverage}%, keyword coverage ${analysis.coverage.keywordCoverage}%)`,
    ].join('\n');
  }

  return [
    '**MATCH OVERVIEW**',
    '',
    `- Keyword overlap count: ${analysis.overlap.length} of ${analysis.jobKeywords.length} unique JD keywords`,
    `- Coverage: ${analysis.coverage.keywordCoverage}%`,
  ].join('\n');
}

export function formatCourseSection(course: string): string {
  return ['**COURSE RECOMMENDATION**', '', `- Suggested course: ${course}`].join('\n');
}

/**
 * Plain-text report of the deterministic analysis.
 */
export function formatFitReport(analysis: FitAnalysis): string {
  return [
    formatMatchOverview(analysis),
    '**GAP ANALYSIS (Narrative)**',
    analysis.narrative,
    formatCourseSection(analysis.course),
  ].join('\n\n');
}
