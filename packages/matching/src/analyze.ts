import { recommendCourse, type CourseOptions } from './courses.js';
import { scoreCoverage } from './coverage.js';
import { getCompanyName, getDescription, getJobSkills, getJobTitle, locateRequirements } from './extract.js';
import { buildKeywordOverlap, extractKeywords, sortKeywords, type KeywordOptions } from './keywords.js';
import { generateNarrative } from './narrative.js';
import { matchSkills } from './skills.js';
import { stripMarkup } from './text.js';
import type { FitAnalysis, JobRecord } from './types.js';

export interface AnalyzeFitOptions extends KeywordOptions {
  courses?: CourseOptions;
  topN?: number;
}

/**
 * Text the job is compared on: description, requirements and listed skills.
 */
export function buildJobText(description: string, requirements: string, skills: readonly string[]): string {
  return [stripMarkup(description), stripMarkup(requirements), skills.join(' ')].join(' ');
}

/**
 * Deterministic résumé-vs-job analysis.
 * Stages: extract → normalize → keywords/skills → coverage → narrative/course
 */
export function analyzeFit(job: JobRecord, resumeText: string, options: AnalyzeFitOptions = {}): FitAnalysis {
  const keywordOptions: KeywordOptions = { minLength: options.minLength, stopwords: options.stopwords };

  // 1. Extract
  const title = getJobTitle(job);
  const company = getCompanyName(job);
  const description = getDescription(job);
  const requirements = locateRequirements(job);
  const skills = getJobSkills(job);

  // 2. Keywords
  const jobText = buildJobText(description, requirements.text, skills);
  const { jobKeywords, overlap, gaps } = buildKeywordOverlap(jobText, resumeText, keywordOptions);

  // 3. Skills, only when the posting lists any
  const skillMatch = skills.length > 0 ? matchSkills(skills, resumeText) : null;

  // 4. Coverage
  const coverage = scoreCoverage(
    jobKeywords,
    extractKeywords(resumeText, keywordOptions),
    skillMatch?.matched,
    skillMatch?.missing,
  );

  // 5. Narrative and course
  const narrative = generateNarrative({
    title,
    keywordOverlap: overlap,
    keywordGaps: gaps,
    keywordCoverage: coverage.keywordCoverage,
    skills: skillMatch ? { ...skillMatch, coverage: coverage.skillCoverage } : undefined,
    topN: options.topN,
  });

  const courseGaps = skillMatch && skillMatch.missing.length > 0 ? skillMatch.missing : gaps;
  const course = recommendCourse(title, skills, requirements.text, courseGaps, options.courses);

  return {
    title,
    company,
    description,
    requirements: requirements.text,
    requirementsTier: requirements.tier,
    skills,
    jobKeywords: sortKeywords(jobKeywords),
    overlap,
    gaps,
    skillMatch,
    coverage,
    narrative,
    course,
  };
}
