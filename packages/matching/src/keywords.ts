import type { KeywordOverlap } from './types.js';

export const DEFAULT_MIN_KEYWORD_LENGTH = 3;

// Connectives plus generic HR vocabulary that says nothing about fit.
export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set([
  'and',
  'the',
  'with',
  'for',
  'to',
  'of',
  'in',
  'on',
  'a',
  'an',
  'or',
  'be',
  'as',
  'by',
  'is',
  'are',
  'will',
  'able',
  'etc',
  'any',
  'all',
  'job',
  'role',
  'responsible',
  'responsibilities',
  'requirement',
  'requirements',
  'candidate',
  'candidates',
  'ability',
  'strong',
  'good',
  'skills',
  'experience',
  'experiences',
  'year',
  'years',
]);

export interface KeywordOptions {
  minLength?: number;
  stopwords?: ReadonlySet<string>;
}

function resolveMinLength(minLength: number | undefined): number {
  if (minLength === undefined || !Number.isFinite(minLength) || minLength < 1) {
    return DEFAULT_MIN_KEYWORD_LENGTH;
  }

  return Math.floor(minLength);
}

/**
 * Lowercase alphabetic runs of at least `minLength` letters, minus stopwords.
 */
export function extractKeywords(text: string | null | undefined, options: KeywordOptions = {}): Set<string> {
  const minLength = resolveMinLength(options.minLength);
  const stopwords = options.stopwords ?? DEFAULT_STOPWORDS;
  const tokens = (text ?? '').toLowerCase().match(new RegExp(`[a-z]{${minLength},}`, 'g')) ?? [];

  const keywords = new Set<string>();
  for (const token of tokens) {
    if (!stopwords.has(token)) {
      keywords.add(token);
    }
  }

  return keywords;
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Keywords shared by job and résumé, and job keywords the résumé lacks. Both sorted.
 */
export function buildKeywordOverlap(jobText: string, resumeText: string, options: KeywordOptions = {}): KeywordOverlap {
  const jobKeywords = extractKeywords(jobText, options);
  const resumeKeywords = extractKeywords(resumeText, options);

  const overlap: string[] = [];
  const gaps: string[] = [];
  for (const keyword of jobKeywords) {
    if (resumeKeywords.has(keyword)) {
      overlap.push(keyword);
    } else {
      gaps.push(keyword);
    }
  }

  return {
    jobKeywords,
    overlap: overlap.sort(byCodeUnit),
    gaps: gaps.sort(byCodeUnit),
  };
}

export function sortKeywords(keywords: Iterable<string>): string[] {
  return [...keywords].sort(byCodeUnit);
}
