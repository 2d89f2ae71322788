import { describe, expect, it } from 'vitest';
import { buildKeywordOverlap, DEFAULT_STOPWORDS, extractKeywords } from '../src/keywords.js';

describe('extractKeywords', () => {
  it('lowercases and drops stopwords and short tokens', () => {
    expect(extractKeywords('The Looker and SQL developer')).toEqual(new Set(['looker', 'sql', 'developer']));
  });

  it('is deterministic', () => {
    const text = 'Strong communication skills, 3+ years experience with Excel and SAP.';
    expect(extractKeywords(text)).toEqual(extractKeywords(text));
  });

  it('never returns stopwords and only returns alphabetic tokens', () => {
    const keywords = extractKeywords('Candidates with strong skills and good ability: B2B sales, CRM, year-end reports');

    for (const keyword of keywords) {
      expect(DEFAULT_STOPWORDS.has(keyword)).toBe(false);
      expect(keyword).toMatch(/^[a-z]{3,}$/);
    }
    expect(keywords).toEqual(new Set(['sales', 'crm', 'end', 'reports']));
  });

  it('honours a custom minimum length', () => {
    expect(extractKeywords('Looker SQL Excel data', { minLength: 5 })).toEqual(new Set(['looker', 'excel']));
  });

  it('honours an injected stopword list', () => {
    expect(extractKeywords('looker sql', { stopwords: new Set(['looker']) })).toEqual(new Set(['sql']));
  });

  it('returns an empty set for empty input', () => {
    expect(extractKeywords('')).toEqual(new Set());
    expect(extractKeywords(undefined)).toEqual(new Set());
  });
});

describe('buildKeywordOverlap', () => {
  it('splits job keywords into sorted overlap and gaps', () => {
    const result = buildKeywordOverlap('looker sql excel', 'looker excel communication');

    expect(result.jobKeywords).toEqual(new Set(['looker', 'sql', 'excel']));
    expect(result.overlap).toEqual(['excel', 'looker']);
    expect(result.gaps).toEqual(['sql']);
  });
});
