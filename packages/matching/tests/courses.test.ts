import { describe, expect, it } from 'vitest';
import { DEFAULT_COURSE_RECOMMENDATION, DEFAULT_COURSE_RULES, findCourseRule, recommendCourse } from '../src/courses.js';

function recommendationFor(id: string): string {
  const rule = DEFAULT_COURSE_RULES.find((candidate) => candidate.id === id);
  if (!rule) throw new Error(`no rule ${id}`);
  return rule.recommendation;
}

describe('recommendCourse', () => {
  it('picks the analytics course for a data role', () => {
    expect(recommendCourse('Data Analyst', ['SQL'], '', [])).toBe(recommendationFor('data-analytics'));
  });

  it('takes the first matching rule in order', () => {
    expect(recommendCourse('Sales Data Coordinator', [], '', [])).toBe(recommendationFor('data-analytics'));
    expect(recommendCourse('Helpdesk Executive', '', '', [])).toBe(recommendationFor('customer-support'));
  });

  it('falls back to the default recommendation', () => {
    expect(recommendCourse('Chef', '', 'cook meals', [])).toBe(DEFAULT_COURSE_RECOMMENDATION);
  });

  it('matches keywords as plain substrings', () => {
    expect(recommendCourse('Chef', '', '', ['kitchen'])).toBe(recommendationFor('it-support'));
  });

  it('accepts custom rules and fallback', () => {
    const rules = [{ id: 'driving', keywords: ['Forklift'], recommendation: 'Forklift Operation Course' }];

    expect(recommendCourse('Warehouse Assistant', ['forklift'], '', [], { rules })).toBe('Forklift Operation Course');
    expect(recommendCourse('Chef', [], '', [], { rules, fallback: 'none' })).toBe('none');
  });
});

describe('findCourseRule', () => {
  it('returns null when nothing matches', () => {
    expect(findCourseRule('pastry chef')).toBeNull();
  });

  it('ignores case', () => {
    expect(findCourseRule('CALL CENTRE agent')?.id).toBe('customer-support');
  });
});
