import type { CourseRule } from './types.js';

/**
 * Evaluated top to bottom; the first rule with a keyword contained in the job text wins.
 * Keywords match as plain substrings ("it" also hits "with").
 */
export const DEFAULT_COURSE_RULES: readonly CourseRule[] = [
  {
    id: 'customer-support',
    keywords: ['support', 'helpdesk', 'customer service', 'call centre'],
    recommendation: "'Customer Service Excellence' by NTUC LearningHub (Singapore, classroom/online)",
  },
  {
    id: 'data-analytics',
    keywords: ['data', 'analytics', 'excel'],
    recommendation: "'Excel Skills for Business' by Coursera (online, SkillsFuture claimable)",
  },
  {
    id: 'office-admin',
    keywords: ['admin', 'executive', 'coordinator'],
    recommendation: "'Digital Office Skills with Microsoft 365' by Singapore Polytechnic PACE (short course)",
  },
  {
    id: 'it-support',
    keywords: ['it', 'network', 'technician'],
    recommendation: "'CompTIA A+ Certification Training' by NTUC LearningHub (Singapore, blended)",
  },
  {
    id: 'sales-marketing',
    keywords: ['sales', 'marketing', 'account manager'],
    recommendation: "'Professional Selling Skills' by SMU Academy (short executive programme)",
  },
];

export const DEFAULT_COURSE_RECOMMENDATION =
  "'Career Resilience & Future Skills' by SkillsFuture Singapore (online options available)";

export interface CourseOptions {
  rules?: readonly CourseRule[];
  fallback?: string;
}

function joinSkills(skills: string | readonly string[]): string {
  return typeof skills === 'string' ? skills : skills.join(' ');
}

/**
 * The matching rule, or null when none matches.
 */
export function findCourseRule(text: string, rules: readonly CourseRule[] = DEFAULT_COURSE_RULES): CourseRule | null {
  const haystack = text.toLowerCase();
  return rules.find((rule) => rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()))) ?? null;
}

export function recommendCourse(
  jobTitle: string,
  skills: string | readonly string[],
  requirementsText: string,
  gapKeywords: readonly string[],
  options: CourseOptions = {},
): string {
  const text = `${jobTitle} ${joinSkills(skills)} ${requirementsText} ${gapKeywords.join(' ')}`;
  const rule = findCourseRule(text, options.rules ?? DEFAULT_COURSE_RULES);
  return rule?.recommendation ?? options.fallback ?? DEFAULT_COURSE_RECOMMENDATION;
}
