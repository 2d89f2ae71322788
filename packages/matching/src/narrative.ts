export const DEFAULT_TOP_N = 5;
export const DEFAULT_ROLE_TITLE = 'this role';

export interface SkillNarrativeInput {
  matched: readonly string[];
  missing: readonly string[];
  coverage: number;
}

export interface NarrativeInput {
  title?: string;
  keywordOverlap: readonly string[];
  keywordGaps: readonly string[];
  keywordCoverage: number;
  /** Present only when the posting lists explicit skills. */
  skills?: SkillNarrativeInput;
  topN?: number;
}

const MIRROR_PHRASING_TIP =
  '- Mirror relevant phrasing from the JD (truthfully) so that ATS and reviewers can recognise the match.';

function roleTitle(title: string | undefined): string {
  return title?.trim() || DEFAULT_ROLE_TITLE;
}

function top(values: readonly string[], n: number): string[] {
  return values.slice(0, n);
}

function keywordNarrative(input: NarrativeInput, topN: number): string[] {
  const strengths = top(input.keywordOverlap, topN);
  const gaps = top(input.keywordGaps, topN);
  const lines: string[] = [];

  lines.push(
    `For the **${roleTitle(input.title)}** role, your resume covers about **${input.keywordCoverage}%** ` +
      'of the prominent keywords found in the job description.',
  );

  lines.push('', '**Where you are aligned**');
  if (strengths.length > 0) {
    lines.push(`- Strong overlap on: **${strengths.join(', ')}**.`);
  } else {
    lines.push('- Limited direct keyword overlap detected. Consider mirroring key terms from the JD where truthful.');
  }

  lines.push('', '**Potential gaps**');
  if (gaps.length > 0) {
    lines.push(`- Missing or under-emphasised: **${gaps.join(', ')}**.`);
  } else {
    lines.push('- No clear gaps from keywords alone. Focus on clearer impact statements and outcomes.');
  }

  lines.push('', '**How to strengthen your fit**');
  if (gaps.length > 0) {
    lines.push('- If you have experience in the above, bring them forward explicitly with quantifiable examples.');
  }
  lines.push(MIRROR_PHRASING_TIP);

  return lines;
}

function skillNarrative(input: NarrativeInput, skills: SkillNarrativeInput, topN: number): string[] {
  // Explicit skills take precedence over bare keywords when there are any.
  const strengths = top(skills.matched.length > 0 ? skills.matched : input.keywordOverlap, topN);
  const gaps = top(skills.missing.length > 0 ? skills.missing : input.keywordGaps, topN);
  const lines: string[] = [];

  lines.push(
    `For the **${roleTitle(input.title)}** role, your resume appears to cover roughly ` +
      `**${skills.coverage}%** of the explicit skills and about ` +
      `**${input.keywordCoverage}%** of the main themes in the job description and requirements.`,
  );

  lines.push('', '**Where you are aligned**');
  if (strengths.length > 0) {
    lines.push(
      `- Your profile shows solid exposure to: **${strengths.join(', ')}**. ` +
        'These map well to what the job description and requirements emphasise.',
    );
  } else {
    lines.push(
      '- The text overlap is limited, but some of your experience could be reframed to match the posting more directly.',
    );
  }

  lines.push('', '**Key gaps or under-emphasised areas**');
  if (gaps.length > 0) {
    lines.push(
      `- The job text and skill list highlight: **${gaps.join(', ')}**. ` +
        'These either do not appear clearly in your resume or are only implied.',
    );
  } else {
    lines.push(
      '- There are no obvious missing keywords, but you may still want to sharpen how specific tools, domains and results are described.',
    );
  }

  lines.push('', '**How to strengthen your fit**');
  if (skills.missing.length > 0) {
    lines.push(
      `- Add or expand bullet points that explicitly mention the missing skills (**${top(skills.missing, topN).join(', ')}**), ` +
        'ideally with metrics or outcomes (response time, revenue, cost savings, satisfaction scores).',
    );
  } else {
    lines.push(
      '- Your skill set already lines up closely; focus on clearer impact statements (numbers, scale, complexity) for your strongest achievements.',
    );
  }

  if (input.keywordGaps.length > 0) {
    lines.push(
      `- Several concepts from the posting (**${top(input.keywordGaps, topN).join(', ')}**) do not show up clearly. ` +
        'If you have experience in these, bring them forward with concrete examples; if not, consider small projects or courses to build them.',
    );
  }
  lines.push(MIRROR_PHRASING_TIP);

  return lines;
}

/**
 * Template-based gap narrative. Same input, same text.
 * Uses the skill-aware template when `skills` is given, the keyword-only one otherwise.
 */
export function generateNarrative(input: NarrativeInput): string {
  const topN = input.topN !== undefined && input.topN > 0 ? Math.floor(input.topN) : DEFAULT_TOP_N;
  const lines = input.skills ? skillNarrative(input, input.skills, topN) : keywordNarrative(input, topN);
  return lines.join('\n');
}
