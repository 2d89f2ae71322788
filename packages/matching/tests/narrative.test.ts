import { describe, expect, it } from 'vitest';
import { generateNarrative } from '../src/narrative.js';

const MIRROR_TIP =
  '- Mirror relevant phrasing from the JD (truthfully) so that ATS and reviewers can recognise the match.';

describe('generateNarrative', () => {
  it('renders the keyword-only template', () => {
    const text = generateNarrative({
      title: 'Data Analyst',
      keywordOverlap: ['excel', 'looker'],
      keywordGaps: ['sql'],
      keywordCoverage: 67,
    });

    expect(text).toBe(
      [
        'For the **Data Analyst** role, your resume covers about **67%** of the prominent keywords found in the job description.',
        '',
        '**Where you are aligned**',
        '- Strong overlap on: **excel, looker**.',
        '',
        '**Potential gaps**',
        '- Missing or under-emphasised: **sql**.',
        '',
        '**How to strengthen your fit**',
        '- If you have experience in the above, bring them forward explicitly with quantifiable examples.',
        MIRROR_TIP,
      ].join('\n'),
    );
  });

  it('falls back to neutral wording with no title, overlap or gaps', () => {
    const lines = generateNarrative({ keywordOverlap: [], keywordGaps: [], keywordCoverage: 0 }).split('\n');

    expect(lines[0]).toBe(
      'For the **this role** role, your resume covers about **0%** of the prominent keywords found in the job description.',
    );
    expect(lines[3]).toBe(
      '- Limited direct keyword overlap detected. Consider mirroring key terms from the JD where truthful.',
    );
    expect(lines[6]).toBe('- No clear gaps from keywords alone. Focus on clearer impact statements and outcomes.');
    expect(lines.slice(8)).toEqual(['**How to strengthen your fit**', MIRROR_TIP]);
  });

  it('lists at most topN items', () => {
    const text = generateNarrative({
      title: 'Clerk',
      keywordOverlap: ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot'],
      keywordGaps: ['golf', 'hotel'],
      keywordCoverage: 75,
      topN: 2,
    });

    expect(text).toContain('- Strong overlap on: **alpha, bravo**.');
    expect(text).toContain('- Missing or under-emphasised: **golf, hotel**.');
  });

  it('defaults to five items', () => {
    const text = generateNarrative({
      keywordOverlap: ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot'],
      keywordGaps: [],
      keywordCoverage: 100,
    });

    expect(text).toContain('**alpha, bravo, charlie, delta, echo**.');
    expect(text).not.toContain('foxtrot');
  });

  it('renders the skill-aware template', () => {
    const lines = generateNarrative({
      title: 'Customer Support Executive',
      keywordOverlap: ['customer', 'phone'],
      keywordGaps: ['email'],
      keywordCoverage: 57,
      skills: { matched: ['Customer Service'], missing: ['Zendesk'], coverage: 50 },
    }).split('\n');

    expect(lines).toEqual([
      'For the **Customer Support Executive** role, your resume appears to cover roughly **50%** of the explicit skills and about **57%** of the main themes in the job description and requirements.',
      '',
      '**Where you are aligned**',
      '- Your profile shows solid exposure to: **Customer Service**. These map well to what the job description and requirements emphasise.',
      '',
      '**Key gaps or under-emphasised areas**',
      '- The job text and skill list highlight: **Zendesk**. These either do not appear clearly in your resume or are only implied.',
      '',
      '**How to strengthen your fit**',
      '- Add or expand bullet points that explicitly mention the missing skills (**Zendesk**), ideally with metrics or outcomes (response time, revenue, cost savings, satisfaction scores).',
      '- Several concepts from the posting (**email**) do not show up clearly. If you have experience in these, bring them forward with concrete examples; if not, consider small projects or courses to build them.',
      MIRROR_TIP,
    ]);
  });

  it('uses keyword lists when the skill lists are empty', () => {
    const text = generateNarrative({
      keywordOverlap: ['phone'],
      keywordGaps: [],
      keywordCoverage: 100,
      skills: { matched: [], missing: [], coverage: 0 },
    });

    expect(text).toContain('- Your profile shows solid exposure to: **phone**.');
    expect(text).toContain('- Your skill set already lines up closely;');
    expect(text).not.toContain('Several concepts from the posting');
  });

  it('is deterministic', () => {
    const input = { title: 'Clerk', keywordOverlap: ['filing'], keywordGaps: ['typing'], keywordCoverage: 50 };
    expect(generateNarrative(input)).toBe(generateNarrative(input));
  });
});
