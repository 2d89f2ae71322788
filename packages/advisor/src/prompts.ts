import { ChatPromptTemplate } from '@langchain/core/prompts';

export const GAP_ANALYSIS_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    `You are an expert career counselor and recruitment specialist with deep knowledge of the Singapore job market.

Your task is to provide an actionable skill gap analysis comparing a candidate's resume against a specific job posting.

Guidelines:
- Be honest but encouraging
- Focus on practical, actionable insights
- Highlight transferable skills
- Suggest specific ways to bridge gaps
- Consider Singapore's employment context
- Be concise`,
  ],
  [
    'human',
    `Analyze the following job and resume:

JOB DETAILS:
{job_context}

RESUME TEXT:
{resume_text}

KEYWORD OVERLAP ({overlap_count} keywords):
{keyword_overlap}

MISSING KEYWORDS ({gaps_count} keywords):
{keyword_gaps}

Provide a structured analysis with these sections:

1. **MATCH STRENGTH** (overall assessment in 2-3 sentences)

2. **KEY STRENGTHS** (3-5 specific points where the candidate matches well)

3. **SKILL GAPS** (3-5 areas that need development or are missing)

4. **RECOMMENDATIONS** (3-4 actionable steps to improve candidacy)

Be specific, professional, and Singapore-focused. Use markdown formatting.`,
  ],
]);

export const WEB_COURSE_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    `You are an expert in Singapore's professional development and training landscape.

Based on web search results, recommend 3-4 relevant courses that:
- Are available in Singapore
- Address the identified skill gaps
- Are ideally SkillsFuture claimable
- Come from reputable institutions`,
  ],
  [
    'human',
    `Based on these skill gaps for a {job_title} position:
{skill_gaps}

And these web search results about Singapore courses:
{search_results}

Provide 3-4 course recommendations. For each course include:
- Course name and provider
- Relevance to gaps (1 sentence)
- Format (online/classroom/blended)
- SkillsFuture eligibility if mentioned

Format as a numbered list.`,
  ],
]);

export const LLM_COURSE_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    `You are an expert in Singapore's professional development landscape.
Recommend relevant courses from well-known providers such as SkillsFuture Singapore, NTUC LearningHub,
Singapore Polytechnic, Coursera (SkillsFuture eligible), Udemy, LinkedIn Learning, SMU Academy
and NUS/NTU continuing education.`,
  ],
  [
    'human',
    `For a {job_title} position with these skill gaps:
{skill_gaps}

Recommend 3-4 relevant courses available in Singapore. For each include:
- Course name and provider
- Why it addresses the gaps (1 sentence)
- Format and SkillsFuture eligibility if applicable

Format as a numbered list.`,
  ],
]);

export const QUICK_INSIGHTS_PROMPT = ChatPromptTemplate.fromMessages([
  ['system', 'You are a helpful career advisor. Provide quick, actionable insights.'],
  [
    'human',
    `Compare this resume with the job description and give 3 quick insights (each 1 sentence):

Resume: {resume}
Job: {job}

Format:
✓ [Strength]
⚠ [Gap]
💡 [Quick tip]`,
  ],
]);
