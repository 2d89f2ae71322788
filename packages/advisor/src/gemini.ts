import { getCompanyName, getDescription, getJobTitle, stripMarkup } from '@jobfit/matching';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { ChatPromptTemplate } from '@langchain/core/prompts';
import { consoleLogger, errorMessage } from './logger.js';
import { GAP_ANALYSIS_PROMPT, LLM_COURSE_PROMPT, WEB_COURSE_PROMPT } from './prompts.js';
import type { AdviceInput, AdvisorLogger, CourseSearch, CourseSearchResult, GapAdvisor } from './types.js';

export const MAX_RESUME_CHARS = 3000;
export const MAX_PROMPT_KEYWORDS = 20;
export const MAX_COURSE_GAPS = 10;
export const MAX_QUERY_GAPS = 5;
export const WEB_SEARCH_UNAVAILABLE_PREFIX = 'Web search unavailable. Using AI recommendations:\n\n';

export interface GeminiAdvisorOptions {
  model: BaseChatModel;
  courseSearch?: CourseSearch;
  logger?: AdvisorLogger;
}

async function runPrompt(
  prompt: ChatPromptTemplate,
  model: BaseChatModel,
  variables: Record<string, string | number>,
): Promise<string> {
  const chain = prompt.pipe(model).pipe(new StringOutputParser());
  return chain.invoke(variables);
}

function jobContext(input: AdviceInput): string {
  return [
    `Job Title: ${getJobTitle(input.job) || 'this position'}`,
    `Company: ${getCompanyName(input.job) || 'the company'}`,
    `Job Description: ${stripMarkup(getDescription(input.job))}`,
  ].join('\n');
}

export function formatSearchResults(results: readonly CourseSearchResult[]): string {
  if (results.length === 0) return 'No results.';

  return results.map((result, index) => `${index + 1}. ${result.title} (${result.url})\n${result.content}`).join('\n\n');
}

export function buildCourseQuery(jobTitle: string, gaps: readonly string[]): string {
  return `Singapore professional courses training for ${jobTitle} ${gaps.slice(0, MAX_QUERY_GAPS).join(' ')} SkillsFuture`;
}

/**
 * LLM-backed advisor. Analysis failures propagate; course search failures fall
 * back to model-only recommendations.
 */
export function createGeminiAdvisor(options: GeminiAdvisorOptions): GapAdvisor {
  const { model, courseSearch, logger = consoleLogger } = options;

  async function recommendWithoutSearch(jobTitle: string, gaps: readonly string[]): Promise<string> {
    return runPrompt(LLM_COURSE_PROMPT, model, {
      job_title: jobTitle,
      skill_gaps: gaps.slice(0, MAX_COURSE_GAPS).join(', '),
    });
  }

  async function recommendCourses(jobTitle: string, gaps: readonly string[]): Promise<string> {
    if (!courseSearch) {
      return recommendWithoutSearch(jobTitle, gaps);
    }

    try {
      const results = await courseSearch.search(buildCourseQuery(jobTitle, gaps));
      return await runPrompt(WEB_COURSE_PROMPT, model, {
        job_title: jobTitle,
        skill_gaps: gaps.slice(0, MAX_COURSE_GAPS).join(', '),
        search_results: formatSearchResults(results),
      });
    } catch (error) {
      logger.warn(`[advisor] course search failed: ${errorMessage(error)}`);
      return `${WEB_SEARCH_UNAVAILABLE_PREFIX}${await recommendWithoutSearch(jobTitle, gaps)}`;
    }
  }

  return {
    async advise(input) {
      const jobTitle = getJobTitle(input.job) || 'this position';

      logger.info(`[advisor] generating analysis for ${jobTitle}`);
      const analysis = await runPrompt(GAP_ANALYSIS_PROMPT, model, {
        job_context: jobContext(input),
        resume_text: input.resumeText.slice(0, MAX_RESUME_CHARS),
        keyword_overlap: input.keywordOverlap.slice(0, MAX_PROMPT_KEYWORDS).join(', '),
        overlap_count: input.keywordOverlap.length,
        keyword_gaps: input.keywordGaps.slice(0, MAX_PROMPT_KEYWORDS).join(', '),
        gaps_count: input.keywordGaps.length,
      });

      const courses = await recommendCourses(jobTitle, input.keywordGaps);

      return { analysis, courses, source: 'llm' };
    },
  };
}
