export { createAdvisor, createGeminiChatModel, withFallback, DEFAULT_GEMINI_MODEL } from './create-advisor.js';
export type { AdvisorConfig } from './create-advisor.js';
export { createDeterministicAdvisor } from './deterministic.js';
export {
  createGeminiAdvisor,
  buildCourseQuery,
  formatSearchResults,
  MAX_RESUME_CHARS,
  MAX_PROMPT_KEYWORDS,
  WEB_SEARCH_UNAVAILABLE_PREFIX,
} from './gemini.js';
export type { GeminiAdvisorOptions } from './gemini.js';
export { TavilyCourseSearch, TavilySearchError } from './tavily.js';
export type { TavilyCourseSearchOptions } from './tavily.js';
export { quickInsights, MAX_INSIGHT_INPUT_CHARS } from './quick-insights.js';
export { consoleLogger } from './logger.js';
export type {
  AdviceInput,
  AdviceResult,
  AdviceSource,
  AdvisorLogger,
  CourseSearch,
  CourseSearchResult,
  GapAdvisor,
} from './types.js';
