import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { createDeterministicAdvisor } from './deterministic.js';
import { createGeminiAdvisor } from './gemini.js';
import { consoleLogger, errorMessage } from './logger.js';
import { TavilyCourseSearch } from './tavily.js';
import type { AdvisorLogger, GapAdvisor } from './types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export interface AdvisorConfig {
  useSmartAnalysis: boolean;
  geminiApiKey?: string;
  geminiModel?: string;
  tavilyApiKey?: string;
  /** Overrides the Gemini chat model. */
  model?: BaseChatModel;
  logger?: AdvisorLogger;
}

export function createGeminiChatModel(apiKey: string, model = DEFAULT_GEMINI_MODEL): BaseChatModel {
  return new ChatGoogleGenerativeAI({
    apiKey,
    model,
    temperature: 0.3,
    maxOutputTokens: 2048,
  });
}

/**
 * Runs `primary`, answering with `fallback` when it throws.
 */
export function withFallback(primary: GapAdvisor, fallback: GapAdvisor, logger: AdvisorLogger = consoleLogger): GapAdvisor {
  return {
    async advise(input) {
      try {
        return await primary.advise(input);
      } catch (error) {
        logger.warn(`[advisor] smart analysis failed, using deterministic output: ${errorMessage(error)}`);
        return fallback.advise(input);
      }
    },
  };
}

/**
 * Smart advisor when enabled and a model is available, deterministic otherwise.
 */
export function createAdvisor(config: AdvisorConfig): GapAdvisor {
  const logger = config.logger ?? consoleLogger;
  const deterministic = createDeterministicAdvisor();

  if (!config.useSmartAnalysis) {
    return deterministic;
  }

  const apiKey = config.geminiApiKey?.trim();
  const model = config.model ?? (apiKey ? createGeminiChatModel(apiKey, config.geminiModel) : undefined);
  if (!model) {
    logger.warn('[advisor] smart analysis enabled but GEMINI_API_KEY is not set; using deterministic analysis');
    return deterministic;
  }

  const tavilyKey = config.tavilyApiKey?.trim();
  const smart = createGeminiAdvisor({
    model,
    courseSearch: tavilyKey ? new TavilyCourseSearch({ apiKey: tavilyKey }) : undefined,
    logger,
  });

  return withFallback(smart, deterministic, logger);
}
