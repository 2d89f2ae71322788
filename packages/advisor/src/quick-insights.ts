import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { QUICK_INSIGHTS_PROMPT } from './prompts.js';

export const MAX_INSIGHT_INPUT_CHARS = 1500;

/**
 * Three one-line insights: a strength, a gap and a tip.
 */
export async function quickInsights(model: BaseChatModel, resumeText: string, jobDescription: string): Promise<string> {
  const chain = QUICK_INSIGHTS_PROMPT.pipe(model).pipe(new StringOutputParser());

  return chain.invoke({
    resume: resumeText.slice(0, MAX_INSIGHT_INPUT_CHARS),
    job: jobDescription.slice(0, MAX_INSIGHT_INPUT_CHARS),
  });
}
