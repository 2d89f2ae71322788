import { analyzeFit, formatMatchOverview } from '@jobfit/matching';
import type { AnalyzeFitOptions } from '@jobfit/matching';
import type { GapAdvisor } from './types.js';

/**
 * Template narrative and rule-based course. Works offline and never calls a model.
 */
export function createDeterministicAdvisor(options: AnalyzeFitOptions = {}): GapAdvisor {
  return {
    async advise({ job, resumeText }) {
      const fit = analyzeFit(job, resumeText, options);

      return {
        analysis: [formatMatchOverview(fit), fit.narrative].join('\n\n'),
        courses: fit.course,
        source: 'deterministic',
      };
    },
  };
}
