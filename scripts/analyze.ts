import './env.js';
import { readFile } from 'node:fs/promises';
import { createAdvisor, type AdvisorLogger } from '@jobfit/advisor';
import { analyzeFit, formatFitReport, formatMatchOverview, isRecord } from '@jobfit/matching';
import { extractResumeText } from '@jobfit/resume';
import { readBoolEnv } from '../apps/worker/src/config.js';
import { createLogger } from '../apps/worker/src/observability/logger.js';

function usage(): never {
  console.error('usage: npm run analyze -- <resume.pdf|docx|txt> <job.json> [--smart]');
  process.exit(1);
}

function pinoAdvisorLogger(): AdvisorLogger {
  const logger = createLogger('jobfit-cli');
  return {
    info: (message) => logger.info(message),
    warn: (message) => logger.warn(message),
    error: (message) => logger.error(message),
  };
}

async function readJob(path: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  // Accept either a bare job record or a search result item.
  if (isRecord(parsed) && isRecord(parsed.job)) {
    return parsed.job;
  }

  if (!isRecord(parsed)) {
    throw new Error(`${path} does not contain a JSON object`);
  }

  return parsed;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const smart = args.includes('--smart') || readBoolEnv(process.env, 'USE_SMART_ANALYSIS', false);
  const [resumePath, jobPath] = args.filter((arg) => !arg.startsWith('--'));
  if (!resumePath || !jobPath) {
    usage();
  }

  const resumeText = await extractResumeText(resumePath);
  const job = await readJob(jobPath);
  const analysis = analyzeFit(job, resumeText);

  if (!smart) {
    console.log(formatFitReport(analysis));
    return;
  }

  const advisor = createAdvisor({
    useSmartAnalysis: true,
    geminiApiKey: process.env.GEMINI_API_KEY,
    geminiModel: process.env.GEMINI_MODEL?.trim() || undefined,
    tavilyApiKey: process.env.TAVILY_API_KEY,
    logger: pinoAdvisorLogger(),
  });

  const advice = await advisor.advise({
    job,
    resumeText,
    keywordOverlap: analysis.overlap,
    keywordGaps: analysis.gaps,
  });

  console.log(formatMatchOverview(analysis));
  console.log('');
  console.log(advice.analysis);
  console.log('');
  console.log(advice.courses);
  console.log('');
  console.log(`(analysis source: ${advice.source})`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
