import pino, { type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobfit-worker';
const VALID_LOG_LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.has(value);
}

export function readLogLevel(raw: string | undefined): LevelWithSilent {
  const normalized = raw?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

/**
 * JSON logger with an ISO `ts` field and the text under `message`.
 */
export function createLogger(defaultService = DEFAULT_SERVICE_NAME): Logger {
  const service = process.env.LOG_SERVICE_NAME?.trim() || defaultService;

  return pino({
    level: readLogLevel(process.env.LOG_LEVEL),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}
