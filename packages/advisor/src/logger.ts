import type { AdvisorLogger } from './types.js';

export const consoleLogger: AdvisorLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
