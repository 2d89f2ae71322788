export { extractResumeText, extractResumeTextFromBuffer, detectResumeFormat } from './extract.js';
export type { ResumeFormat } from './extract.js';
export { ResumeParseError, UnsupportedResumeFormatError } from './errors.js';
