export class UnsupportedResumeFormatError extends Error {
  readonly extension: string;

  constructor(extension: string) {
    super(`Unsupported resume format "${extension || '(none)'}"; expected .pdf, .docx, .doc or .txt`);
    this.name = 'UnsupportedResumeFormatError';
    this.extension = extension;
  }
}

export class ResumeParseError extends Error {
  readonly fileName: string;

  constructor(fileName: string, cause: unknown) {
    super(`Failed to read resume ${fileName}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ResumeParseError';
    this.fileName = fileName;
  }
}
