import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import mammoth from 'mammoth';
import { ResumeParseError, UnsupportedResumeFormatError } from './errors.js';

export type ResumeFormat = 'txt' | 'pdf' | 'docx';

const FORMATS_BY_EXTENSION: Readonly<Record<string, ResumeFormat>> = {
  '.txt': 'txt',
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.doc': 'docx',
};

export function detectResumeFormat(fileName: string): ResumeFormat {
  const extension = extname(fileName).toLowerCase();
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedResumeFormatError(extension);
  }

  return format;
}

async function readPdf(buffer: Buffer): Promise<string> {
  // pdf.js is heavy; load it only for PDFs.
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: buffer });

  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

async function readDocx(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

/**
 * Plain text of a résumé, trimmed. The format comes from the file name's extension.
 */
export async function extractResumeTextFromBuffer(buffer: Buffer, fileName: string): Promise<string> {
  const format = detectResumeFormat(fileName);

  if (format === 'txt') {
    return buffer.toString('utf8').trim();
  }

  try {
    const text = format === 'pdf' ? await readPdf(buffer) : await readDocx(buffer);
    return text.trim();
  } catch (error) {
    throw new ResumeParseError(basename(fileName), error);
  }
}

export async function extractResumeText(filePath: string): Promise<string> {
  detectResumeFormat(filePath);
  return extractResumeTextFromBuffer(await readFile(filePath), filePath);
}
