import { basename, extname } from 'node:path';
import { InvalidInputError } from '../../domain/errors';
import { errorMessage } from '../../utils/logger';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md'];

async function loadPdf(filename: string, buffer: Buffer): Promise<string> {
  // Loaded lazily: pdf-parse is only needed for uploaded PDFs
  const { default: pdf } = await import('pdf-parse/lib/pdf-parse.js');
  try {
    const data = await pdf(buffer);
    return data.text;
  } catch (error) {
    throw new InvalidInputError(`Could not read PDF '${filename}': ${errorMessage(error)}`, { cause: error });
  }
}

export function isSupportedFile(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(extname(filename).toLowerCase());
}

export async function extractFileText(filename: string, buffer: Buffer): Promise<string> {
  const ext = extname(filename).toLowerCase();

  switch (ext) {
    case '.pdf':
      return loadPdf(filename, buffer);
    case '.txt':
    case '.md':
      return buffer.toString('utf-8');
    default:
      throw new InvalidInputError(
        `Unsupported file type: ${ext || '(none)'}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`
      );
  }
}

export function cleanFilename(filename: string): string {
  return basename(filename);
}
