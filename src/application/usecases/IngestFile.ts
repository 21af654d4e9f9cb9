import type { IndexingService, IngestResult } from '../../domain/services/IndexingService';
import { InvalidInputError } from '../../domain/errors';
import {
  SUPPORTED_EXTENSIONS,
  cleanFilename,
  extractFileText,
  isSupportedFile,
} from '../../infrastructure/documents/documentLoader';
import { log } from '../../utils/logger';

export interface IngestFileInput {
  courseId: number;
  courseName: string;
  filename: string;
  content: Buffer;
}

export interface IngestFileOutput extends IngestResult {
  source: string;
}

export type FileTextExtractor = (filename: string, content: Buffer) => Promise<string>;

/**
 * Appends one uploaded file to a course collection without touching the
 * material already indexed there.
 */
export class IngestFileUseCase {
  constructor(
    private indexingService: IndexingService,
    private extractText: FileTextExtractor = extractFileText
  ) {}

  async execute(input: IngestFileInput): Promise<IngestFileOutput> {
    const filename = cleanFilename(input.filename);

    if (!isSupportedFile(filename)) {
      throw new InvalidInputError(`Unsupported file '${filename}'. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`);
    }

    const text = await this.extractText(filename, input.content);
    const source = `Upload: ${filename}`;

    log('info', 'Ingesting uploaded file', {
      courseId: input.courseId,
      filename,
      bytes: input.content.length,
      textLength: text.length,
    });

    const result = await this.indexingService.ingestDocument(input.courseId, input.courseName, {
      type: 'file_upload',
      source,
      content: text,
    });

    return { ...result, source };
  }
}
