import { InvalidInputError } from '../errors';
import { MIN_CONTENT_LENGTH } from '../entities/CourseDocument';

export interface SplitterConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface TextWindow {
  start: number;
  end: number;
}

/**
 * Fixed-size character windows; consecutive windows share `chunkOverlap`
 * characters so a sentence cut at one boundary is whole in the next window.
 */
export class FixedWindowTextSplitter {
  private chunkSize: number;
  private chunkOverlap: number;

  constructor(config: SplitterConfig) {
    if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
      throw new InvalidInputError(`chunkSize must be a positive integer, got ${config.chunkSize}`);
    }
    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
      throw new InvalidInputError(`chunkOverlap must be a non-negative integer, got ${config.chunkOverlap}`);
    }
    // Otherwise the window never advances
    if (config.chunkOverlap >= config.chunkSize) {
      throw new InvalidInputError(
        `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
      );
    }
    this.chunkSize = config.chunkSize;
    this.chunkOverlap = config.chunkOverlap;
  }

  windows(length: number): TextWindow[] {
    const step = this.chunkSize - this.chunkOverlap;
    const result: TextWindow[] = [];

    for (let start = 0; start < length; start += step) {
      result.push({ start, end: Math.min(start + this.chunkSize, length) });
    }

    return result;
  }

  split(text: string): string[] {
    const chunks: string[] = [];

    for (const { start, end } of this.windows(text.length)) {
      const chunk = text.slice(start, end).trim();
      if (chunk.length > MIN_CONTENT_LENGTH) {
        chunks.push(chunk);
      }
    }

    return chunks;
  }
}

export function chunkText(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  chunkOverlap: number = DEFAULT_CHUNK_OVERLAP
): string[] {
  return new FixedWindowTextSplitter({ chunkSize, chunkOverlap }).split(text);
}
