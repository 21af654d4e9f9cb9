import { describe, it, expect } from 'vitest';
import { cleanFilename, extractFileText, isSupportedFile } from '../../../src/infrastructure/documents/documentLoader';
import { InvalidInputError } from '../../../src/domain/errors';

describe('documentLoader', () => {
  it('recognises supported extensions case-insensitively', () => {
    expect(isSupportedFile('notes.PDF')).toBe(true);
    expect(isSupportedFile('readme.md')).toBe(true);
    expect(isSupportedFile('slides.pptx')).toBe(false);
    expect(isSupportedFile('Makefile')).toBe(false);
  });

  it('reads text and markdown as utf-8', async () => {
    expect(await extractFileText('week1.txt', Buffer.from('Zellatmung – Überblick', 'utf-8'))).toBe(
      'Zellatmung – Überblick'
    );
    expect(await extractFileText('week1.md', Buffer.from('# Heading'))).toBe('# Heading');
  });

  it('rejects unsupported types', async () => {
    await expect(extractFileText('archive.zip', Buffer.from('PK'))).rejects.toThrow(InvalidInputError);
    await expect(extractFileText('archive.zip', Buffer.from('PK'))).rejects.toThrow(
      'Unsupported file type: .zip. Supported: .pdf, .txt, .md'
    );
  });

  it('rejects a file named .pdf that is not a PDF', async () => {
    const extraction = extractFileText('broken.pdf', Buffer.from('not a pdf'));

    await expect(extraction).rejects.toThrow(InvalidInputError);
    await expect(extraction).rejects.toThrow("Could not read PDF 'broken.pdf'");
  });

  it('drops directory components from uploaded names', () => {
    expect(cleanFilename('../../etc/notes.txt')).toBe('notes.txt');
  });
});
