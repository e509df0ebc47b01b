import fs from 'node:fs/promises';
import path from 'node:path';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse';

import { ExtractionError } from '../errors';
import type { FileStore } from '../store/files';

export interface TextExtractor {
  extract(fileId: string): Promise<string>;
}

export const normalizeText = (text: string): string =>
  text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

export const extractFromBuffer = async (buffer: Buffer, extension: string): Promise<string> => {
  switch (extension.toLowerCase()) {
    case '.pdf': {
      const parsed = await pdfParse(buffer);
      return normalizeText(parsed.text ?? '');
    }
    case '.docx': {
      const result = await mammoth.extractRawText({ buffer });
      return normalizeText(result.value);
    }
    case '.txt':
    case '.md':
      return normalizeText(buffer.toString('utf-8'));
    default:
      throw new ExtractionError(`Unsupported file type: ${extension || 'unknown'}`, { extension });
  }
};

export class FileTextExtractor implements TextExtractor {
  constructor(private readonly files: FileStore) {}

  async extract(fileId: string): Promise<string> {
    const meta = this.files.get(fileId);

    if (!meta) {
      throw new ExtractionError(`File ${fileId} could not be found.`, { fileId });
    }

    let buffer: Buffer;

    try {
      buffer = await fs.readFile(meta.path);
    } catch (error) {
      throw new ExtractionError(`File ${fileId} could not be read.`, { fileId }, { cause: error });
    }

    let text: string;

    try {
      text = await extractFromBuffer(buffer, path.extname(meta.name || meta.path));
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError(`Failed to extract text from file ${fileId}.`, { fileId }, { cause: error });
    }

    if (!text) {
      throw new ExtractionError(`File ${fileId} contains no readable text.`, { fileId });
    }

    return text;
  }
}
