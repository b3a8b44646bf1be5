/**
 * Document Loader
 * Enumerates a source tree and reads each file with the reader for its format.
 */

import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  DocumentFormat,
  describeFormat,
  detectFormat,
  extensionOf,
} from './document-format';
import { PdfParser } from './parsers/pdf.parser';
import { TextParser } from './parsers/text.parser';
import type { DocumentPage, LoadedDocument } from '../types/document.types';
import {
  EmptyFileError,
  UnsupportedFileTypeError,
} from '../errors/ingestion-errors';

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  constructor(
    private readonly pdfParser: PdfParser,
    private readonly textParser: TextParser,
  ) {}

  /**
   * Recursively list every regular file under `sourceDirectory`, sorted so
   * that runs over the same tree are repeatable.
   */
  async listFiles(sourceDirectory: string): Promise<string[]> {
    const files: string[] = [];
    const pending = [path.resolve(sourceDirectory)];

    while (pending.length > 0) {
      const directory = pending.pop();
      if (directory === undefined) {
        break;
      }

      const entries = await fs.readdir(directory, { withFileTypes: true });
      for (const entry of entries) {
        const entryPath = path.join(directory, entry.name);
        if (entry.isDirectory()) {
          pending.push(entryPath);
        } else if (entry.isFile()) {
          files.push(entryPath);
        }
      }
    }

    return files.sort();
  }

  detectFormat(filePath: string): DocumentFormat | null {
    return detectFormat(filePath);
  }

  /**
   * @throws UnsupportedFileTypeError for extensions outside the known formats
   * @throws CorruptedFileError if the file cannot be read
   * @throws EmptyFileError if nothing but whitespace was extracted
   */
  async load(
    filePath: string,
    format: DocumentFormat | null = detectFormat(filePath),
  ): Promise<LoadedDocument> {
    if (!format) {
      throw new UnsupportedFileTypeError(filePath, extensionOf(filePath));
    }

    this.logger.log(`Processing ${describeFormat(format)}: ${filePath}`);

    const pages: DocumentPage[] =
      format.kind === 'pdf'
        ? await this.pdfParser.parse(filePath)
        : [{ content: await this.textParser.parse(filePath) }];

    if (pages.every((page) => page.content.trim().length === 0)) {
      throw new EmptyFileError(filePath);
    }

    return { source: filePath, format, pages };
  }
}
