/**
 * PDF Parser
 * Uses LangChain's PDFLoader, one document per page. Layout is lost in
 * extraction, so pages are later split by character count only.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import type { DocumentPage } from '../../types/document.types';
import { CorruptedFileError } from '../../errors/ingestion-errors';
import { toError } from '../../../shared/errors/rag-error';

@Injectable()
export class PdfParser {
  private readonly logger = new Logger(PdfParser.name);

  /**
   * @returns non-empty pages in document order
   * @throws CorruptedFileError if the PDF cannot be parsed
   */
  async parse(filePath: string): Promise<DocumentPage[]> {
    const startTime = Date.now();

    try {
      const loader = new PDFLoader(filePath, {
        splitPages: true,
        parsedItemSeparator: ' ',
      });
      const documents = await loader.load();

      const pages = documents
        .map((doc, index) => ({
          content: doc.pageContent,
          pageNumber: readPageNumber(doc.metadata) ?? index + 1,
        }))
        .filter((page) => page.content.trim().length > 0);

      this.logger.log(
        `PDF parsing complete - Duration: ${Date.now() - startTime}ms, ` +
          `Pages: ${documents.length}, Non-empty pages: ${pages.length}`,
      );

      return pages;
    } catch (error) {
      const cause = toError(error);
      const message = cause.message.toLowerCase();
      const reason =
        message.includes('password') || message.includes('encrypted')
          ? 'PDF file is password-protected'
          : 'Failed to parse PDF file';

      throw new CorruptedFileError(filePath, reason, cause);
    }
  }
}

/**
 * PDFLoader stores the page under `metadata.loc.pageNumber`.
 */
function readPageNumber(metadata: Record<string, unknown>): number | undefined {
  const loc = metadata.loc;
  if (typeof loc === 'object' && loc !== null && 'pageNumber' in loc) {
    return typeof loc.pageNumber === 'number' ? loc.pageNumber : undefined;
  }
  return undefined;
}
