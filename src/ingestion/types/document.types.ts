/**
 * Document Types
 * A LoadedDocument lives only between the loader and the splitter.
 */

import type { DocumentFormat } from '../loader/document-format';

export interface DocumentPage {
  content: string;
  /** 1-based; set for PDF pages only */
  pageNumber?: number;
}

export interface LoadedDocument {
  readonly source: string;
  readonly format: DocumentFormat;
  /** One entry for text-based formats, one per non-empty page for PDF */
  readonly pages: readonly DocumentPage[];
}
