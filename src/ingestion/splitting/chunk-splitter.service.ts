/**
 * Chunk Splitter Service
 * Selects the split strategy for a document's format and turns the sections
 * it produces into chunks with their metadata.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { DocumentFormatKind } from '../loader/document-format';
import type { LoadedDocument } from '../types/document.types';
import type { Chunk, ChunkMetadata, SplitSection } from '../types/chunk.types';
import type { SplitStrategy } from './strategies/split-strategy';
import { RecursiveTextStrategy } from './strategies/recursive-text.strategy';
import { MarkdownHeaderStrategy } from './strategies/markdown-header.strategy';
import { HtmlHeaderStrategy } from './strategies/html-header.strategy';
import { CodeStrategy } from './strategies/code.strategy';

@Injectable()
export class ChunkSplitterService {
  private readonly logger = new Logger(ChunkSplitterService.name);
  private readonly strategies: Record<DocumentFormatKind, SplitStrategy>;

  constructor(
    recursiveText: RecursiveTextStrategy,
    markdownHeader: MarkdownHeaderStrategy,
    htmlHeader: HtmlHeaderStrategy,
    code: CodeStrategy,
  ) {
    this.strategies = {
      text: recursiveText,
      pdf: recursiveText,
      markdown: markdownHeader,
      html: htmlHeader,
      code,
    };
  }

  async split(document: LoadedDocument): Promise<Chunk[]> {
    const strategy = this.strategies[document.format.kind];
    const sections = await strategy.split(document);

    const chunks = sections
      .filter((section) => section.content.trim().length > 0)
      .map((section, chunkIndex) => ({
        content: section.content,
        metadata: this.buildMetadata(document, section, chunkIndex),
      }));

    this.logger.log(
      `Created ${chunks.length} chunks from ${document.source} (${document.format.kind})`,
    );

    return chunks;
  }

  private buildMetadata(
    document: LoadedDocument,
    section: SplitSection,
    chunkIndex: number,
  ): ChunkMetadata {
    const metadata: ChunkMetadata = {
      source: document.source,
      format: document.format.kind,
      chunkIndex,
    };

    if (document.format.kind === 'code') {
      metadata.language = document.format.language;
    }
    if (section.headers && Object.keys(section.headers).length > 0) {
      metadata.headers = section.headers;
    }
    if (section.pageNumber !== undefined) {
      metadata.pageNumber = section.pageNumber;
    }

    return metadata;
  }
}
