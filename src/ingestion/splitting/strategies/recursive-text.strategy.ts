/**
 * Character-count splitting for formats without reliable structure
 * (plain text, text extracted from PDF pages).
 */

import { Inject, Injectable } from '@nestjs/common';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { RAG_SETTINGS, RagSettings } from '../../../config/rag-settings';
import type { LoadedDocument } from '../../types/document.types';
import type { SplitSection } from '../../types/chunk.types';
import type { SplitStrategy } from './split-strategy';

@Injectable()
export class RecursiveTextStrategy implements SplitStrategy {
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(@Inject(RAG_SETTINGS) settings: RagSettings) {
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: settings.chunking.chunkSize,
      chunkOverlap: settings.chunking.chunkOverlap,
    });
  }

  async split(document: LoadedDocument): Promise<SplitSection[]> {
    const sections: SplitSection[] = [];

    // Pages are split one at a time so every chunk keeps its page number
    for (const page of document.pages) {
      const parts = await this.splitter.splitText(page.content);
      sections.push(
        ...parts.map((content) => ({ content, pageNumber: page.pageNumber })),
      );
    }

    return sections;
  }
}
