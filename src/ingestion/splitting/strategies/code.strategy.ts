/**
 * Grammar-aware splitting for source files: LangChain's per-language
 * separators prefer class and function boundaries, and the chunk size and
 * overlap still bound every piece.
 */

import { Inject, Injectable } from '@nestjs/common';
import {
  RecursiveCharacterTextSplitter,
  SupportedTextSplitterLanguage,
} from '@langchain/textsplitters';
import { RAG_SETTINGS, RagSettings } from '../../../config/rag-settings';
import { DEFAULT_CODE_GRAMMAR } from '../../loader/document-format';
import type { LoadedDocument } from '../../types/document.types';
import type { SplitSection } from '../../types/chunk.types';
import type { SplitStrategy } from './split-strategy';

@Injectable()
export class CodeStrategy implements SplitStrategy {
  private readonly splitters = new Map<
    SupportedTextSplitterLanguage,
    RecursiveCharacterTextSplitter
  >();

  constructor(@Inject(RAG_SETTINGS) private readonly settings: RagSettings) {}

  async split(document: LoadedDocument): Promise<SplitSection[]> {
    const language =
      document.format.kind === 'code'
        ? document.format.language
        : DEFAULT_CODE_GRAMMAR;
    const splitter = this.splitterFor(language);

    const sections: SplitSection[] = [];
    for (const page of document.pages) {
      const parts = await splitter.splitText(page.content);
      sections.push(...parts.map((content) => ({ content })));
    }
    return sections;
  }

  private splitterFor(
    language: SupportedTextSplitterLanguage,
  ): RecursiveCharacterTextSplitter {
    let splitter = this.splitters.get(language);
    if (!splitter) {
      splitter = RecursiveCharacterTextSplitter.fromLanguage(language, {
        chunkSize: this.settings.chunking.chunkSize,
        chunkOverlap: this.settings.chunking.chunkOverlap,
      });
      this.splitters.set(language, splitter);
    }
    return splitter;
  }
}
