/**
 * Ingestion Module
 * Loader, splitter and the batch job that feeds the vector index.
 */

import { Module } from '@nestjs/common';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { DocumentLoaderService } from './loader/document-loader.service';
import { PdfParser } from './loader/parsers/pdf.parser';
import { TextParser } from './loader/parsers/text.parser';
import { ChunkSplitterService } from './splitting/chunk-splitter.service';
import { RecursiveTextStrategy } from './splitting/strategies/recursive-text.strategy';
import { MarkdownHeaderStrategy } from './splitting/strategies/markdown-header.strategy';
import { HtmlHeaderStrategy } from './splitting/strategies/html-header.strategy';
import { CodeStrategy } from './splitting/strategies/code.strategy';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [VectorIndexModule],
  providers: [
    PdfParser,
    TextParser,
    DocumentLoaderService,
    RecursiveTextStrategy,
    MarkdownHeaderStrategy,
    HtmlHeaderStrategy,
    CodeStrategy,
    ChunkSplitterService,
    IngestionService,
  ],
  exports: [IngestionService],
})
export class IngestionModule {}
