/**
 * Ingestion Service
 * Offline batch job: load and split every file under the source directory,
 * embed all chunks, then write them to the vector index.
 *
 * Per-file problems skip that file. Anything that would leave the index
 * holding chunks without embeddings aborts the run before the first write.
 */

import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingGatewayService } from '../embedding/embedding-gateway.service';
import { toError } from '../shared/errors/rag-error';
import { IndexEntry, VectorIndex } from '../vector-index/vector-index';
import { extensionOf } from './loader/document-format';
import { DocumentLoaderService } from './loader/document-loader.service';
import { ChunkSplitterService } from './splitting/chunk-splitter.service';
import { EmptyFileError, IngestionError } from './errors/ingestion-errors';
import type { Chunk } from './types/chunk.types';

export interface IngestionReport {
  filesSeen: number;
  filesIngested: number;
  /** Unsupported extensions and files with no text */
  filesSkipped: number;
  /** Files that could not be read or split */
  filesFailed: number;
  chunksWritten: number;
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly documentLoader: DocumentLoaderService,
    private readonly chunkSplitter: ChunkSplitterService,
    private readonly embeddingGateway: EmbeddingGatewayService,
    private readonly vectorIndex: VectorIndex,
  ) {}

  /**
   * @throws EmbeddingInitializationError or EmbeddingRequestError (nothing
   * has been written when either is thrown)
   * @throws VectorIndexUnavailableError
   */
  async run(sourceDirectory: string): Promise<IngestionReport> {
    const startTime = Date.now();
    const files = await this.documentLoader.listFiles(sourceDirectory);

    const report: IngestionReport = {
      filesSeen: files.length,
      filesIngested: 0,
      filesSkipped: 0,
      filesFailed: 0,
      chunksWritten: 0,
    };

    this.logger.log(`Found ${files.length} files under ${sourceDirectory}`);

    const chunks: Chunk[] = [];
    for (const file of files) {
      const fileChunks = await this.processFile(file, report);
      chunks.push(...fileChunks);
    }

    if (chunks.length === 0) {
      this.logger.warn(
        `No chunks produced from ${sourceDirectory}; nothing to index`,
      );
      return report;
    }

    const dimension = await this.embeddingGateway.initialize();

    this.logger.log(`Embedding ${chunks.length} chunks...`);
    const vectors = await this.embeddingGateway.embedMany(
      chunks.map((chunk) => chunk.content),
    );

    const entries: IndexEntry[] = chunks.map((chunk, i) => ({
      content: chunk.content,
      metadata: chunk.metadata,
      vector: vectors[i],
    }));

    await this.vectorIndex.ensureCollection(dimension);
    report.chunksWritten = await this.vectorIndex.insert(entries);

    this.logger.log(
      `Ingestion completed in ${Date.now() - startTime}ms: ` +
        `${report.filesIngested}/${report.filesSeen} files ingested, ` +
        `${report.filesSkipped} skipped, ${report.filesFailed} failed, ` +
        `${report.chunksWritten} chunks written`,
    );

    return report;
  }

  private async processFile(
    file: string,
    report: IngestionReport,
  ): Promise<Chunk[]> {
    const format = this.documentLoader.detectFormat(file);
    if (!format) {
      this.logger.warn(
        `Skipping ${file}: unsupported extension ${extensionOf(file) || '(none)'}`,
      );
      report.filesSkipped++;
      return [];
    }

    try {
      const document = await this.documentLoader.load(file, format);
      const chunks = await this.chunkSplitter.split(document);
      report.filesIngested++;
      return chunks;
    } catch (error) {
      if (error instanceof EmptyFileError) {
        this.logger.warn(`Skipping ${file}: ${error.message}`);
        report.filesSkipped++;
        return [];
      }

      const cause = toError(error);
      const code = error instanceof IngestionError ? error.code : 'UNKNOWN';
      this.logger.error(`Failed to ingest ${file} [${code}]: ${cause.message}`);
      report.filesFailed++;
      return [];
    }
  }
}
