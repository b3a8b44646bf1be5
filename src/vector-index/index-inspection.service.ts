/**
 * Index Inspection Service
 * Dumps every stored chunk with its metadata, for checking what an ingestion
 * run actually wrote.
 */

import { Injectable, Logger } from '@nestjs/common';
import { HEADER_KEYS } from '../ingestion/types/chunk.types';
import { StoredChunk, VectorIndex } from './vector-index';

export function formatChunkListing(chunk: StoredChunk): string {
  const { metadata } = chunk;
  const fields = [
    `source=${metadata.source}`,
    `format=${metadata.format}`,
    `chunk=${metadata.chunkIndex}`,
  ];

  if (metadata.language) {
    fields.push(`language=${metadata.language}`);
  }
  if (metadata.headers) {
    const { headers } = metadata;
    const path = HEADER_KEYS.map((key) => headers[key]).filter(
      (title): title is string => title !== undefined,
    );
    fields.push(`headers=${path.join(' > ')}`);
  }
  if (metadata.pageNumber !== undefined) {
    fields.push(`page=${metadata.pageNumber}`);
  }

  return `${chunk.id} ${fields.join(' ')}\n${chunk.content}`;
}

@Injectable()
export class IndexInspectionService {
  private readonly logger = new Logger(IndexInspectionService.name);

  constructor(private readonly vectorIndex: VectorIndex) {}

  /** @returns number of chunks printed */
  async printAll(): Promise<number> {
    const chunks = await this.vectorIndex.listAll();

    if (chunks.length === 0) {
      this.logger.warn('The index holds no chunks');
      return 0;
    }

    for (const chunk of chunks) {
      this.logger.log(formatChunkListing(chunk));
    }
    this.logger.log(`Listed ${chunks.length} chunks`);

    return chunks.length;
  }
}
