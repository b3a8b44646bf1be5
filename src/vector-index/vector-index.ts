/**
 * Vector Index
 * Storage and similarity search over embedded chunks. Used as the Nest
 * injection token; QdrantVectorIndex is the production implementation.
 */

import type { Chunk, ChunkMetadata } from '../ingestion/types/chunk.types';

export interface IndexEntry {
  content: string;
  metadata: ChunkMetadata;
  vector: number[];
}

export interface ScoredChunk extends Chunk {
  /** Lower is more similar, whatever the underlying metric */
  distance: number;
}

export interface StoredChunk extends Chunk {
  id: string;
}

export abstract class VectorIndex {
  /** Create the collection for vectors of `dimension` when it is missing */
  abstract ensureCollection(dimension: number): Promise<void>;

  /** @returns number of entries written */
  abstract insert(entries: readonly IndexEntry[]): Promise<number>;

  /**
   * Embed `query` and return at most `k` chunks, most similar first.
   * An index that has never been written to returns no results.
   */
  abstract similaritySearch(query: string, k: number): Promise<ScoredChunk[]>;

  abstract listAll(): Promise<StoredChunk[]>;

  abstract count(): Promise<number>;
}
