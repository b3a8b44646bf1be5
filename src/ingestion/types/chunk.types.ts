/**
 * Chunk Types
 * Chunks are created once at ingestion and never mutated afterwards.
 */

import type { DocumentFormatKind } from '../loader/document-format';

export const HEADER_KEYS = ['H1', 'H2', 'H3'] as const;
export type HeaderKey = (typeof HEADER_KEYS)[number];

/** Headings (levels 1-3) a chunk falls under, outermost first */
export type HeaderTrail = Partial<Record<HeaderKey, string>>;

export interface ChunkMetadata {
  source: string;
  format: DocumentFormatKind;
  /** Position among the chunks of the same document, from 0 */
  chunkIndex: number;
  language?: string;
  headers?: HeaderTrail;
  pageNumber?: number;
}

export interface Chunk {
  content: string;
  metadata: ChunkMetadata;
}

/**
 * What a split strategy produces before the splitter stamps source, format
 * and position onto it.
 */
export interface SplitSection {
  content: string;
  headers?: HeaderTrail;
  pageNumber?: number;
}
