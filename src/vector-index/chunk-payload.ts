/**
 * Chunk <-> Qdrant payload mapping. Payload fields are flat so they can be
 * filtered on directly in Qdrant.
 */

import { DOCUMENT_FORMAT_KINDS } from '../ingestion/loader/document-format';
import type { DocumentFormatKind } from '../ingestion/loader/document-format';
import { HEADER_KEYS } from '../ingestion/types/chunk.types';
import type {
  Chunk,
  ChunkMetadata,
  HeaderTrail,
} from '../ingestion/types/chunk.types';

export type ChunkPayload = Record<string, unknown>;

export function toPayload(chunk: Chunk): ChunkPayload {
  const { metadata } = chunk;

  return {
    content: chunk.content,
    source: metadata.source,
    format: metadata.format,
    chunkIndex: metadata.chunkIndex,
    ...(metadata.language !== undefined && { language: metadata.language }),
    ...(metadata.headers !== undefined && { headers: metadata.headers }),
    ...(metadata.pageNumber !== undefined && {
      pageNumber: metadata.pageNumber,
    }),
  };
}

/**
 * @returns the chunk, or null when the payload was not written by toPayload
 */
export function fromPayload(payload: unknown): Chunk | null {
  if (!isRecord(payload)) {
    return null;
  }

  const { content, source, format, chunkIndex, language, headers, pageNumber } =
    payload;

  if (
    typeof content !== 'string' ||
    typeof source !== 'string' ||
    !isFormatKind(format) ||
    typeof chunkIndex !== 'number'
  ) {
    return null;
  }

  const metadata: ChunkMetadata = { source, format, chunkIndex };

  if (typeof language === 'string') {
    metadata.language = language;
  }
  const trail = parseHeaders(headers);
  if (trail) {
    metadata.headers = trail;
  }
  if (typeof pageNumber === 'number') {
    metadata.pageNumber = pageNumber;
  }

  return { content, metadata };
}

function parseHeaders(value: unknown): HeaderTrail | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const trail: HeaderTrail = {};
  for (const key of HEADER_KEYS) {
    const title = value[key];
    if (typeof title === 'string') {
      trail[key] = title;
    }
  }

  return Object.keys(trail).length > 0 ? trail : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFormatKind(value: unknown): value is DocumentFormatKind {
  return DOCUMENT_FORMAT_KINDS.some((kind) => kind === value);
}
