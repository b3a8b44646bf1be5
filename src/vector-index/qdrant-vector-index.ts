/**
 * Qdrant Vector Index
 * One collection with a single unnamed dense vector per chunk. Qdrant scores
 * are turned into distances so that lower always means more similar.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { QdrantClient } from '@qdrant/js-client-rest';
import { v4 as uuidv4 } from 'uuid';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import type { VectorDistance } from '../config/environment';
import { EmbeddingGatewayService } from '../embedding/embedding-gateway.service';
import { toError } from '../shared/errors/rag-error';
import { withRetry } from '../shared/resilience/retry';
import { fromPayload, toPayload } from './chunk-payload';
import { VectorIndexUnavailableError } from './errors/vector-index-errors';
import { QDRANT_CLIENT } from './vector-index.constants';
import {
  IndexEntry,
  ScoredChunk,
  StoredChunk,
  VectorIndex,
} from './vector-index';

/** The client calls this index makes */
export type QdrantCollectionClient = Pick<
  QdrantClient,
  'collectionExists' | 'createCollection' | 'upsert' | 'query' | 'scroll' | 'count'
>;

const SCROLL_PAGE_SIZE = 256;

/**
 * Distances are on the squared Euclidean scale, so the similarity threshold
 * reads the same whichever metric the collection uses. Qdrant stores Cosine
 * vectors normalised, where |a - b|^2 = 2 * (1 - cos); Euclid reports the
 * plain distance; Dot has no bounded scale and is only negated.
 */
export function scoreToDistance(
  score: number,
  distance: VectorDistance,
): number {
  switch (distance) {
    case 'Cosine':
      return 2 * (1 - score);
    case 'Dot':
      return -score;
    case 'Euclid':
      return score * score;
  }
}

/** Qdrant answers 404 for operations on a collection that does not exist */
export function isCollectionNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    error.status === 404
  );
}

@Injectable()
export class QdrantVectorIndex extends VectorIndex {
  private readonly logger = new Logger(QdrantVectorIndex.name);

  constructor(
    @Inject(QDRANT_CLIENT) private readonly client: QdrantCollectionClient,
    private readonly embeddingGateway: EmbeddingGatewayService,
    @Inject(RAG_SETTINGS) private readonly settings: RagSettings,
  ) {
    super();
  }

  private get collection(): string {
    return this.settings.vectorIndex.collection;
  }

  async ensureCollection(dimension: number): Promise<void> {
    const { exists } = await this.call('Collection lookup', () =>
      this.client.collectionExists(this.collection),
    );

    if (exists) {
      this.logger.log(`Collection "${this.collection}" already exists`);
      return;
    }

    this.logger.log(
      `Creating collection "${this.collection}" (${dimension}D, ${this.settings.vectorIndex.distance})`,
    );

    await this.call('Collection creation', () =>
      this.client.createCollection(this.collection, {
        vectors: {
          size: dimension,
          distance: this.settings.vectorIndex.distance,
        },
      }),
    );
  }

  async insert(entries: readonly IndexEntry[]): Promise<number> {
    const batchSize = Math.max(1, this.settings.vectorIndex.insertBatchSize);
    const totalBatches = Math.ceil(entries.length / batchSize);
    let inserted = 0;

    for (let start = 0; start < entries.length; start += batchSize) {
      const batch = entries.slice(start, start + batchSize);
      const batchNum = start / batchSize + 1;

      const points = batch.map((entry) => ({
        id: uuidv4(),
        vector: entry.vector,
        payload: toPayload(entry),
      }));

      await this.call(`Upsert batch ${batchNum}/${totalBatches}`, () =>
        this.client.upsert(this.collection, { wait: true, points }),
      );

      inserted += batch.length;
      this.logger.log(
        `Upserted batch ${batchNum}/${totalBatches} (${inserted}/${entries.length} chunks)`,
      );
    }

    return inserted;
  }

  async similaritySearch(query: string, k: number): Promise<ScoredChunk[]> {
    const vector = await this.embeddingGateway.embed(query);

    let response: Awaited<ReturnType<QdrantCollectionClient['query']>>;
    try {
      response = await this.call('Similarity search', () =>
        this.client.query(this.collection, {
          query: vector,
          limit: k,
          with_payload: true,
        }),
      );
    } catch (error) {
      if (isCollectionNotFound(this.unwrap(error))) {
        this.logger.warn(
          `Collection "${this.collection}" does not exist yet; nothing has been ingested`,
        );
        return [];
      }
      throw error;
    }

    const results: ScoredChunk[] = [];
    for (const point of response.points) {
      const chunk = fromPayload(point.payload);
      if (!chunk) {
        this.logger.warn(`Skipping point ${point.id} with an unreadable payload`);
        continue;
      }
      results.push({
        ...chunk,
        distance: scoreToDistance(point.score, this.settings.vectorIndex.distance),
      });
    }

    return results.sort((a, b) => a.distance - b.distance);
  }

  async listAll(): Promise<StoredChunk[]> {
    const chunks: StoredChunk[] = [];
    let offset: string | number | undefined;

    try {
      do {
        const page = await this.call('Scroll', () =>
          this.client.scroll(this.collection, {
            limit: SCROLL_PAGE_SIZE,
            offset,
            with_payload: true,
            with_vector: false,
          }),
        );

        for (const point of page.points) {
          const chunk = fromPayload(point.payload);
          if (chunk) {
            chunks.push({ id: String(point.id), ...chunk });
          }
        }

        const next = page.next_page_offset;
        offset =
          typeof next === 'string' || typeof next === 'number' ? next : undefined;
      } while (offset !== undefined);
    } catch (error) {
      if (isCollectionNotFound(this.unwrap(error))) {
        return [];
      }
      throw error;
    }

    return chunks;
  }

  async count(): Promise<number> {
    try {
      const { count } = await this.call('Count', () =>
        this.client.count(this.collection, { exact: true }),
      );
      return count;
    } catch (error) {
      if (isCollectionNotFound(this.unwrap(error))) {
        return 0;
      }
      throw error;
    }
  }

  /**
   * Timeout + retry around a client call. A missing collection is not
   * retried; every other exhausted failure becomes VectorIndexUnavailableError.
   */
  private async call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    const { resilience } = this.settings;

    try {
      return await withRetry(task, {
        operation,
        maxAttempts: resilience.maxAttempts,
        retryDelayMs: resilience.retryDelayMs,
        timeoutMs: resilience.vectorIndexTimeoutMs,
        logger: this.logger,
        isRetryable: (error) => !isCollectionNotFound(error),
      });
    } catch (error) {
      const cause = toError(error);
      throw new VectorIndexUnavailableError(
        `${operation} failed: ${cause.message}`,
        cause,
      );
    }
  }

  private unwrap(error: unknown): unknown {
    return error instanceof VectorIndexUnavailableError
      ? error.originalError
      : error;
  }
}
