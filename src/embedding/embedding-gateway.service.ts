/**
 * Embedding Gateway Service
 * The only way into the embedding model: one lazily created model instance,
 * batched requests, and timeout + retry around every call.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import { toError } from '../shared/errors/rag-error';
import { withRetry } from '../shared/resilience/retry';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import {
  EmbeddingInitializationError,
  EmbeddingRequestError,
} from './errors/embedding-errors';

const DIMENSION_PROBE = 'dimension probe';

@Injectable()
export class EmbeddingGatewayService {
  private readonly logger = new Logger(EmbeddingGatewayService.name);

  private model: Embeddings | null = null;
  private dimension: number | null = null;

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    @Inject(RAG_SETTINGS) private readonly settings: RagSettings,
  ) {}

  /**
   * Create the model and probe it once for its vector dimension.
   * @throws EmbeddingInitializationError
   */
  async initialize(): Promise<number> {
    if (this.dimension !== null) {
      return this.dimension;
    }

    const model = this.getModel();

    let probe: number[];
    try {
      probe = await this.call('Embedding dimension probe', () =>
        model.embedQuery(DIMENSION_PROBE),
      );
    } catch (error) {
      const cause = toError(error);
      throw new EmbeddingInitializationError(cause.message, cause);
    }

    if (probe.length === 0) {
      throw new EmbeddingInitializationError('model returned an empty vector');
    }

    this.dimension = probe.length;
    this.logger.log(`Embedding model ready (${this.dimension}D)`);

    return this.dimension;
  }

  /**
   * @throws EmbeddingRequestError once retries are exhausted
   */
  async embed(text: string): Promise<number[]> {
    const model = this.getModel();

    try {
      return await this.call('Query embedding', () => model.embedQuery(text));
    } catch (error) {
      const cause = toError(error);
      throw new EmbeddingRequestError(cause.message, cause);
    }
  }

  /**
   * Embed texts in batches of `embeddingBatchSize`; output order matches input.
   * @throws EmbeddingRequestError once retries are exhausted for any batch
   */
  async embedMany(texts: readonly string[]): Promise<number[][]> {
    const model = this.getModel();
    const batchSize = Math.max(1, this.settings.embeddingBatchSize);
    const totalBatches = Math.ceil(texts.length / batchSize);
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const batchNum = start / batchSize + 1;

      let batchVectors: number[][];
      try {
        batchVectors = await this.call(
          `Embedding batch ${batchNum}/${totalBatches}`,
          () => model.embedDocuments(batch),
        );
      } catch (error) {
        const cause = toError(error);
        throw new EmbeddingRequestError(cause.message, cause);
      }

      if (batchVectors.length !== batch.length) {
        throw new EmbeddingRequestError(
          `expected ${batch.length} vectors in batch ${batchNum}, got ${batchVectors.length}`,
        );
      }

      vectors.push(...batchVectors);
      this.logger.debug(
        `Embedded batch ${batchNum}/${totalBatches} (${batch.length} texts)`,
      );
    }

    return vectors;
  }

  private getModel(): Embeddings {
    if (this.model) {
      return this.model;
    }

    try {
      this.model = this.embeddingProviderFactory.createEmbeddingModel();
    } catch (error) {
      const cause = toError(error);
      throw new EmbeddingInitializationError(cause.message, cause);
    }

    return this.model;
  }

  /**
   * LangChain's Embeddings API takes no abort signal, so a request that
   * times out is abandoned rather than cancelled and may still finish on
   * the model server while the retry runs.
   */
  private call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    const { resilience } = this.settings;

    return withRetry(task, {
      operation,
      maxAttempts: resilience.maxAttempts,
      retryDelayMs: resilience.retryDelayMs,
      timeoutMs: resilience.embeddingTimeoutMs,
      logger: this.logger,
    });
  }
}
