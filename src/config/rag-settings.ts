import { ConfigService } from '@nestjs/config';
import type { EnvironmentVariables, VectorDistance } from './environment';

export const RAG_SETTINGS = 'RAG_SETTINGS';

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalSettings {
  topK: number;
  /** Candidates are accepted only when `distance < similarityThreshold`. */
  similarityThreshold: number;
}

export interface VectorIndexSettings {
  url: string;
  apiKey?: string;
  collection: string;
  distance: VectorDistance;
  insertBatchSize: number;
}

export interface ResilienceSettings {
  maxAttempts: number;
  retryDelayMs: number;
  embeddingTimeoutMs: number;
  llmTimeoutMs: number;
  vectorIndexTimeoutMs: number;
}

/**
 * Process-wide settings shared by every request handler and batch job.
 */
export interface RagSettings {
  sourceDirectory: string;
  chunking: ChunkingSettings;
  retrieval: RetrievalSettings;
  vectorIndex: VectorIndexSettings;
  embeddingBatchSize: number;
  promptTemplateFile?: string;
  resilience: ResilienceSettings;
}

export function buildRagSettings(
  config: ConfigService<EnvironmentVariables, true>,
): RagSettings {
  return {
    sourceDirectory: config.get('SOURCE_DIRECTORY', { infer: true }),
    chunking: {
      chunkSize: config.get('CHUNK_SIZE', { infer: true }),
      chunkOverlap: config.get('CHUNK_OVERLAP', { infer: true }),
    },
    retrieval: {
      topK: config.get('RETRIEVAL_TOP_K', { infer: true }),
      similarityThreshold: config.get('SIMILARITY_SCORE_THRESHOLD', {
        infer: true,
      }),
    },
    vectorIndex: {
      url: config.get('QDRANT_URL', { infer: true }),
      apiKey: config.get('QDRANT_API_KEY', { infer: true }),
      collection: config.get('QDRANT_COLLECTION', { infer: true }),
      distance: config.get('VECTOR_DISTANCE', { infer: true }),
      insertBatchSize: config.get('INSERT_BATCH_SIZE', { infer: true }),
    },
    embeddingBatchSize: config.get('EMBEDDING_BATCH_SIZE', { infer: true }),
    promptTemplateFile: config.get('PROMPT_TEMPLATE_FILE', { infer: true }),
    resilience: {
      maxAttempts: config.get('MAX_ATTEMPTS', { infer: true }),
      retryDelayMs: config.get('RETRY_DELAY_MS', { infer: true }),
      embeddingTimeoutMs: config.get('EMBEDDING_TIMEOUT_MS', { infer: true }),
      llmTimeoutMs: config.get('LLM_TIMEOUT_MS', { infer: true }),
      vectorIndexTimeoutMs: config.get('VECTOR_INDEX_TIMEOUT_MS', {
        infer: true,
      }),
    },
  };
}
