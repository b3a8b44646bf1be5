/**
 * Environment Variables
 * Validated once at startup by ConfigModule; defaults live on the class.
 */

import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export const LLM_PROVIDERS = ['ollama', 'openai', 'google', 'anthropic'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const VECTOR_DISTANCES = ['Cosine', 'Euclid', 'Dot'] as const;
export type VectorDistance = (typeof VECTOR_DISTANCES)[number];

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsString()
  HOST: string = '127.0.0.1';

  @IsString()
  SOURCE_DIRECTORY: string = 'data';

  // Chunking
  @IsInt()
  @Min(1)
  CHUNK_SIZE: number = 1000;

  @IsInt()
  @Min(0)
  CHUNK_OVERLAP: number = 200;

  // Retrieval
  @IsNumber()
  SIMILARITY_SCORE_THRESHOLD: number = 0.7;

  @IsInt()
  @Min(1)
  @Max(100)
  RETRIEVAL_TOP_K: number = 10;

  // Embeddings
  @IsIn(EMBEDDING_PROVIDERS)
  EMBEDDING_PROVIDER: EmbeddingProvider = 'ollama';

  @IsString()
  OLLAMA_EMBEDDING_MODEL: string = 'mxbai-embed-large';

  @IsString()
  OPENAI_EMBEDDING_MODEL: string = 'text-embedding-3-small';

  @IsString()
  GOOGLE_EMBEDDING_MODEL: string = 'text-embedding-004';

  @IsInt()
  @Min(1)
  EMBEDDING_BATCH_SIZE: number = 24;

  // Chat model
  @IsIn(LLM_PROVIDERS)
  LLM_PROVIDER: LLMProvider = 'ollama';

  @IsString()
  OLLAMA_CHAT_MODEL: string = 'phi3';

  @IsString()
  OPENAI_CHAT_MODEL: string = 'gpt-4o-mini';

  @IsString()
  GOOGLE_CHAT_MODEL: string = 'gemini-2.5-flash-lite';

  @IsString()
  ANTHROPIC_CHAT_MODEL: string = 'claude-3-5-haiku-latest';

  @IsNumber()
  @Min(0)
  @Max(2)
  LLM_TEMPERATURE: number = 0.3;

  @IsUrl({ require_tld: false })
  OLLAMA_BASE_URL: string = 'http://localhost:11434';

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string;

  @IsOptional()
  @IsString()
  GOOGLE_API_KEY?: string;

  @IsOptional()
  @IsString()
  ANTHROPIC_API_KEY?: string;

  @IsOptional()
  @IsString()
  PROMPT_TEMPLATE_FILE?: string;

  // Vector index
  @IsUrl({ require_tld: false })
  QDRANT_URL: string = 'http://localhost:6333';

  @IsOptional()
  @IsString()
  QDRANT_API_KEY?: string;

  @IsString()
  QDRANT_COLLECTION: string = 'knowledge_chunks';

  @IsIn(VECTOR_DISTANCES)
  VECTOR_DISTANCE: VectorDistance = 'Cosine';

  @IsInt()
  @Min(1)
  INSERT_BATCH_SIZE: number = 100;

  // Timeouts and retries around every external call
  @IsInt()
  @Min(1)
  EMBEDDING_TIMEOUT_MS: number = 60000;

  @IsInt()
  @Min(1)
  LLM_TIMEOUT_MS: number = 120000;

  @IsInt()
  @Min(1)
  VECTOR_INDEX_TIMEOUT_MS: number = 30000;

  @IsInt()
  @Min(1)
  @Max(10)
  MAX_ATTEMPTS: number = 3;

  @IsInt()
  @Min(0)
  RETRY_DELAY_MS: number = 1000;

  // HTTP
  @IsString()
  CORS_ORIGIN_REGEX: string = '^http://127\\.0\\.0\\.1:\\d+$';
}

/**
 * ConfigModule `validate` hook.
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  if (validated.CHUNK_OVERLAP >= validated.CHUNK_SIZE) {
    throw new Error(
      `Invalid environment configuration: CHUNK_OVERLAP (${validated.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${validated.CHUNK_SIZE})`,
    );
  }

  return validated;
}
