/**
 * Embedding Errors
 */

import { RagError } from '../../shared/errors/rag-error';

/** The model could not be created or did not answer the dimension probe */
export class EmbeddingInitializationError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      `Embedding model initialization failed: ${message}`,
      'EMBEDDING_INIT',
      false,
      originalError,
    );
    this.name = 'EmbeddingInitializationError';
  }
}

export class EmbeddingRequestError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      `Embedding request failed: ${message}`,
      'EMBEDDING_REQUEST',
      true,
      originalError,
    );
    this.name = 'EmbeddingRequestError';
  }
}
