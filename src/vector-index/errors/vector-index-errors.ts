import { RagError } from '../../shared/errors/rag-error';

export class VectorIndexUnavailableError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      `Vector index unavailable: ${message}`,
      'VECTOR_INDEX_UNAVAILABLE',
      true,
      originalError,
    );
    this.name = 'VectorIndexUnavailableError';
  }
}
