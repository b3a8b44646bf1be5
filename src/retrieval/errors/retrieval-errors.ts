import { RagError } from '../../shared/errors/rag-error';

/** The index could not be searched; the question cannot be answered */
export class RetrievalError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(`Retrieval failed: ${message}`, 'RETRIEVAL_FAILED', true, originalError);
    this.name = 'RetrievalError';
  }
}
