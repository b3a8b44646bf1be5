import { RagError } from '../../shared/errors/rag-error';

export class PromptTemplateError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(`Invalid prompt template: ${message}`, 'PROMPT_TEMPLATE', false, originalError);
    this.name = 'PromptTemplateError';
  }
}
