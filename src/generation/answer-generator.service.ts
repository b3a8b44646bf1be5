/**
 * Answer Generator Service
 * Renders the prompt and asks the chat model for an answer. Model failures
 * never escape: they come back as a tagged generation-error answer.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import { toError } from '../shared/errors/rag-error';
import { withRetry } from '../shared/resilience/retry';
import { CHAT_MODEL } from './generation.constants';
import { PromptTemplateProvider } from './prompt-template.provider';

export const GENERATION_ERROR_PREFIX = '[generation-error] ';

export type GeneratedAnswer =
  | { kind: 'answer'; text: string }
  | { kind: 'generation-error'; text: string; cause: Error };

@Injectable()
export class AnswerGeneratorService {
  private readonly logger = new Logger(AnswerGeneratorService.name);

  constructor(
    @Inject(CHAT_MODEL) private readonly chatModel: BaseChatModel,
    private readonly promptTemplate: PromptTemplateProvider,
    @Inject(RAG_SETTINGS) private readonly settings: RagSettings,
  ) {}

  async generate(question: string, context: string): Promise<GeneratedAnswer> {
    const startTime = Date.now();

    try {
      const prompt = await this.promptTemplate.render({ context, question });
      const { resilience } = this.settings;

      const message = await withRetry(
        (signal) => this.chatModel.invoke(prompt, { signal }),
        {
          operation: 'Answer generation',
          maxAttempts: resilience.maxAttempts,
          retryDelayMs: resilience.retryDelayMs,
          timeoutMs: resilience.llmTimeoutMs,
          logger: this.logger,
        },
      );

      this.logger.log(
        `Answer generated in ${Date.now() - startTime}ms (context: ${context.length} chars)`,
      );

      return { kind: 'answer', text: message.text };
    } catch (error) {
      const cause = toError(error);
      this.logger.error(
        `Answer generation failed: ${cause.message}`,
        cause.stack,
      );

      return {
        kind: 'generation-error',
        text: `${GENERATION_ERROR_PREFIX}${cause.message}`,
        cause,
      };
    }
  }
}
