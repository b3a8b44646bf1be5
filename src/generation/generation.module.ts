/**
 * Generation Module
 */

import { Module } from '@nestjs/common';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { LLMProviderFactory } from './llm-provider.factory';
import { PromptTemplateProvider } from './prompt-template.provider';
import { AnswerGeneratorService } from './answer-generator.service';
import { CHAT_MODEL } from './generation.constants';

@Module({
  providers: [
    LLMProviderFactory,
    {
      provide: CHAT_MODEL,
      useFactory: (factory: LLMProviderFactory): BaseChatModel =>
        factory.createChatModel(),
      inject: [LLMProviderFactory],
    },
    PromptTemplateProvider,
    AnswerGeneratorService,
  ],
  exports: [AnswerGeneratorService],
})
export class GenerationModule {}
