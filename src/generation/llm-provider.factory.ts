/**
 * LLM Provider Factory
 * Creates the chat model for the configured provider (Ollama, OpenAI, Google,
 * Anthropic). Client-side retries are off: AnswerGeneratorService owns them.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EnvironmentVariables } from '../config/environment';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  createChatModel(): BaseChatModel {
    const selectedProvider = this.configService.get('LLM_PROVIDER', {
      infer: true,
    });

    this.logger.log(`Creating chat model for provider: ${selectedProvider}`);

    switch (selectedProvider) {
      case 'openai':
        return this.createOpenAIModel();
      case 'google':
        return this.createGoogleModel();
      case 'anthropic':
        return this.createAnthropicModel();
      case 'ollama':
        return this.createOllamaModel();
    }
  }

  private get temperature(): number {
    return this.configService.get('LLM_TEMPERATURE', { infer: true });
  }

  private createOpenAIModel(): ChatOpenAI {
    const apiKey = this.configService.get('OPENAI_API_KEY', { infer: true });
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    const baseURL = this.configService.get('OPENAI_BASE_URL', { infer: true });

    return new ChatOpenAI({
      model: this.configService.get('OPENAI_CHAT_MODEL', { infer: true }),
      temperature: this.temperature,
      maxRetries: 0,
      configuration: {
        apiKey,
        ...(baseURL && { baseURL }),
      },
    });
  }

  private createGoogleModel(): ChatGoogleGenerativeAI {
    const apiKey = this.configService.get('GOOGLE_API_KEY', { infer: true });
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google provider');
    }

    return new ChatGoogleGenerativeAI({
      model: this.configService.get('GOOGLE_CHAT_MODEL', { infer: true }),
      temperature: this.temperature,
      maxRetries: 0,
      apiKey,
    });
  }

  private createAnthropicModel(): ChatAnthropic {
    const apiKey = this.configService.get('ANTHROPIC_API_KEY', { infer: true });
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    return new ChatAnthropic({
      model: this.configService.get('ANTHROPIC_CHAT_MODEL', { infer: true }),
      temperature: this.temperature,
      maxRetries: 0,
      apiKey,
    });
  }

  private createOllamaModel(): ChatOllama {
    return new ChatOllama({
      model: this.configService.get('OLLAMA_CHAT_MODEL', { infer: true }),
      temperature: this.temperature,
      baseUrl: this.configService.get('OLLAMA_BASE_URL', { infer: true }),
      maxRetries: 0,
    });
  }
}
