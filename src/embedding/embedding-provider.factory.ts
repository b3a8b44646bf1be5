/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type {
  EmbeddingProvider,
  EnvironmentVariables,
} from '../config/environment';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const provider = this.getProvider();
    const model = this.getModel(provider);

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  getProvider(): EmbeddingProvider {
    return this.configService.get('EMBEDDING_PROVIDER', { infer: true });
  }

  getModel(provider: EmbeddingProvider): string {
    switch (provider) {
      case 'ollama':
        return this.configService.get('OLLAMA_EMBEDDING_MODEL', { infer: true });
      case 'openai':
        return this.configService.get('OPENAI_EMBEDDING_MODEL', { infer: true });
      case 'google':
        return this.configService.get('GOOGLE_EMBEDDING_MODEL', { infer: true });
    }
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    return new OllamaEmbeddings({
      model,
      baseUrl: this.configService.get('OLLAMA_BASE_URL', { infer: true }),
      maxRetries: 0,
    });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get('OPENAI_API_KEY', { infer: true });

    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    const baseURL = this.configService.get('OPENAI_BASE_URL', { infer: true });

    return new OpenAIEmbeddings({
      model,
      apiKey,
      maxRetries: 0,
      ...(baseURL ? { configuration: { baseURL } } : {}),
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get('GOOGLE_API_KEY', { infer: true });

    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
      maxRetries: 0,
    });
  }
}
