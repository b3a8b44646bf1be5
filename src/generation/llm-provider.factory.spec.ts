import { ConfigService } from '@nestjs/config';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import { LLMProviderFactory } from './llm-provider.factory';
import type { EnvironmentVariables } from '../config/environment';

function createFactory(
  values: Partial<EnvironmentVariables>,
): LLMProviderFactory {
  return new LLMProviderFactory(
    new ConfigService<EnvironmentVariables, true>({
      LLM_TEMPERATURE: 0.3,
      OLLAMA_CHAT_MODEL: 'phi3',
      OLLAMA_BASE_URL: 'http://localhost:11434',
      ANTHROPIC_CHAT_MODEL: 'claude-3-5-haiku-latest',
      ...values,
    }),
  );
}

describe('LLMProviderFactory', () => {
  it('builds the chat model for the configured provider', () => {
    const model = createFactory({ LLM_PROVIDER: 'ollama' }).createChatModel();

    expect(model).toBeInstanceOf(ChatOllama);
  });

  it('switches provider through LLM_PROVIDER alone', () => {
    const model = createFactory({
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_API_KEY: 'test-key',
    }).createChatModel();

    expect(model).toBeInstanceOf(ChatAnthropic);
  });

  it('requires an API key for hosted providers', () => {
    expect(() =>
      createFactory({ LLM_PROVIDER: 'openai' }).createChatModel(),
    ).toThrow('OPENAI_API_KEY is required for OpenAI provider');
  });
});
