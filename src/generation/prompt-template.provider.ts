/**
 * Prompt Template Provider
 * Loads the answer prompt once at startup (built in, or PROMPT_TEMPLATE_FILE)
 * and refuses to start when its placeholders are not exactly
 * {context} and {question}.
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { PromptTemplate } from '@langchain/core/prompts';
import * as fs from 'fs/promises';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import { toError } from '../shared/errors/rag-error';
import { PromptTemplateError } from './errors/generation-errors';

export const DEFAULT_PROMPT_TEMPLATE = `You are an assistant that answers questions about a document collection.
Answer the question using only the context below. If the context is empty or
does not contain the answer, tell the user that the documents do not cover
the question instead of guessing.

Context:
{context}

Question: {question}

Answer:`;

export const PROMPT_VARIABLES = ['context', 'question'] as const;

export interface PromptValues {
  context: string;
  question: string;
}

/**
 * @throws PromptTemplateError when the text cannot be parsed or its
 * placeholders differ from PROMPT_VARIABLES
 */
export function compilePromptTemplate(text: string): PromptTemplate {
  let template: PromptTemplate;
  try {
    template = PromptTemplate.fromTemplate(text);
  } catch (error) {
    const cause = toError(error);
    throw new PromptTemplateError(cause.message, cause);
  }

  const variables = [...template.inputVariables].sort();
  const expected = [...PROMPT_VARIABLES];
  if (
    variables.length !== expected.length ||
    variables.some((name, i) => name !== expected[i])
  ) {
    throw new PromptTemplateError(
      `expected placeholders {context} and {question}, found ${
        variables.length > 0 ? variables.map((v) => `{${v}}`).join(', ') : 'none'
      }`,
    );
  }

  return template;
}

@Injectable()
export class PromptTemplateProvider implements OnModuleInit {
  private readonly logger = new Logger(PromptTemplateProvider.name);
  private template: PromptTemplate | null = null;

  constructor(@Inject(RAG_SETTINGS) private readonly settings: RagSettings) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<PromptTemplate> {
    const file = this.settings.promptTemplateFile;
    let text = DEFAULT_PROMPT_TEMPLATE;

    if (file) {
      try {
        text = await fs.readFile(file, 'utf-8');
      } catch (error) {
        const cause = toError(error);
        throw new PromptTemplateError(
          `cannot read ${file}: ${cause.message}`,
          cause,
        );
      }
    }

    this.template = compilePromptTemplate(text);
    this.logger.log(
      `Prompt template loaded from ${file ?? 'built-in default'}`,
    );

    return this.template;
  }

  async render(values: PromptValues): Promise<string> {
    const template = this.template ?? (await this.load());
    return template.format(values);
  }
}
