import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_PROMPT_TEMPLATE,
  PromptTemplateProvider,
  compilePromptTemplate,
} from './prompt-template.provider';
import { PromptTemplateError } from './errors/generation-errors';
import { createTestSettings } from '../../test/fakes/test-settings';

describe('compilePromptTemplate', () => {
  it('accepts the built-in template', () => {
    const template = compilePromptTemplate(DEFAULT_PROMPT_TEMPLATE);

    expect([...template.inputVariables].sort()).toEqual(['context', 'question']);
  });

  it('rejects a template without {context}', () => {
    expect(() => compilePromptTemplate('Question: {question}')).toThrow(
      new PromptTemplateError(
        'expected placeholders {context} and {question}, found {question}',
      ),
    );
  });

  it('rejects an extra placeholder', () => {
    expect(() =>
      compilePromptTemplate('{context} {question} {language}'),
    ).toThrow(
      new PromptTemplateError(
        'expected placeholders {context} and {question}, found {context}, {language}, {question}',
      ),
    );
  });

  it('rejects a template with no placeholders', () => {
    expect(() => compilePromptTemplate('Just answer.')).toThrow(
      'Invalid prompt template: expected placeholders {context} and {question}, found none',
    );
  });

  it('rejects a template that cannot be parsed', () => {
    expect(() => compilePromptTemplate('{context} {question')).toThrow(
      PromptTemplateError,
    );
  });
});

describe('PromptTemplateProvider', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'prompt-spec-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('renders both placeholders into the built-in template', async () => {
    const provider = new PromptTemplateProvider(createTestSettings());

    const prompt = await provider.render({
      context: 'The harbor opens at dawn.',
      question: 'When does the harbor open?',
    });

    expect(prompt).toContain('Context:\nThe harbor opens at dawn.\n');
    expect(prompt).toContain('Question: When does the harbor open?\n');
  });

  it('loads a template from PROMPT_TEMPLATE_FILE', async () => {
    const file = path.join(workDir, 'prompt.txt');
    await fs.writeFile(file, 'C={context} Q={question}');
    const provider = new PromptTemplateProvider(
      createTestSettings({ promptTemplateFile: file }),
    );

    await provider.onModuleInit();

    await expect(provider.render({ context: 'a', question: 'b' })).resolves.toBe(
      'C=a Q=b',
    );
  });

  it('fails startup when the file is missing', async () => {
    const provider = new PromptTemplateProvider(
      createTestSettings({ promptTemplateFile: path.join(workDir, 'missing.txt') }),
    );

    await expect(provider.onModuleInit()).rejects.toBeInstanceOf(
      PromptTemplateError,
    );
  });
});
