import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import type { EnvironmentVariables } from '../src/config/environment';
import { RAG_SETTINGS } from '../src/config/rag-settings';
import { EmbeddingGatewayService } from '../src/embedding/embedding-gateway.service';
import { EmbeddingProviderFactory } from '../src/embedding/embedding-provider.factory';
import { GENERATION_ERROR_PREFIX } from '../src/generation/answer-generator.service';
import { CHAT_MODEL } from '../src/generation/generation.constants';
import { IngestionModule } from '../src/ingestion/ingestion.module';
import { IngestionService } from '../src/ingestion/ingestion.service';
import {
  AssembledContext,
  ContextAssemblerService,
} from '../src/retrieval/context-assembler.service';
import { VectorIndexUnavailableError } from '../src/vector-index/errors/vector-index-errors';
import { VectorIndex } from '../src/vector-index/vector-index';
import { QDRANT_CLIENT } from '../src/vector-index/vector-index.constants';
import { BagOfWordsEmbeddings } from './fakes/bag-of-words.embeddings';
import { InMemoryVectorIndex } from './fakes/in-memory-vector-index';
import { createTestSettings } from './fakes/test-settings';

describe('Question API (e2e)', () => {
  let app: INestApplication;
  let chatModel: FakeListChatModel;
  let index: InMemoryVectorIndex | undefined;
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'e2e-'));
    const embeddings = new BagOfWordsEmbeddings();
    chatModel = new FakeListChatModel({
      responses: ['Bananas arrive by boat at the harbor.'],
    });

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule, IngestionModule],
    })
      .overrideProvider(RAG_SETTINGS)
      .useValue(createTestSettings())
      .overrideProvider(QDRANT_CLIENT)
      .useValue({})
      .overrideProvider(EmbeddingProviderFactory)
      .useValue({ createEmbeddingModel: () => embeddings })
      .overrideProvider(VectorIndex)
      .useFactory({
        factory: (gateway: EmbeddingGatewayService) =>
          (index = new InMemoryVectorIndex(gateway)),
        inject: [EmbeddingGatewayService],
      })
      .overrideProvider(CHAT_MODEL)
      .useValue(chatModel)
      .compile();

    app = moduleRef.createNestApplication();
    configureApp(
      app,
      app.get<ConfigService<EnvironmentVariables, true>>(ConfigService),
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function ingest(files: Record<string, string>): Promise<void> {
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(workDir, name), content);
    }
    await app.get(IngestionService).run(workDir);
  }

  function captureContexts(): AssembledContext[] {
    const contexts: AssembledContext[] = [];
    const assembler = app.get(ContextAssemblerService);
    const assemble = assembler.assemble.bind(assembler);

    jest.spyOn(assembler, 'assemble').mockImplementation(async (question) => {
      const result = await assemble(question);
      contexts.push(result);
      return result;
    });

    return contexts;
  }

  it('answers from the markdown section that matches the question', async () => {
    await ingest({
      'guide.md': '# A\nalpha apples orchard\n## B\nbanana boats harbor\n',
    });
    const contexts = captureContexts();
    const invoke = jest.spyOn(chatModel, 'invoke');

    const response = await request(app.getHttpServer())
      .get('/ask_question')
      .query({ question: 'banana boats harbor' })
      .expect(200);

    expect(response.body).toEqual({
      answer: 'Bananas arrive by boat at the harbor.',
    });
    expect(response.headers['x-answer-status']).toBe('answer');

    const [assembled] = contexts;
    expect(assembled.context).toBe('banana boats harbor');
    expect(assembled.accepted).toHaveLength(1);
    expect(assembled.accepted[0].metadata.headers).toEqual({ H1: 'A', H2: 'B' });

    const [prompt] = invoke.mock.calls[0];
    expect(prompt).toContain('Context:\nbanana boats harbor\n');
    expect(prompt).not.toContain('alpha apples orchard');
  });

  it('answers with an empty context when nothing has been ingested', async () => {
    chatModel.responses = ['The documents do not cover this question.'];
    const contexts = captureContexts();
    const invoke = jest.spyOn(chatModel, 'invoke');

    const response = await request(app.getHttpServer())
      .get('/ask_question')
      .query({ question: 'Who maintains the lighthouse?' })
      .expect(200);

    expect(response.body).toEqual({
      answer: 'The documents do not cover this question.',
    });
    expect(contexts[0].context).toBe('');

    const [prompt] = invoke.mock.calls[0];
    expect(prompt).toContain('If the context is empty');
    expect(prompt).toContain(
      'Context:\n\n\nQuestion: Who maintains the lighthouse?',
    );
  });

  it('returns a tagged answer when the chat model is unreachable', async () => {
    jest
      .spyOn(chatModel, 'invoke')
      .mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));

    const response = await request(app.getHttpServer())
      .get('/ask_question')
      .query({ question: 'banana boats harbor' })
      .expect(200);

    expect(response.body).toEqual({
      answer: `${GENERATION_ERROR_PREFIX}connect ECONNREFUSED 127.0.0.1:11434`,
    });
    expect(response.headers['x-answer-status']).toBe('generation-error');
  });

  it('rejects a missing question', async () => {
    await request(app.getHttpServer()).get('/ask_question').expect(400);
  });

  it('rejects a blank question', async () => {
    await request(app.getHttpServer())
      .get('/ask_question')
      .query({ question: '   ' })
      .expect(400);
  });

  it('answers 503 when the index cannot be searched', async () => {
    if (!index) {
      throw new Error('vector index was not created');
    }
    jest
      .spyOn(index, 'similaritySearch')
      .mockRejectedValue(new VectorIndexUnavailableError('Similarity search failed: ECONNREFUSED'));

    const response = await request(app.getHttpServer())
      .get('/ask_question')
      .query({ question: 'banana boats harbor' })
      .expect(503);

    expect(response.body).toEqual({
      statusCode: 503,
      message: 'The document index is unavailable, try again later',
      error: 'Service Unavailable',
    });
  });

  it('reports the number of indexed chunks on /health', async () => {
    await ingest({ 'notes.txt': 'plain notes', 'guide.md': '# A\nalpha\n## B\nbeta\n' });

    await request(app.getHttpServer())
      .get('/health')
      .expect(200)
      .expect({ status: 'ok', chunks: 3 });
  });

  it('allows GET from a local origin and tags responses with a request id', async () => {
    const response = await request(app.getHttpServer())
      .get('/health')
      .set('Origin', 'http://127.0.0.1:5173')
      .set('X-Request-ID', 'req-test-1')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe(
      'http://127.0.0.1:5173',
    );
    expect(response.headers['x-request-id']).toBe('req-test-1');
  });
});
