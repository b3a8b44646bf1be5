import { QdrantClient } from '@qdrant/js-client-rest';
import { createQdrantClient } from './vector-index.module';
import { createTestSettings } from '../../test/fakes/test-settings';

jest.mock('@qdrant/js-client-rest');

describe('createQdrantClient', () => {
  beforeEach(() => {
    jest.mocked(QdrantClient).mockClear();
  });

  it('bounds every request by the vector index timeout', () => {
    createQdrantClient(
      createTestSettings({ resilience: { vectorIndexTimeoutMs: 2500 } }),
    );

    expect(QdrantClient).toHaveBeenCalledWith({
      url: 'http://localhost:6333',
      timeout: 2500,
    });
  });

  it('passes the API key when one is configured', () => {
    createQdrantClient(
      createTestSettings({ vectorIndex: { apiKey: 'test-key' } }),
    );

    expect(QdrantClient).toHaveBeenCalledWith({
      url: 'http://localhost:6333',
      apiKey: 'test-key',
      timeout: 1000,
    });
  });
});
