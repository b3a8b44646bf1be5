/**
 * Vector Index Module
 */

import { Module } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import { EmbeddingModule } from '../embedding/embedding.module';
import { QdrantVectorIndex } from './qdrant-vector-index';
import { IndexInspectionService } from './index-inspection.service';
import { VectorIndex } from './vector-index';
import { QDRANT_CLIENT } from './vector-index.constants';

/** Requests past the vector index timeout are aborted by the client itself */
export function createQdrantClient(settings: RagSettings): QdrantClient {
  const { url, apiKey } = settings.vectorIndex;

  return new QdrantClient({
    url,
    ...(apiKey && { apiKey }),
    timeout: settings.resilience.vectorIndexTimeoutMs,
  });
}

@Module({
  imports: [EmbeddingModule],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: createQdrantClient,
      inject: [RAG_SETTINGS],
    },
    { provide: VectorIndex, useClass: QdrantVectorIndex },
    IndexInspectionService,
  ],
  exports: [VectorIndex, IndexInspectionService, EmbeddingModule],
})
export class VectorIndexModule {}
