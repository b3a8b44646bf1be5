import { Module } from '@nestjs/common';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingGatewayService } from './embedding-gateway.service';

@Module({
  providers: [EmbeddingProviderFactory, EmbeddingGatewayService],
  exports: [EmbeddingGatewayService],
})
export class EmbeddingModule {}
