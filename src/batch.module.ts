/**
 * Root module for the offline jobs (ingest, inspect). No HTTP surface and no
 * chat model.
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { validateEnvironment } from './config/environment';
import { RagConfigModule } from './config/rag-config.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { VectorIndexModule } from './vector-index/vector-index.module';
import { pinoConfig } from './shared/logging/pino.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    LoggerModule.forRoot(pinoConfig),
    RagConfigModule,
    IngestionModule,
    VectorIndexModule,
  ],
})
export class BatchModule {}
