import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { BatchModule } from './batch.module';
import { RAG_SETTINGS, RagSettings } from './config/rag-settings';
import { IngestionService } from './ingestion/ingestion.service';

/**
 * npm run ingest [-- <source directory>]
 * Defaults to SOURCE_DIRECTORY.
 */
async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(BatchModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));

  try {
    const settings = app.get<RagSettings>(RAG_SETTINGS);
    const sourceDirectory = process.argv[2] ?? settings.sourceDirectory;

    const report = await app.get(IngestionService).run(sourceDirectory);
    if (report.filesFailed > 0) {
      process.exitCode = 2;
    }
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  new NestLogger('Ingest').error(
    'Ingestion aborted',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
