import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { BatchModule } from './batch.module';
import { IndexInspectionService } from './vector-index/index-inspection.service';

async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(BatchModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));

  try {
    await app.get(IndexInspectionService).printAll();
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  new NestLogger('Inspect').error(
    'Index inspection failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
