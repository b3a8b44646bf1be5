import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import type { EnvironmentVariables } from './config/environment';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const configService =
    app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  configureApp(app, configService);
  app.enableShutdownHooks();

  const port = configService.get('PORT', { infer: true });
  const host = configService.get('HOST', { infer: true });
  await app.listen(port, host);
  logger.log(`Question answering API running on: http://${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  new NestLogger('Bootstrap').error(
    'Failed to start the API',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
