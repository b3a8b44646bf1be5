import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { EnvironmentVariables } from './config/environment';

/** HTTP concerns shared by main.ts and the e2e tests */
export function configureApp(
  app: INestApplication,
  configService: ConfigService<EnvironmentVariables, true>,
): void {
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));

  app.enableCors({
    origin: new RegExp(configService.get('CORS_ORIGIN_REGEX', { infer: true })),
    methods: ['GET'],
    credentials: true,
  });
}
