import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { EnvironmentVariables } from './environment';
import { RAG_SETTINGS, RagSettings, buildRagSettings } from './rag-settings';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RAG_SETTINGS,
      useFactory: (
        configService: ConfigService<EnvironmentVariables, true>,
      ): RagSettings => buildRagSettings(configService),
      inject: [ConfigService],
    },
  ],
  exports: [RAG_SETTINGS],
})
export class RagConfigModule {}
