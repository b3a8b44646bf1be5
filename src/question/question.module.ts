import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { GenerationModule } from '../generation/generation.module';
import { QuestionService } from './question.service';
import { QuestionController } from './question.controller';
import { HealthController } from './health.controller';

@Module({
  imports: [RetrievalModule, GenerationModule],
  controllers: [QuestionController, HealthController],
  providers: [QuestionService],
})
export class QuestionModule {}
