import { Module } from '@nestjs/common';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { ContextAssemblerService } from './context-assembler.service';

@Module({
  imports: [VectorIndexModule],
  providers: [ContextAssemblerService],
  exports: [ContextAssemblerService, VectorIndexModule],
})
export class RetrievalModule {}
