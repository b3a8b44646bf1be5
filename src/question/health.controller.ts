import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { VectorIndex } from '../vector-index/vector-index';
import { toError } from '../shared/errors/rag-error';

@Controller('health')
export class HealthController {
  constructor(private readonly vectorIndex: VectorIndex) {}

  @Get()
  async check(): Promise<{ status: 'ok'; chunks: number }> {
    try {
      return { status: 'ok', chunks: await this.vectorIndex.count() };
    } catch (error) {
      throw new ServiceUnavailableException(
        `Vector index unreachable: ${toError(error).message}`,
      );
    }
  }
}
