/**
 * Question Service
 * One question, end to end: context from the index, then an answer from the
 * chat model.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ContextAssemblerService } from '../retrieval/context-assembler.service';
import {
  AnswerGeneratorService,
  GeneratedAnswer,
} from '../generation/answer-generator.service';

@Injectable()
export class QuestionService {
  private readonly logger = new Logger(QuestionService.name);

  constructor(
    private readonly contextAssembler: ContextAssemblerService,
    private readonly answerGenerator: AnswerGeneratorService,
  ) {}

  /**
   * @throws RetrievalError when the index cannot be searched
   */
  async ask(question: string): Promise<GeneratedAnswer> {
    const startTime = Date.now();

    const { context, accepted } = await this.contextAssembler.assemble(question);
    const answer = await this.answerGenerator.generate(question, context);

    this.logger.log(
      `Answered with ${accepted.length} context chunks in ${Date.now() - startTime}ms (${answer.kind})`,
    );

    return answer;
  }
}
