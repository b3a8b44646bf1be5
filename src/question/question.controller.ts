/**
 * Question HTTP Controller
 *
 * GET /ask_question?question=...
 * Response: { "answer": string }, with X-Answer-Status telling a real answer
 * apart from a generation-error placeholder.
 */

import {
  Controller,
  Get,
  Logger,
  Query,
  Res,
  ServiceUnavailableException,
} from '@nestjs/common';
import type { Response } from 'express';
import { AskQuestionDto } from './dto/ask-question.dto';
import { QuestionService } from './question.service';
import { RetrievalError } from '../retrieval/errors/retrieval-errors';

export const ANSWER_STATUS_HEADER = 'X-Answer-Status';

export interface AnswerResponse {
  answer: string;
}

@Controller()
export class QuestionController {
  private readonly logger = new Logger(QuestionController.name);

  constructor(private readonly questionService: QuestionService) {}

  @Get('ask_question')
  async askQuestion(
    @Query() query: AskQuestionDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AnswerResponse> {
    this.logger.log(`Question received (${query.question.length} chars)`);

    try {
      const answer = await this.questionService.ask(query.question);
      res.setHeader(ANSWER_STATUS_HEADER, answer.kind);
      return { answer: answer.text };
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw new ServiceUnavailableException(
          'The document index is unavailable, try again later',
        );
      }
      throw error;
    }
  }
}
