/**
 * Context Assembler Service
 * Similarity search followed by a strict distance cut-off. Accepted chunks
 * keep search order and are joined into the context handed to the model.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { RAG_SETTINGS, RagSettings } from '../config/rag-settings';
import { toError } from '../shared/errors/rag-error';
import { VectorIndex } from '../vector-index/vector-index';
import type { ScoredChunk } from '../vector-index/vector-index';
import { RetrievalError } from './errors/retrieval-errors';

export const CONTEXT_SEPARATOR = '\n\n';

export interface CandidateDecision {
  source: string;
  chunkIndex: number;
  distance: number;
  accepted: boolean;
}

export interface AssembledContext {
  /** Accepted contents joined with CONTEXT_SEPARATOR; '' when none passed */
  context: string;
  accepted: ScoredChunk[];
  decisions: CandidateDecision[];
}

/** Strictly below the threshold; a distance equal to it is rejected */
export function isAccepted(distance: number, threshold: number): boolean {
  return distance < threshold;
}

@Injectable()
export class ContextAssemblerService {
  private readonly logger = new Logger(ContextAssemblerService.name);

  constructor(
    private readonly vectorIndex: VectorIndex,
    @Inject(RAG_SETTINGS) private readonly settings: RagSettings,
  ) {}

  /**
   * @throws RetrievalError when the index cannot be searched
   */
  async assemble(question: string): Promise<AssembledContext> {
    const { topK, similarityThreshold } = this.settings.retrieval;

    let candidates: ScoredChunk[];
    try {
      candidates = await this.vectorIndex.similaritySearch(question, topK);
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Similarity search failed: ${cause.message}`, cause.stack);
      throw new RetrievalError(cause.message, cause);
    }

    const accepted: ScoredChunk[] = [];
    const decisions: CandidateDecision[] = [];

    for (const candidate of candidates) {
      const verdict = isAccepted(candidate.distance, similarityThreshold);
      decisions.push({
        source: candidate.metadata.source,
        chunkIndex: candidate.metadata.chunkIndex,
        distance: candidate.distance,
        accepted: verdict,
      });

      this.logger.log(
        `Distance ${candidate.distance.toFixed(4)} ${verdict ? 'accepted' : 'rejected'} ` +
          `(threshold ${similarityThreshold}): ${candidate.metadata.source}#${candidate.metadata.chunkIndex}`,
      );

      if (verdict) {
        accepted.push(candidate);
      }
    }

    if (accepted.length === 0) {
      this.logger.warn(
        `No chunk passed the similarity threshold (${candidates.length} candidates); answering without context`,
      );
    }

    return {
      context: accepted.map((chunk) => chunk.content).join(CONTEXT_SEPARATOR),
      accepted,
      decisions,
    };
  }
}
