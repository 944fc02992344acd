// Text embeddings for knowledge rows and search queries

import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service.js';
import { BadRequestError, InternalError } from '../common/errors/api-errors.js';
import { isBlank, truncate } from '../common/text-utils.js';
import { EMBEDDING_DIMENSIONS } from '../db/types/index.js';
import { OpenAiClientService } from './openai-client.service.js';

const MAX_INPUT_CHARS = 8000;

/** Title and content joined the way knowledge rows are embedded */
export function embeddingInput(
  title: string | null | undefined,
  content: string | null | undefined,
): string {
  return [title, content]
    .filter((part): part is string => !isBlank(part))
    .map((part) => part.trim())
    .join('\n\n');
}

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);

  constructor(
    private readonly openai: OpenAiClientService,
    private readonly configService: AppConfigService,
  ) {}

  isEnabled(): boolean {
    return this.openai.isEnabled();
  }

  /** Throws BadRequestError when OpenAI is not configured */
  async embed(text: string): Promise<number[]> {
    const client = this.openai.getClient();
    if (!client) {
      throw new BadRequestError('Semantic search requires OPENAI_API_KEY');
    }

    let vector: number[] | undefined;
    try {
      const response = await client.embeddings.create({
        model: this.configService.get().embeddingModel,
        input: truncate(text, MAX_INPUT_CHARS),
      });
      vector = response.data[0]?.embedding;
    } catch (err) {
      throw new InternalError('Embedding request failed', {
        cause: String(err),
      });
    }

    if (!vector || vector.length !== EMBEDDING_DIMENSIONS) {
      throw new InternalError('Embedding response has unexpected shape', {
        dimensions: vector?.length ?? 0,
      });
    }
    return vector;
  }

  /**
   * Embedding for a knowledge row, or null when OpenAI is off, the row has
   * no text, or the call fails.
   */
  async embedKnowledge(
    title: string | null | undefined,
    content: string | null | undefined,
  ): Promise<number[] | null> {
    if (!this.isEnabled()) return null;
    const input = embeddingInput(title, content);
    if (!input) return null;

    try {
      return await this.embed(input);
    } catch (err) {
      this.logger.warn(`Embedding failed, storing row without vector: ${String(err)}`);
      return null;
    }
  }
}
