// Keyword (ILIKE) and semantic (pgvector cosine) search over stored data

import { Injectable, Logger } from '@nestjs/common';
import { BadRequestError } from '../common/errors/api-errors.js';
import { isUuid, normalizeWallet } from '../common/text-utils.js';
import type { DataInstanceRow, KnowledgeRecord } from '../db/types/index.js';
import { EmbeddingService, embeddingInput } from '../openai/embedding.service.js';
import {
  StorageRepository,
  type SearchScope,
  type SemanticMatch,
} from './storage.repository.js';

export interface KeywordResults {
  instances: DataInstanceRow[];
  knowledge: KnowledgeRecord[];
}

export interface ReindexResult {
  processed: number;
  failed: number;
}

export function petScope(petId: string): SearchScope {
  return { kind: 'pet', petId };
}

export function walletScope(wallet: string): SearchScope {
  return { kind: 'wallet', wallet: normalizeWallet(wallet) };
}

/** A pet scope with a malformed id can match nothing */
function isEmptyScope(scope: SearchScope): boolean {
  return scope.kind === 'pet' && !isUuid(scope.petId);
}

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly storageRepo: StorageRepository,
    private readonly embeddings: EmbeddingService,
  ) {}

  async keyword(scope: SearchScope, query: string, limit: number): Promise<KeywordResults> {
    if (isEmptyScope(scope)) return { instances: [], knowledge: [] };
    const [instances, knowledge] = await Promise.all([
      this.storageRepo.searchInstances(scope, query, limit),
      this.storageRepo.searchKnowledge(scope, query, limit),
    ]);
    return { instances, knowledge };
  }

  async semantic(
    scope: SearchScope,
    query: string,
    threshold: number,
    limit: number,
  ): Promise<SemanticMatch[]> {
    this.requireEmbeddings();
    if (isEmptyScope(scope)) return [];
    const vector = await this.embeddings.embed(query);
    return this.storageRepo.semanticSearch(scope, vector, threshold, limit);
  }

  /** Embeds up to `limit` of the wallet's knowledge rows that have no vector */
  async reindex(walletAddress: string, limit: number): Promise<ReindexResult> {
    this.requireEmbeddings();
    const rows = await this.storageRepo.listUnembeddedKnowledge(
      normalizeWallet(walletAddress),
      limit,
    );

    let processed = 0;
    let failed = 0;
    for (const row of rows) {
      const input = embeddingInput(row.title, row.content);
      if (!input) {
        failed++;
        continue;
      }
      try {
        await this.storageRepo.setEmbedding(row.id, await this.embeddings.embed(input));
        processed++;
      } catch (err) {
        failed++;
        this.logger.warn(`Reindex of knowledge ${row.id} failed: ${String(err)}`);
      }
    }

    this.logger.log(`Reindex for ${walletAddress}: ${processed} embedded, ${failed} failed`);
    return { processed, failed };
  }

  private requireEmbeddings(): void {
    if (!this.embeddings.isEnabled()) {
      throw new BadRequestError('Semantic search requires OPENAI_API_KEY');
    }
  }
}
