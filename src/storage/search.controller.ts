import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { Wallet } from '../common/decorators/wallet.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  presentInstance,
  presentKnowledge,
  presentSemanticMatch,
  type DataInstanceSummary,
  type KnowledgeResponse,
  type SemanticMatchResponse,
} from '../common/presenters.js';
import {
  SearchService,
  petScope,
  type KeywordResults,
  type ReindexResult,
} from './search.service.js';
import {
  KeywordSearchQuerySchema,
  ReindexBodySchema,
  SemanticSearchQuerySchema,
  type KeywordSearchQuery,
  type ReindexBody,
  type SemanticSearchQuery,
} from './dto/search-query.dto.js';

export interface KeywordSearchResponse {
  instances: DataInstanceSummary[];
  knowledge: KnowledgeResponse[];
}

export function presentKeywordResults(results: KeywordResults): KeywordSearchResponse {
  return {
    instances: results.instances.map(presentInstance),
    knowledge: results.knowledge.map(presentKnowledge),
  };
}

@ApiTags('Search')
@Controller('api/v1/storage')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Get('pets/:petId/search')
  async searchPet(
    @Param('petId') petId: string,
    @Query(new ZodValidationPipe(KeywordSearchQuerySchema)) query: KeywordSearchQuery,
  ): Promise<KeywordSearchResponse> {
    const results = await this.searchService.keyword(petScope(petId), query.q, query.limit);
    return presentKeywordResults(results);
  }

  @Get('semantic/search')
  async semanticAll(
    @Query(new ZodValidationPipe(SemanticSearchQuerySchema)) query: SemanticSearchQuery,
  ): Promise<SemanticMatchResponse[]> {
    const rows = await this.searchService.semantic(
      { kind: 'all' },
      query.q,
      query.similarity_threshold,
      query.limit,
    );
    return rows.map(presentSemanticMatch);
  }

  @Get('pets/:petId/semantic/search')
  async semanticPet(
    @Param('petId') petId: string,
    @Query(new ZodValidationPipe(SemanticSearchQuerySchema)) query: SemanticSearchQuery,
  ): Promise<SemanticMatchResponse[]> {
    const rows = await this.searchService.semantic(
      petScope(petId),
      query.q,
      query.similarity_threshold,
      query.limit,
    );
    return rows.map(presentSemanticMatch);
  }

  @Post('knowledge/reindex')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  async reindex(
    @Wallet() wallet: string,
    @Body(new ZodValidationPipe(ReindexBodySchema)) body: ReindexBody,
  ): Promise<ReindexResult> {
    return this.searchService.reindex(wallet, body.limit);
  }
}
