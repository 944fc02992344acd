import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  presentPet,
  presentSemanticMatch,
  type PetResponse,
  type SemanticMatchResponse,
} from '../common/presenters.js';
import { PetsService } from '../pets/pets.service.js';
import { SearchService, walletScope } from '../storage/search.service.js';
import {
  presentKeywordResults,
  type KeywordSearchResponse,
} from '../storage/search.controller.js';
import {
  KeywordSearchQuerySchema,
  SemanticSearchQuerySchema,
  type KeywordSearchQuery,
  type SemanticSearchQuery,
} from '../storage/dto/search-query.dto.js';
import { UsersService, type WalletStatistics } from './users.service.js';

@ApiTags('Users')
@Controller('api/v1/storage/users/:wallet')
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    private readonly petsService: PetsService,
    private readonly searchService: SearchService,
  ) {}

  @Get('pets')
  async listPets(@Param('wallet') wallet: string): Promise<PetResponse[]> {
    const rows = await this.petsService.listForWallet(wallet);
    return rows.map(presentPet);
  }

  @Get('statistics')
  async statistics(@Param('wallet') wallet: string): Promise<WalletStatistics> {
    return this.usersService.statistics(wallet);
  }

  @Get('search')
  async search(
    @Param('wallet') wallet: string,
    @Query(new ZodValidationPipe(KeywordSearchQuerySchema)) query: KeywordSearchQuery,
  ): Promise<KeywordSearchResponse> {
    const results = await this.searchService.keyword(walletScope(wallet), query.q, query.limit);
    return presentKeywordResults(results);
  }

  @Get('semantic/search')
  async semanticSearch(
    @Param('wallet') wallet: string,
    @Query(new ZodValidationPipe(SemanticSearchQuerySchema)) query: SemanticSearchQuery,
  ): Promise<SemanticMatchResponse[]> {
    const rows = await this.searchService.semantic(
      walletScope(wallet),
      query.q,
      query.similarity_threshold,
      query.limit,
    );
    return rows.map(presentSemanticMatch);
  }
}
