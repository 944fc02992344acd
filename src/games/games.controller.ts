import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { Wallet } from '../common/decorators/wallet.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  presentPet,
  presentSkillEvent,
  type PetResponse,
  type SkillEventResponse,
} from '../common/presenters.js';
import type { GameDefinition } from '../content/content.types.js';
import type { Skill } from '../db/types/index.js';
import { RewardsService, type StudioUnlock } from './rewards.service.js';
import {
  CompleteGameBodySchema,
  type CompleteGameBody,
} from './dto/complete-game.dto.js';
import {
  ListSkillEventsQuerySchema,
  type ListSkillEventsQuery,
} from './dto/list-skill-events.dto.js';

export interface GameResponse {
  id: string;
  title: string;
  description: string;
  rounds: number;
  rewards: { points: number; skill: Skill; skill_value: number };
}

export interface GameCompletionResponse {
  points_awarded: number;
  total_points: number;
  skill: Skill;
  skill_value: number;
  achievements_awarded: string[];
  pet: PetResponse;
}

function presentGame(game: GameDefinition): GameResponse {
  return {
    id: game.id,
    title: game.title,
    description: game.description,
    rounds: game.rounds,
    rewards: {
      points: game.rewards.points,
      skill: game.rewards.skill,
      skill_value: game.rewards.skillValue,
    },
  };
}

@ApiTags('Games')
@Controller('api/v1/games')
export class GamesController {
  constructor(private readonly rewardsService: RewardsService) {}

  @Get()
  list(): GameResponse[] {
    return this.rewardsService.listGames().map(presentGame);
  }

  @Get(':gameId')
  get(@Param('gameId') gameId: string): GameResponse {
    return presentGame(this.rewardsService.getGame(gameId));
  }

  @Post(':gameId/complete')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  async complete(
    @Wallet() wallet: string,
    @Param('gameId') gameId: string,
    @Body(new ZodValidationPipe(CompleteGameBodySchema)) body: CompleteGameBody,
  ): Promise<GameCompletionResponse> {
    const result = await this.rewardsService.completeGame(
      wallet,
      gameId,
      body.pet_id,
      body.score,
    );
    return {
      points_awarded: result.pointsAwarded,
      total_points: result.totalPoints,
      skill: result.skill,
      skill_value: result.skillValue,
      achievements_awarded: result.achievementsAwarded,
      pet: presentPet(result.pet),
    };
  }
}

@ApiTags('Rewards')
@Controller('api/v1')
export class RewardsController {
  constructor(private readonly rewardsService: RewardsService) {}

  @Get('pets/:petId/skill-events')
  async skillEvents(
    @Param('petId') petId: string,
    @Query(new ZodValidationPipe(ListSkillEventsQuerySchema)) query: ListSkillEventsQuery,
  ): Promise<SkillEventResponse[]> {
    const rows = await this.rewardsService.listSkillEvents(petId, query.limit);
    return rows.map(presentSkillEvent);
  }

  @Post('rewards/studio-unlock')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  async studioUnlock(@Wallet() wallet: string): Promise<StudioUnlock> {
    return this.rewardsService.unlockStudio(wallet);
  }
}
