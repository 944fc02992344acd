import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { Wallet } from '../common/decorators/wallet.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  presentAchievement,
  presentPet,
  presentPetAchievement,
  type AchievementResponse,
  type PetAchievementResponse,
  type PetResponse,
} from '../common/presenters.js';
import { AchievementsService } from '../achievements/achievements.service.js';
import {
  AwardAchievementBodySchema,
  type AwardAchievementBody,
} from '../achievements/dto/award-achievement.dto.js';
import { PetsService } from './pets.service.js';
import { CreatePetBodySchema, type CreatePetBody } from './dto/create-pet.dto.js';
import { RenamePetBodySchema, type RenamePetBody } from './dto/rename-pet.dto.js';

export interface AwardResponse {
  achievement: AchievementResponse;
  already_awarded: boolean;
  points_awarded: number;
}

@ApiTags('Pets')
@Controller('api/v1/pets')
export class PetsController {
  constructor(
    private readonly petsService: PetsService,
    private readonly achievementsService: AchievementsService,
  ) {}

  @Post()
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Wallet() wallet: string,
    @Body(new ZodValidationPipe(CreatePetBodySchema)) body: CreatePetBody,
  ): Promise<PetResponse> {
    return presentPet(await this.petsService.createPet(wallet, body));
  }

  @Patch(':petId')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  async rename(
    @Wallet() wallet: string,
    @Param('petId') petId: string,
    @Body(new ZodValidationPipe(RenamePetBodySchema)) body: RenamePetBody,
  ): Promise<PetResponse> {
    return presentPet(await this.petsService.renamePet(wallet, petId, body.name));
  }

  @Delete(':petId')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Wallet() wallet: string, @Param('petId') petId: string): Promise<void> {
    await this.petsService.deletePet(wallet, petId);
  }

  @Get(':petId/achievements')
  async listAchievements(@Param('petId') petId: string): Promise<PetAchievementResponse[]> {
    const records = await this.achievementsService.listForPet(petId);
    return records.map(presentPetAchievement);
  }

  /** 201 on the first award, 200 when the pet already has it */
  @Post(':petId/achievements')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  async award(
    @Wallet() wallet: string,
    @Param('petId') petId: string,
    @Body(new ZodValidationPipe(AwardAchievementBodySchema)) body: AwardAchievementBody,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AwardResponse> {
    const pet = await this.petsService.getOwnedPet(wallet, petId);
    const result = await this.achievementsService.award(pet, body.code);
    res.status(result.awarded ? HttpStatus.CREATED : HttpStatus.OK);
    return {
      achievement: presentAchievement(result.achievement),
      already_awarded: !result.awarded,
      points_awarded: result.pointsAwarded,
    };
  }
}
