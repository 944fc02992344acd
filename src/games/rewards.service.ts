// Minigame rewards and point spending

import { Injectable, Logger } from '@nestjs/common';
import {
  InsufficientPointsError,
  NotFoundError,
} from '../common/errors/api-errors.js';
import { isUuid, normalizeWallet } from '../common/text-utils.js';
import { AppConfigService } from '../config/app-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { GameDefinition } from '../content/content.types.js';
import { TransactionService } from '../db/transaction.service.js';
import type { PetRow, ProfileRow, Skill, SkillEventRow } from '../db/types/index.js';
import {
  AchievementsService,
  progressAchievements,
} from '../achievements/achievements.service.js';
import { PetsRepository } from '../pets/pets.repository.js';
import { PetsService } from '../pets/pets.service.js';
import { ProfilesRepository } from '../profiles/profiles.repository.js';
import { SkillEventsRepository } from './skill-events.repository.js';
import { nextStreak } from './streak.js';

export interface GameCompletion {
  pointsAwarded: number;
  totalPoints: number;
  skill: Skill;
  skillValue: number;
  achievementsAwarded: string[];
  pet: PetRow;
}

export interface StudioUnlock {
  unlocked: true;
  charged: number;
  points: number;
}

@Injectable()
export class RewardsService {
  private readonly logger = new Logger(RewardsService.name);

  constructor(
    private readonly content: ContentLoaderService,
    private readonly configService: AppConfigService,
    private readonly tx: TransactionService,
    private readonly petsService: PetsService,
    private readonly petsRepo: PetsRepository,
    private readonly profilesRepo: ProfilesRepository,
    private readonly skillEventsRepo: SkillEventsRepository,
    private readonly achievementsService: AchievementsService,
  ) {}

  listGames(): GameDefinition[] {
    return this.content.getGames();
  }

  getGame(gameId: string): GameDefinition {
    const game = this.content.getGame(gameId);
    if (!game) throw new NotFoundError(`Game "${gameId}" not found`, { gameId });
    return game;
  }

  async completeGame(
    walletAddress: string,
    gameId: string,
    petId: string,
    score?: number,
    now: Date = new Date(),
  ): Promise<GameCompletion> {
    const game = this.getGame(gameId);
    const pet = await this.petsService.getOwnedPet(walletAddress, petId);
    const { points, skill, skillValue } = game.rewards;
    const streak = nextStreak(pet.streak, pet.lastPlayedAt, now);

    const { profile, updated } = await this.tx.run(async (tx) => {
      const profile = await this.profilesRepo.addPoints(pet.ownerWallet, points, tx);
      if (!profile) throw new NotFoundError('Profile not found');
      const updated = await this.petsRepo.applySkillGain(
        pet.id,
        { skill, delta: skillValue, streak, playedAt: now },
        tx,
      );
      if (!updated) throw new NotFoundError('Pet not found');
      await this.skillEventsRepo.insert(
        {
          petId: pet.id,
          source: `game:${game.id}`,
          skill,
          delta: skillValue,
          points,
          rawData: { score: score ?? null, rounds: game.rounds, streak },
          comment: `Completed ${game.title}`,
        },
        tx,
      );
      return { profile, updated };
    });

    this.logger.log(
      `Pet ${pet.id} finished ${game.id}: +${points} points, +${skillValue} ${skill}, streak ${streak}`,
    );

    const awards = await this.achievementsService.awardAutomatic(
      updated,
      progressAchievements(updated),
    );
    const bonus = awards.reduce((sum, a) => sum + a.pointsAwarded, 0);

    return {
      pointsAwarded: points,
      totalPoints: profile.points + bonus,
      skill,
      skillValue,
      achievementsAwarded: awards.map((a) => a.achievement.code),
      pet: updated,
    };
  }

  async listSkillEvents(petId: string, limit: number): Promise<SkillEventRow[]> {
    if (!isUuid(petId)) return [];
    return this.skillEventsRepo.listForPet(petId, limit);
  }

  /** Charges the unlock cost once; later calls report charged: 0 */
  async unlockStudio(walletAddress: string): Promise<StudioUnlock> {
    const wallet = normalizeWallet(walletAddress);
    const cost = this.configService.get().studioUnlockCost;

    const profile = await this.requireProfile(wallet);
    if (profile.studioUnlocked) {
      return { unlocked: true, charged: 0, points: profile.points };
    }
    if (profile.points < cost) {
      throw new InsufficientPointsError(cost, profile.points);
    }

    const updated = await this.profilesRepo.unlockStudio(wallet, cost);
    if (updated) {
      this.logger.log(`Studio unlocked for ${wallet} (-${cost})`);
      return { unlocked: true, charged: cost, points: updated.points };
    }

    // Lost a race: another request unlocked it or spent the points first
    const current = await this.requireProfile(wallet);
    if (current.studioUnlocked) {
      return { unlocked: true, charged: 0, points: current.points };
    }
    throw new InsufficientPointsError(cost, current.points);
  }

  private async requireProfile(wallet: string): Promise<ProfileRow> {
    const profile = await this.profilesRepo.findByWallet(wallet);
    if (!profile) throw new NotFoundError('Profile not found');
    return profile;
  }
}
