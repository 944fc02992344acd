// Achievement catalog and per-pet awards

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { NotFoundError } from '../common/errors/api-errors.js';
import { isUuid } from '../common/text-utils.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { TransactionService } from '../db/transaction.service.js';
import type { AchievementRow, PetRow } from '../db/types/index.js';
import { ProfilesRepository } from '../profiles/profiles.repository.js';
import {
  AchievementsRepository,
  type PetAchievementRecord,
} from './achievements.repository.js';

export interface AwardResult {
  achievement: AchievementRow;
  awarded: boolean;
  pointsAwarded: number;
}

export const STREAK_ACHIEVEMENTS: readonly { code: string; streak: number }[] = [
  { code: 'streak_3', streak: 3 },
  { code: 'streak_7', streak: 7 },
];

export const SKILL_ACHIEVEMENT_THRESHOLD = 50;

@Injectable()
export class AchievementsService implements OnModuleInit {
  private readonly logger = new Logger(AchievementsService.name);

  constructor(
    private readonly achievementsRepo: AchievementsRepository,
    private readonly profilesRepo: ProfilesRepository,
    private readonly content: ContentLoaderService,
    private readonly tx: TransactionService,
  ) {}

  async onModuleInit() {
    await this.content.ensureLoaded();
    const defs = this.content.getAchievements();
    await this.achievementsRepo.upsertCatalog(defs);
    this.logger.log(`Achievement catalog synced (${defs.length} entries)`);
  }

  async listCatalog(): Promise<AchievementRow[]> {
    return this.achievementsRepo.list();
  }

  async listForPet(petId: string): Promise<PetAchievementRecord[]> {
    if (!isUuid(petId)) return [];
    return this.achievementsRepo.listForPet(petId);
  }

  /**
   * Links the achievement to the pet and credits its points to the owner,
   * once. A repeat call reports awarded=false and changes nothing.
   */
  async award(pet: PetRow, code: string): Promise<AwardResult> {
    const achievement = await this.achievementsRepo.findByCode(code);
    if (!achievement) {
      throw new NotFoundError(`Achievement "${code}" not found`, { code });
    }

    const awarded = await this.tx.run(async (tx) => {
      const created = await this.achievementsRepo.award(pet.id, achievement.id, tx);
      if (created && achievement.points > 0) {
        await this.profilesRepo.addPoints(pet.ownerWallet, achievement.points, tx);
      }
      return created;
    });

    if (awarded) {
      this.logger.log(`Pet ${pet.id} earned ${code} (+${achievement.points})`);
    }
    return { achievement, awarded, pointsAwarded: awarded ? achievement.points : 0 };
  }

  /**
   * Grants the codes that are in the catalog. Failures are logged; the
   * request that triggered the award carries on.
   */
  async awardAutomatic(pet: PetRow, codes: string[]): Promise<AwardResult[]> {
    const catalog = new Set(this.content.getAchievements().map((a) => a.code));
    const granted: AwardResult[] = [];

    for (const code of codes) {
      if (!catalog.has(code)) continue;
      try {
        const result = await this.award(pet, code);
        if (result.awarded) granted.push(result);
      } catch (err) {
        this.logger.warn(`Automatic award ${code} for pet ${pet.id} failed: ${String(err)}`);
      }
    }
    return granted;
  }
}

/** Codes a pet qualifies for after playing, given its updated row */
export function progressAchievements(pet: PetRow): string[] {
  const codes = ['first_game'];
  for (const { code, streak } of STREAK_ACHIEVEMENTS) {
    if (pet.streak >= streak) codes.push(code);
  }
  const topSkill = Math.max(pet.social, pet.trivia, pet.science, pet.code, pet.trenches);
  if (topSkill >= SKILL_ACHIEVEMENT_THRESHOLD) codes.push('skill_50');
  return codes;
}
