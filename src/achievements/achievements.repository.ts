import { Inject, Injectable } from '@nestjs/common';
import { asc, desc, eq, sql } from 'drizzle-orm';
import { DB, type DbExecutor, type DrizzleDB } from '../db/drizzle.module.js';
import { achievements, petAchievements } from '../db/schema/index.js';
import type { AchievementRow } from '../db/types/index.js';
import type { AchievementDefinition } from '../content/content.types.js';

export interface PetAchievementRecord {
  achievement: AchievementRow;
  achievedAt: Date;
}

@Injectable()
export class AchievementsRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async upsertCatalog(defs: AchievementDefinition[]): Promise<void> {
    if (defs.length === 0) return;
    await this.db
      .insert(achievements)
      .values(defs)
      .onConflictDoUpdate({
        target: achievements.code,
        set: {
          title: sql`excluded.title`,
          description: sql`excluded.description`,
          points: sql`excluded.points`,
        },
      });
  }

  async list(): Promise<AchievementRow[]> {
    return this.db.select().from(achievements).orderBy(asc(achievements.code));
  }

  async findByCode(code: string): Promise<AchievementRow | undefined> {
    const [row] = await this.db
      .select()
      .from(achievements)
      .where(eq(achievements.code, code))
      .limit(1);
    return row;
  }

  async listForPet(petId: string): Promise<PetAchievementRecord[]> {
    return this.db
      .select({
        achievement: achievements,
        achievedAt: petAchievements.achievedAt,
      })
      .from(petAchievements)
      .innerJoin(achievements, eq(petAchievements.achievementId, achievements.id))
      .where(eq(petAchievements.petId, petId))
      .orderBy(desc(petAchievements.achievedAt));
  }

  /** true when this call created the link, false when it already existed */
  async award(
    petId: string,
    achievementId: string,
    executor: DbExecutor = this.db,
  ): Promise<boolean> {
    const inserted = await executor
      .insert(petAchievements)
      .values({ petId, achievementId })
      .onConflictDoNothing()
      .returning({ petId: petAchievements.petId });
    return inserted.length > 0;
  }
}
