import { Inject, Injectable } from '@nestjs/common';
import { desc, eq, sql, type SQL } from 'drizzle-orm';
import { DB, type DbExecutor, type DrizzleDB } from '../db/drizzle.module.js';
import { pets } from '../db/schema/index.js';
import type { NewPetRow, PetRow, Skill } from '../db/types/index.js';

export interface SkillGain {
  skill: Skill;
  delta: number;
  streak: number;
  playedAt: Date;
}

function skillIncrement(skill: Skill, delta: number): Partial<Record<Skill, SQL>> {
  switch (skill) {
    case 'social':
      return { social: sql`${pets.social} + ${delta}` };
    case 'trivia':
      return { trivia: sql`${pets.trivia} + ${delta}` };
    case 'science':
      return { science: sql`${pets.science} + ${delta}` };
    case 'code':
      return { code: sql`${pets.code} + ${delta}` };
    case 'trenches':
      return { trenches: sql`${pets.trenches} + ${delta}` };
  }
}

@Injectable()
export class PetsRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findById(
    petId: string,
    executor: DbExecutor = this.db,
  ): Promise<PetRow | undefined> {
    const [row] = await executor
      .select()
      .from(pets)
      .where(eq(pets.id, petId))
      .limit(1);
    return row;
  }

  async listByOwner(ownerWallet: string): Promise<PetRow[]> {
    return this.db
      .select()
      .from(pets)
      .where(eq(pets.ownerWallet, ownerWallet))
      .orderBy(desc(pets.createdAt));
  }

  async create(values: NewPetRow): Promise<PetRow> {
    const [row] = await this.db.insert(pets).values(values).returning();
    return row;
  }

  async rename(petId: string, name: string): Promise<PetRow | undefined> {
    const [row] = await this.db
      .update(pets)
      .set({ name })
      .where(eq(pets.id, petId))
      .returning();
    return row;
  }

  async delete(petId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(pets)
      .where(eq(pets.id, petId))
      .returning({ id: pets.id });
    return deleted.length > 0;
  }

  async applySkillGain(
    petId: string,
    gain: SkillGain,
    executor: DbExecutor = this.db,
  ): Promise<PetRow | undefined> {
    const [row] = await executor
      .update(pets)
      .set({
        ...skillIncrement(gain.skill, gain.delta),
        streak: gain.streak,
        lastPlayedAt: gain.playedAt,
      })
      .where(eq(pets.id, petId))
      .returning();
    return row;
  }
}
