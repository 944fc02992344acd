import { Inject, Injectable } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';
import { DB, type DbExecutor, type DrizzleDB } from '../db/drizzle.module.js';
import { skillEvents } from '../db/schema/index.js';
import type { NewSkillEventRow, SkillEventRow } from '../db/types/index.js';

@Injectable()
export class SkillEventsRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async insert(
    values: NewSkillEventRow,
    executor: DbExecutor = this.db,
  ): Promise<SkillEventRow> {
    const [row] = await executor.insert(skillEvents).values(values).returning();
    return row;
  }

  async listForPet(petId: string, limit: number): Promise<SkillEventRow[]> {
    return this.db
      .select()
      .from(skillEvents)
      .where(eq(skillEvents.petId, petId))
      .orderBy(desc(skillEvents.createdAt))
      .limit(limit);
  }
}
