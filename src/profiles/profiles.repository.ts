import { Inject, Injectable } from '@nestjs/common';
import { and, eq, gte, sql } from 'drizzle-orm';
import { DB, type DbExecutor, type DrizzleDB } from '../db/drizzle.module.js';
import { profiles } from '../db/schema/index.js';
import type { ProfileRow } from '../db/types/index.js';

@Injectable()
export class ProfilesRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findByWallet(walletAddress: string): Promise<ProfileRow | undefined> {
    const [row] = await this.db
      .select()
      .from(profiles)
      .where(eq(profiles.walletAddress, walletAddress))
      .limit(1);
    return row;
  }

  async findByUsername(username: string): Promise<ProfileRow | undefined> {
    const [row] = await this.db
      .select()
      .from(profiles)
      .where(eq(profiles.username, username))
      .limit(1);
    return row;
  }

  /** Inserts unless the wallet already exists; returns the stored row either way. */
  async createIfAbsent(
    walletAddress: string,
    username: string,
  ): Promise<ProfileRow> {
    const [created] = await this.db
      .insert(profiles)
      .values({ walletAddress, username })
      .onConflictDoNothing({ target: profiles.walletAddress })
      .returning();
    if (created) return created;
    const existing = await this.findByWallet(walletAddress);
    if (!existing) {
      throw new Error(`Profile ${walletAddress} vanished during upsert`);
    }
    return existing;
  }

  async updateUsername(
    walletAddress: string,
    username: string,
  ): Promise<ProfileRow | undefined> {
    const [row] = await this.db
      .update(profiles)
      .set({ username })
      .where(eq(profiles.walletAddress, walletAddress))
      .returning();
    return row;
  }

  async delete(walletAddress: string): Promise<boolean> {
    const deleted = await this.db
      .delete(profiles)
      .where(eq(profiles.walletAddress, walletAddress))
      .returning({ walletAddress: profiles.walletAddress });
    return deleted.length > 0;
  }

  async addPoints(
    walletAddress: string,
    points: number,
    executor: DbExecutor = this.db,
  ): Promise<ProfileRow | undefined> {
    const [row] = await executor
      .update(profiles)
      .set({ points: sql`${profiles.points} + ${points}` })
      .where(eq(profiles.walletAddress, walletAddress))
      .returning();
    return row;
  }

  /**
   * Deducts `cost` and sets the flag in one statement. Returns undefined when
   * the profile is missing, already unlocked, or short of points.
   */
  async unlockStudio(
    walletAddress: string,
    cost: number,
  ): Promise<ProfileRow | undefined> {
    const [row] = await this.db
      .update(profiles)
      .set({
        points: sql`${profiles.points} - ${cost}`,
        studioUnlocked: true,
      })
      .where(
        and(
          eq(profiles.walletAddress, walletAddress),
          eq(profiles.studioUnlocked, false),
          gte(profiles.points, cost),
        ),
      )
      .returning();
    return row;
  }
}
