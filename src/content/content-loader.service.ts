// Game and achievement catalogs: JSON under content/, cached in memory

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import {
  AchievementDefinitionSchema,
  GameDefinitionSchema,
  type AchievementDefinition,
  type GameDefinition,
} from './content.types.js';

export const CONTENT_DIR = join(process.cwd(), 'content');

async function readCatalog<T extends z.ZodTypeAny>(
  dir: string,
  file: string,
  schema: T,
): Promise<z.infer<T>[]> {
  const raw = await readFile(join(dir, file), 'utf-8');
  const parsed = z.array(schema).safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private games = new Map<string, GameDefinition>();
  private achievements = new Map<string, AchievementDefinition>();
  private loading: Promise<void> | null = null;

  constructor(private readonly contentDir: string = CONTENT_DIR) {}

  async onModuleInit() {
    await this.ensureLoaded();
  }

  /** Loads the catalogs once; callers in other modules' init hooks await this */
  ensureLoaded(): Promise<void> {
    if (!this.loading) this.loading = this.loadAll();
    return this.loading;
  }

  async loadAll(): Promise<void> {
    const [gamesList, achievementsList] = await Promise.all([
      readCatalog(this.contentDir, 'games.json', GameDefinitionSchema),
      readCatalog(this.contentDir, 'achievements.json', AchievementDefinitionSchema),
    ]);

    this.games = new Map(gamesList.map((g) => [g.id, g]));
    this.achievements = new Map(achievementsList.map((a) => [a.code, a]));
    this.logger.log(
      `Loaded ${this.games.size} games, ${this.achievements.size} achievements`,
    );
  }

  getGames(): GameDefinition[] {
    return [...this.games.values()];
  }

  getGame(gameId: string): GameDefinition | undefined {
    return this.games.get(gameId);
  }

  getAchievements(): AchievementDefinition[] {
    return [...this.achievements.values()];
  }
}
