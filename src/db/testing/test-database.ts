// In-process Postgres (PGlite with pgvector) for repository specs

import { PGlite } from '@electric-sql/pglite';
import { vector } from '@electric-sql/pglite/vector';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import { readFile } from 'fs/promises';
import { join } from 'path';
import * as schema from '../schema/index.js';
import { EMBEDDING_DIMENSIONS } from '../types/index.js';
import type { DrizzleDB } from '../db.tokens.js';

export const MIGRATION_FILE = join(__dirname, '..', '..', '..', 'drizzle', '0000_datagotchi.sql');

export interface TestDatabase {
  db: DrizzleDB;
  /** Empties every table */
  reset(): Promise<void>;
  close(): Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = await PGlite.create({ extensions: { vector } });
  await client.exec(await readFile(MIGRATION_FILE, 'utf-8'));
  const db: DrizzleDB = drizzle(client, { schema });

  return {
    db,
    reset: async () => {
      await db.execute(sql`TRUNCATE profiles, achievements CASCADE`);
    },
    close: () => client.close(),
  };
}

/** A vector of the embedding width with the given leading components */
export function embeddingOf(...head: number[]): number[] {
  const values = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);
  head.forEach((v, i) => {
    values[i] = v;
  });
  return values;
}
