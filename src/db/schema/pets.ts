import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { profiles } from './profiles.js';
import { rarityEnum } from './enums.js';

export const pets = pgTable(
  'pets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerWallet: text('owner_wallet')
      .notNull()
      .references(() => profiles.walletAddress, { onDelete: 'cascade' }),
    name: text('name').notNull().default('Gotchi'),
    rarity: rarityEnum('rarity').notNull().default('common'),
    social: integer('social').notNull().default(0),
    trivia: integer('trivia').notNull().default(0),
    science: integer('science').notNull().default(0),
    code: integer('code').notNull().default(0),
    trenches: integer('trenches').notNull().default(0),
    streak: integer('streak').notNull().default(0),
    lastPlayedAt: timestamp('last_played_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index('pets_owner_created_idx').on(table.ownerWallet, table.createdAt)],
);
