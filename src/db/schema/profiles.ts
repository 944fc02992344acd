import { boolean, integer, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

// Wallet address is the primary key: every session starts from a wallet.
export const profiles = pgTable('profiles', {
  walletAddress: text('wallet_address').primaryKey(),
  username: text('username').notNull().unique(),
  points: integer('points').notNull().default(0),
  studioUnlocked: boolean('studio_unlocked').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true })
    .defaultNow()
    .notNull(),
});
