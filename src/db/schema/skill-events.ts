import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { pets } from './pets.js';
import { dataCategoryEnum } from './enums.js';

// One row per skill change: a finished minigame, an external data import.
export const skillEvents = pgTable(
  'skill_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    petId: uuid('pet_id')
      .notNull()
      .references(() => pets.id, { onDelete: 'cascade' }),
    source: text('source').notNull(),
    skill: dataCategoryEnum('skill').notNull(),
    delta: integer('delta').notNull().default(0),
    points: integer('points').notNull().default(0),
    rawData: jsonb('raw_data').$type<Record<string, unknown>>(),
    comment: text('comment'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index('skill_events_pet_created_idx').on(table.petId, table.createdAt)],
);
