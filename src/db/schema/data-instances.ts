import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
  vector,
} from 'drizzle-orm/pg-core';
import { pets } from './pets.js';
import { dataCategoryEnum } from './enums.js';
import { EMBEDDING_DIMENSIONS } from '../types/enums.js';

export type Metadata = Record<string, unknown>;

export const dataInstances = pgTable(
  'data_instances',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    petId: uuid('pet_id')
      .notNull()
      .references(() => pets.id, { onDelete: 'cascade' }),
    content: text('content').notNull(),
    contentType: text('content_type').notNull(),
    metadata: jsonb('metadata').$type<Metadata>().notNull().default({}),
    category: dataCategoryEnum('category').notNull().default('general'),
    tags: text('tags').array().notNull().default([]),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index('data_instances_pet_created_idx').on(table.petId, table.createdAt)],
);

// url and content are both optional, but a row always has at least one
export const knowledge = pgTable(
  'knowledge',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    dataInstanceId: uuid('data_instance_id')
      .notNull()
      .references(() => dataInstances.id, { onDelete: 'cascade' }),
    url: text('url'),
    title: text('title'),
    content: text('content'),
    metadata: jsonb('metadata').$type<Metadata>().notNull().default({}),
    category: dataCategoryEnum('category').notNull().default('general'),
    tags: text('tags').array().notNull().default([]),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    index('knowledge_instance_idx').on(table.dataInstanceId),
    index('knowledge_embedding_idx').using(
      'hnsw',
      table.embedding.op('vector_cosine_ops'),
    ),
  ],
);

export const images = pgTable(
  'images',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    dataInstanceId: uuid('data_instance_id')
      .notNull()
      .references(() => dataInstances.id, { onDelete: 'cascade' }),
    imageUrl: text('image_url').notNull(),
    altText: text('alt_text'),
    metadata: jsonb('metadata').$type<Metadata>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index('images_instance_idx').on(table.dataInstanceId)],
);
