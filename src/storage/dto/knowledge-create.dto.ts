import { z } from 'zod';
import {
  categoryField,
  httpUrl,
  metadataField,
  tagsField,
} from '../../common/zod-schemas.js';

export const KnowledgeCreateSchema = z.object({
  url: httpUrl.nullish(),
  content: z.string().nullish(),
  title: z.string().max(500).nullish(),
  metadata: metadataField,
  category: categoryField,
  tags: tagsField,
});

export type KnowledgeCreate = z.infer<typeof KnowledgeCreateSchema>;

export const KnowledgeCreateListSchema = z.array(KnowledgeCreateSchema).max(100);
