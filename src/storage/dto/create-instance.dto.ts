import { z } from 'zod';
import {
  categoryField,
  httpUrl,
  metadataField,
  tagsField,
} from '../../common/zod-schemas.js';
import { KnowledgeCreateSchema } from './knowledge-create.dto.js';

export const CreateInstanceBodySchema = z.object({
  content: z.string(),
  content_type: z.string().trim().min(1).max(100),
  metadata: metadataField,
  category: categoryField,
  tags: tagsField,
  knowledge_list: z.array(KnowledgeCreateSchema).max(100).default([]),
  image_urls: z.array(httpUrl).max(100).default([]),
});

export type CreateInstanceBody = z.infer<typeof CreateInstanceBodySchema>;
