import { z } from 'zod';

export const ListInstancesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListInstancesQuery = z.infer<typeof ListInstancesQuerySchema>;

export const ListKnowledgeQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListKnowledgeQuery = z.infer<typeof ListKnowledgeQuerySchema>;
