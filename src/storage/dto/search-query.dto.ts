import { z } from 'zod';
import { queryNumber } from '../../common/zod-schemas.js';

const queryText = z.string().trim().min(1).max(500);
const searchLimit = queryNumber(z.coerce.number().int().min(1).max(100)).default(20);

export const KeywordSearchQuerySchema = z.object({
  q: queryText,
  limit: searchLimit,
});

export type KeywordSearchQuery = z.infer<typeof KeywordSearchQuerySchema>;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export const SemanticSearchQuerySchema = z.object({
  q: queryText,
  limit: searchLimit,
  similarity_threshold: queryNumber(z.coerce.number().min(0).max(1)).default(
    DEFAULT_SIMILARITY_THRESHOLD,
  ),
});

export type SemanticSearchQuery = z.infer<typeof SemanticSearchQuerySchema>;

export const ReindexBodySchema = z.object({
  limit: z.number().int().min(1).max(1000).default(100),
});

export type ReindexBody = z.infer<typeof ReindexBodySchema>;
