import { z } from 'zod';
import { DATA_CATEGORY } from '../db/types/index.js';

/** Absolute http(s) URL, trimmed */
export const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must use http or https',
  });

/** JSON object; null and absent both read as {} */
export const metadataField = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? {});

/** Coerced query number; a blank value is invalid rather than read as 0 */
export function queryNumber(schema: z.ZodNumber) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema,
  );
}

export const categoryField = z.enum(DATA_CATEGORY).default('general');

export const tagsField = z.array(z.string().trim().min(1).max(64)).max(50).default([]);
