import { z } from 'zod';

export const CompleteGameBodySchema = z.object({
  pet_id: z.string().trim().min(1),
  score: z.number().int().min(0).max(1000000).optional(),
});

export type CompleteGameBody = z.infer<typeof CompleteGameBodySchema>;
