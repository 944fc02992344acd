import { z } from 'zod';
import { RARITY } from '../../db/types/index.js';

export const petNameField = z.string().trim().min(1).max(32);

export const CreatePetBodySchema = z.object({
  name: petNameField.optional(),
  rarity: z.enum(RARITY).optional(),
});

export type CreatePetBody = z.infer<typeof CreatePetBodySchema>;
