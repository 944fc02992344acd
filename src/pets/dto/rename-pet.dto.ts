import { z } from 'zod';
import { petNameField } from './create-pet.dto.js';

export const RenamePetBodySchema = z.object({
  name: petNameField,
});

export type RenamePetBody = z.infer<typeof RenamePetBodySchema>;
