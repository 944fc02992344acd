import { z } from 'zod';
import { usernameField } from '../../profiles/dto/update-profile.dto.js';

export const LoginBodySchema = z.object({
  wallet_address: z.string().trim().min(1).max(128),
  username: usernameField.optional(),
});

export type LoginBody = z.infer<typeof LoginBodySchema>;
