import { z } from 'zod';

export const usernameField = z
  .string()
  .trim()
  .min(3)
  .max(32)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may contain letters, digits, _ . and - only');

export const UpdateProfileBodySchema = z.object({
  username: usernameField,
});

export type UpdateProfileBody = z.infer<typeof UpdateProfileBodySchema>;
