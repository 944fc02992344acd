import { z } from 'zod';

export const AwardAchievementBodySchema = z.object({
  code: z.string().trim().min(1).max(64),
});

export type AwardAchievementBody = z.infer<typeof AwardAchievementBodySchema>;
