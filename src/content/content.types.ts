import { z } from 'zod';
import { SKILL } from '../db/types/index.js';

export const GameDefinitionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  rounds: z.number().int().min(1),
  rewards: z.object({
    points: z.number().int().min(0),
    skill: z.enum(SKILL),
    skillValue: z.number().int().min(0),
  }),
});
export type GameDefinition = z.infer<typeof GameDefinitionSchema>;

export const AchievementDefinitionSchema = z.object({
  code: z.string().regex(/^[a-z0-9_]+$/),
  title: z.string().min(1),
  description: z.string().nullable().default(null),
  points: z.number().int().min(0).default(0),
});
export type AchievementDefinition = z.infer<typeof AchievementDefinitionSchema>;
