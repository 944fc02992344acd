import { z } from 'zod';

export const ListSkillEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type ListSkillEventsQuery = z.infer<typeof ListSkillEventsQuerySchema>;
