import type { InferInsertModel, InferSelectModel } from 'drizzle-orm';
import type {
  achievements,
  dataInstances,
  images,
  knowledge,
  petAchievements,
  pets,
  profiles,
  skillEvents,
} from '../schema/index.js';

export type ProfileRow = InferSelectModel<typeof profiles>;
export type PetRow = InferSelectModel<typeof pets>;
export type NewPetRow = InferInsertModel<typeof pets>;
export type AchievementRow = InferSelectModel<typeof achievements>;
export type PetAchievementRow = InferSelectModel<typeof petAchievements>;
export type SkillEventRow = InferSelectModel<typeof skillEvents>;
export type NewSkillEventRow = InferInsertModel<typeof skillEvents>;
export type DataInstanceRow = InferSelectModel<typeof dataInstances>;
export type NewDataInstanceRow = InferInsertModel<typeof dataInstances>;
export type KnowledgeRow = InferSelectModel<typeof knowledge>;
export type NewKnowledgeRow = InferInsertModel<typeof knowledge>;
export type ImageRow = InferSelectModel<typeof images>;
export type NewImageRow = InferInsertModel<typeof images>;

/** Knowledge as returned by list endpoints: never carries the vector */
export type KnowledgeRecord = Omit<KnowledgeRow, 'embedding'>;
