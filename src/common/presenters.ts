// Row → wire format. The API speaks snake_case JSON with ISO timestamps.

import type {
  AchievementRow,
  DataInstanceRow,
  ImageRow,
  KnowledgeRecord,
  PetRow,
  ProfileRow,
  SkillEventRow,
} from '../db/types/index.js';
import type { Metadata } from '../db/schema/index.js';

export interface ProfileResponse {
  wallet_address: string;
  username: string;
  points: number;
  studio_unlocked: boolean;
  created_at: string;
}

export interface PetResponse {
  id: string;
  owner_wallet: string;
  name: string;
  rarity: PetRow['rarity'];
  social: number;
  trivia: number;
  science: number;
  code: number;
  trenches: number;
  streak: number;
  last_played_at: string | null;
  created_at: string;
}

export interface AchievementResponse {
  id: string;
  code: string;
  title: string;
  description: string | null;
  points: number;
}

export interface PetAchievementResponse extends AchievementResponse {
  achieved_at: string;
}

export interface SkillEventResponse {
  id: string;
  pet_id: string;
  source: string;
  skill: SkillEventRow['skill'];
  delta: number;
  points: number;
  raw_data: Record<string, unknown> | null;
  comment: string | null;
  created_at: string;
}

export interface DataInstanceSummary {
  id: string;
  pet_id: string;
  content: string;
  content_type: string;
  metadata: Metadata;
  category: DataInstanceRow['category'];
  tags: string[];
  created_at: string;
}

export interface KnowledgeResponse {
  id: string;
  data_instance_id: string;
  url: string | null;
  title: string | null;
  content: string | null;
  metadata: Metadata;
  category: KnowledgeRecord['category'];
  tags: string[];
  created_at: string;
}

export interface ImageResponse {
  id: string;
  data_instance_id: string;
  image_url: string;
  alt_text: string | null;
  metadata: Metadata;
  created_at: string;
}

export interface DataInstanceResponse extends DataInstanceSummary {
  knowledge: KnowledgeResponse[];
  images: ImageResponse[];
}

export function presentProfile(row: ProfileRow): ProfileResponse {
  return {
    wallet_address: row.walletAddress,
    username: row.username,
    points: row.points,
    studio_unlocked: row.studioUnlocked,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentPet(row: PetRow): PetResponse {
  return {
    id: row.id,
    owner_wallet: row.ownerWallet,
    name: row.name,
    rarity: row.rarity,
    social: row.social,
    trivia: row.trivia,
    science: row.science,
    code: row.code,
    trenches: row.trenches,
    streak: row.streak,
    last_played_at: row.lastPlayedAt?.toISOString() ?? null,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentAchievement(row: AchievementRow): AchievementResponse {
  return {
    id: row.id,
    code: row.code,
    title: row.title,
    description: row.description,
    points: row.points,
  };
}

export function presentPetAchievement(record: {
  achievement: AchievementRow;
  achievedAt: Date;
}): PetAchievementResponse {
  return {
    ...presentAchievement(record.achievement),
    achieved_at: record.achievedAt.toISOString(),
  };
}

export function presentSkillEvent(row: SkillEventRow): SkillEventResponse {
  return {
    id: row.id,
    pet_id: row.petId,
    source: row.source,
    skill: row.skill,
    delta: row.delta,
    points: row.points,
    raw_data: row.rawData,
    comment: row.comment,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentInstance(row: DataInstanceRow): DataInstanceSummary {
  return {
    id: row.id,
    pet_id: row.petId,
    content: row.content,
    content_type: row.contentType,
    metadata: row.metadata,
    category: row.category,
    tags: row.tags,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentKnowledge(row: KnowledgeRecord): KnowledgeResponse {
  return {
    id: row.id,
    data_instance_id: row.dataInstanceId,
    url: row.url,
    title: row.title,
    content: row.content,
    metadata: row.metadata,
    category: row.category,
    tags: row.tags,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentImage(row: ImageRow): ImageResponse {
  return {
    id: row.id,
    data_instance_id: row.dataInstanceId,
    image_url: row.imageUrl,
    alt_text: row.altText,
    metadata: row.metadata,
    created_at: row.createdAt.toISOString(),
  };
}

export function presentInstanceWithContent(
  row: DataInstanceRow,
  knowledgeRows: KnowledgeRecord[],
  imageRows: ImageRow[],
): DataInstanceResponse {
  return {
    ...presentInstance(row),
    knowledge: knowledgeRows.map(presentKnowledge),
    images: imageRows.map(presentImage),
  };
}

export interface SemanticMatchResponse {
  id: string;
  data_instance_id: string;
  pet_id: string;
  url: string | null;
  title: string | null;
  content: string | null;
  category: KnowledgeRecord['category'];
  tags: string[];
  metadata: Metadata;
  created_at: string;
  similarity: number;
}

export function presentSemanticMatch(
  row: KnowledgeRecord & { petId: string; similarity: number },
): SemanticMatchResponse {
  return {
    id: row.id,
    data_instance_id: row.dataInstanceId,
    pet_id: row.petId,
    url: row.url,
    title: row.title,
    content: row.content,
    category: row.category,
    tags: row.tags,
    metadata: row.metadata,
    created_at: row.createdAt.toISOString(),
    similarity: row.similarity,
  };
}
