export const RARITY = ['common', 'rare', 'epic', 'legendary'] as const;
export type Rarity = (typeof RARITY)[number];

export const SKILL = ['social', 'trivia', 'science', 'code', 'trenches'] as const;
export type Skill = (typeof SKILL)[number];

// Every skill is also a data category; 'general' has no skill attached.
export const DATA_CATEGORY = [...SKILL, 'general'] as const;
export type DataCategory = (typeof DATA_CATEGORY)[number];

export const KNOWLEDGE_SOURCE = ['manual', 'scraped', 'scrape_failed'] as const;
export type KnowledgeSource = (typeof KNOWLEDGE_SOURCE)[number];

export const EMBEDDING_DIMENSIONS = 1536;
