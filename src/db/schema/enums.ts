import { pgEnum } from 'drizzle-orm/pg-core';
import { DATA_CATEGORY, RARITY } from '../types/enums.js';

export const rarityEnum = pgEnum('rarity_t', RARITY);
export const dataCategoryEnum = pgEnum('data_category_t', DATA_CATEGORY);
