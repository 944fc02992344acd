export { rarityEnum, dataCategoryEnum } from './enums.js';
export { profiles } from './profiles.js';
export { pets } from './pets.js';
export { achievements, petAchievements } from './achievements.js';
export { skillEvents } from './skill-events.js';
export { dataInstances, knowledge, images } from './data-instances.js';
export type { Metadata } from './data-instances.js';
