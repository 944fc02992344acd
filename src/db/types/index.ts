export * from './enums.js';
export type * from './rows.js';
