import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema/index.js';

export const DB = Symbol('DB');
export const PG_POOL = Symbol('PG_POOL');
/** Any Postgres driver: node-postgres in the app, PGlite in repository specs */
export type DrizzleDB = PgDatabase<PgQueryResultHKT, typeof schema>;
export type DrizzleTx = Parameters<Parameters<DrizzleDB['transaction']>[0]>[0];
/** Either the root handle or an open transaction */
export type DbExecutor = DrizzleDB | DrizzleTx;
