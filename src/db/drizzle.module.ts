import {
  Global,
  Inject,
  Logger,
  Module,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';
import { AppConfigService } from '../config/app-config.service.js';
import { TransactionService } from './transaction.service.js';
import { DB, PG_POOL, type DrizzleDB } from './db.tokens.js';

export { DB, PG_POOL } from './db.tokens.js';
export type { DrizzleDB, DrizzleTx, DbExecutor } from './db.tokens.js';

@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      inject: [AppConfigService],
      useFactory: (config: AppConfigService) =>
        new Pool({ connectionString: config.get().databaseUrl }),
    },
    {
      provide: DB,
      inject: [PG_POOL],
      useFactory: (pool: Pool): DrizzleDB => drizzle(pool, { schema }),
    },
    TransactionService,
  ],
  exports: [DB, TransactionService],
})
export class DrizzleModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DrizzleModule.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('Postgres pool closed');
  }
}
