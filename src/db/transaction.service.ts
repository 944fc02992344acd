import { Inject, Injectable } from '@nestjs/common';
import { DB, type DrizzleDB, type DrizzleTx } from './db.tokens.js';

/** Runs a unit of work in one Postgres transaction; repositories accept the tx. */
@Injectable()
export class TransactionService {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  run<T>(work: (tx: DrizzleTx) => Promise<T>): Promise<T> {
    return this.db.transaction(work);
  }
}
