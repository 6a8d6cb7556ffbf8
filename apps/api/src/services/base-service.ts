import {withWriteLock, type DatabaseExecutor} from '@theater/database';
import type {ServiceContext} from './types';

export abstract class BaseService {
  protected context: ServiceContext;

  constructor(database: DatabaseExecutor) {
    this.context = {
      database,
    };
  }

  protected get database() {
    return this.context.database;
  }

  /**
   * Runs `work` in a transaction. Write transactions on one database run
   * one after another; a failed transaction is rolled back before the next
   * one starts.
   */
  protected transaction<T>(
    work: (tx: DatabaseExecutor) => Promise<T>,
  ): Promise<T> {
    const database = this.database;
    return withWriteLock(database, () =>
      database.transaction(async tx => work(tx)),
    );
  }
}
