import type { TransactionManager } from '@recordsync/core';
import type { Sequelize, Transaction, TransactionOptions } from 'sequelize';

/**
 * Unmanaged Sequelize transactions. The import orchestrator owns the
 * handle and closes it through exactly one `commit()` or `rollback()`.
 */
export class SequelizeTransactionManager implements TransactionManager<Transaction> {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly options: TransactionOptions = {},
  ) {}

  begin(): Promise<Transaction> {
    return this.sequelize.transaction(this.options);
  }

  commit(transaction: Transaction): Promise<void> {
    return transaction.commit();
  }

  rollback(transaction: Transaction): Promise<void> {
    return transaction.rollback();
  }
}
