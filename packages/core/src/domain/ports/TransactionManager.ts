/**
 * Port for explicit transaction handles.
 *
 * The batch orchestrator calls `begin()` once, threads the handle through
 * every store write, and leaves through exactly one `commit()` or `rollback()`.
 */
export interface TransactionManager<Tx> {
  begin(): Promise<Tx>;
  commit(transaction: Tx): Promise<void>;
  rollback(transaction: Tx): Promise<void>;
}
