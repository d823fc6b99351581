import type { ImportTotals } from '../model/Result.js';
import type { RowResult } from '../model/RowResult.js';

/** Emitted when `importData()` begins, after the transaction (if any) is open. */
export interface ImportStartedEvent {
  readonly type: 'import:started';
  readonly dryRun: boolean;
  readonly useTransactions: boolean;
  readonly timestamp: number;
}

/** Emitted for each row that finished without error. */
export interface RowImportedEvent {
  readonly type: 'row:imported';
  /** Zero-based position of the row in the dataset. */
  readonly rowIndex: number;
  readonly result: RowResult;
  readonly timestamp: number;
}

/** Emitted for each row that failed. */
export interface RowFailedEvent {
  readonly type: 'row:failed';
  readonly rowIndex: number;
  readonly error: string;
  readonly result: RowResult;
  readonly timestamp: number;
}

/** Emitted when the batch transaction commits. */
export interface ImportCommittedEvent {
  readonly type: 'import:committed';
  readonly timestamp: number;
}

/** Emitted when the batch transaction rolls back. */
export interface ImportRolledBackEvent {
  readonly type: 'import:rolledBack';
  readonly reason: 'dry-run' | 'errors' | 'raised';
  readonly timestamp: number;
}

/** Emitted when `importData()` returns a result. */
export interface ImportCompletedEvent {
  readonly type: 'import:completed';
  readonly totals: ImportTotals;
  readonly hasErrors: boolean;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted when an export has written its last row. */
export interface ExportCompletedEvent {
  readonly type: 'export:completed';
  readonly rowCount: number;
  readonly timestamp: number;
}

export type DomainEvent =
  | ImportStartedEvent
  | RowImportedEvent
  | RowFailedEvent
  | ImportCommittedEvent
  | ImportRolledBackEvent
  | ImportCompletedEvent
  | ExportCompletedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
