/** Machine-readable error codes raised by the reconciliation engine. */
export type RecordSyncErrorCode =
  | 'CONVERSION'
  | 'RESOLUTION'
  | 'PERSISTENCE'
  | 'HOOK'
  | 'CONFIGURATION'
  | 'FORMAT';

/** Base class for every error the engine raises on purpose. */
export class RecordSyncError extends Error {
  readonly code: RecordSyncErrorCode;

  constructor(code: RecordSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordSyncError';
    this.code = code;
  }
}

/** A cell value cannot be coerced to a field's native type. */
export class ConversionError extends RecordSyncError {
  readonly column?: string;
  readonly value?: unknown;

  constructor(message: string, details?: { column?: string; value?: unknown; cause?: unknown }) {
    super('CONVERSION', message, { cause: details?.cause });
    this.name = 'ConversionError';
    this.column = details?.column;
    this.value = details?.value;
  }
}

/** Identification fields are missing from the row or match more than one object. */
export class ResolutionError extends RecordSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESOLUTION', message, options);
    this.name = 'ResolutionError';
  }
}

/** The store rejected a save, delete or relation write. */
export class PersistenceError extends RecordSyncError {
  readonly operation: 'save' | 'delete' | 'relation';

  constructor(operation: 'save' | 'delete' | 'relation', message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', message, options);
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

/** A user-supplied hook threw. */
export class HookError extends RecordSyncError {
  readonly hook: string;

  constructor(hook: string, cause: unknown) {
    super('HOOK', `Hook '${hook}' failed: ${describeCause(cause)}`, { cause });
    this.name = 'HookError';
    this.hook = hook;
  }
}

/** A resource declaration or import option is invalid. */
export class ConfigurationError extends RecordSyncError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/** Input text cannot be read as a dataset. */
export class FormatError extends RecordSyncError {
  /** One-based line or record number, when known. */
  readonly line?: number;

  constructor(message: string, details?: { line?: number; cause?: unknown }) {
    super('FORMAT', message, { cause: details?.cause });
    this.name = 'FormatError';
    this.line = details?.line;
  }
}

/** Human-readable message of any thrown value. */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
