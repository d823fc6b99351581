/** A fault raised while importing, paired with its diagnostic trace. Immutable. */
export interface CapturedError {
  readonly error: Error;
  readonly traceback: string;
}

/** Normalise any thrown value into a `CapturedError`. */
export function captureError(thrown: unknown): CapturedError {
  const error = thrown instanceof Error ? thrown : new Error(String(thrown));
  return Object.freeze({ error, traceback: error.stack ?? `${error.name}: ${error.message}` });
}
