/** Process-wide defaults shared by every resource. */
export interface Settings {
  /** Whether imports use transactions when neither the call nor the resource decides. */
  readonly useTransactions: boolean;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

function fromEnvironment(): Settings {
  const raw = process.env['RECORDSYNC_USE_TRANSACTIONS'];
  return { useTransactions: raw !== undefined && TRUTHY.includes(raw.trim().toLowerCase()) };
}

let current: Settings = fromEnvironment();

/** Current process-wide settings. */
export function getSettings(): Settings {
  return current;
}

/** Override some settings for the rest of the process. */
export function configureSettings(overrides: Partial<Settings>): Settings {
  current = Object.freeze({ ...current, ...overrides });
  return current;
}

/** Re-read settings from the environment. */
export function resetSettings(): Settings {
  current = Object.freeze(fromEnvironment());
  return current;
}
