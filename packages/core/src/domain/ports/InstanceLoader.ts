import type { Row } from '../model/Row.js';

/**
 * Port for resolving a row to an existing domain object.
 *
 * Never creates objects. Must return the same object for the same key
 * throughout one batch.
 */
export interface InstanceLoader<T extends object> {
  getInstance(row: Row): Promise<T | null>;
}
