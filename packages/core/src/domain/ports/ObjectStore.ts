import type { TransactionManager } from './TransactionManager.js';
import type { Row } from '../model/Row.js';

/** Exact-match lookup criteria: attribute name → value. */
export type Criteria = Readonly<Record<string, unknown>>;

/** Options accepted by `ObjectStore.find()`. */
export interface FindOptions<Tx = unknown> {
  /** Transaction the lookup runs in, when one is open. */
  readonly transaction?: Tx;
  /** Upper bound on the number of returned objects. */
  readonly limit?: number;
}

/** Kind of a persisted attribute, used to pick a widget when fields are built from a schema. */
export type AttributeKind =
  | 'string'
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'foreignKey'
  | 'manyToMany';

/** Description of one attribute of a stored object type. */
export interface AttributeDescriptor {
  readonly name: string;
  readonly kind: AttributeKind;
  /** For relation kinds: the store holding the related objects. */
  readonly target?: ObjectStore<object>;
}

/**
 * Port for the domain-object store.
 *
 * Implement this interface to reconcile rows against a database, an API or
 * any other persistence layer. The engine never queries beyond `find()` and
 * never iterates beyond `iterate()`.
 *
 * Write methods receive the open transaction handle, if any; a store without
 * a `transactions` manager ignores it.
 */
export interface ObjectStore<T extends object, Tx = unknown> {
  /** Allocate a fresh, unsaved instance for a row that matched nothing. */
  create(row: Row): T;
  /** Return the objects whose attributes equal every criteria value. */
  find(criteria: Criteria, options?: FindOptions<Tx>): Promise<readonly T[]>;
  /** Insert or update an instance. */
  save(instance: T, transaction?: Tx): Promise<void>;
  /** Remove a persisted instance. */
  delete(instance: T, transaction?: Tx): Promise<void>;
  /** Iterate every stored object lazily, one at a time. */
  iterate(): AsyncIterable<T>;
  /** Persisted identity of an instance, `null` while unsaved. */
  identify(instance: T): string | number | null;
  /** Text representation of an instance (e.g. for audit logs). */
  describe(instance: T): string;
  /** Current members of a multi-valued relation. */
  getRelated?(instance: T, attribute: string, transaction?: Tx): Promise<readonly object[]>;
  /** Replace the members of a multi-valued relation. The owner must already be saved. */
  setRelated?(instance: T, attribute: string, members: readonly object[], transaction?: Tx): Promise<void>;
  /** Attribute descriptors, for building fields from the schema. */
  schema?(): readonly AttributeDescriptor[];
  /** Transaction support. Required when an import runs with `useTransactions`. */
  readonly transactions?: TransactionManager<Tx>;
}
