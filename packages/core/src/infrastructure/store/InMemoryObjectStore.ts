import type { ObjectStore, Criteria, FindOptions, AttributeDescriptor } from '../../domain/ports/ObjectStore.js';
import type { TransactionManager } from '../../domain/ports/TransactionManager.js';
import type { Row } from '../../domain/model/Row.js';

type Id = string | number;

/** Handle of an open in-memory transaction. */
export interface InMemoryTransaction {
  readonly id: number;
}

export interface InMemoryObjectStoreOptions<T extends object> {
  /** Allocates a fresh instance for `create()`. */
  readonly factory: (row: Row) => T;
  /** Type name used by the default `describe()`. Default: `'Object'`. */
  readonly name?: string;
  /** Identity attribute. Default: `'id'`. */
  readonly primaryKey?: string;
  /** Attribute descriptors returned by `schema()`. */
  readonly schema?: readonly AttributeDescriptor[];
  /** Text representation of an instance. */
  readonly describe?: (instance: T) => string;
  /** Constraint check run before every save; throw to reject it. */
  readonly validate?: (instance: T) => void;
}

interface State<T> {
  readonly objects: Map<Id, T>;
  readonly relations: Map<string, Map<Id, readonly object[]>>;
  readonly nextId: number;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  const scalar = (v: unknown): boolean => typeof v === 'string' || typeof v === 'number';
  return scalar(a) && scalar(b) && String(a) === String(b);
}

function copyOf<T extends object>(instance: T): T {
  const copy: T = Object.create(Object.getPrototypeOf(instance));
  return Object.assign(copy, instance);
}

/**
 * Non-persistent object store. Used as the default stand-in for a database
 * in tests and examples.
 *
 * Hands out copies, so in-place changes to a loaded instance are invisible
 * until `save()`. Transactions snapshot the whole store on `begin()` and
 * restore it on `rollback()`; only one may be open at a time.
 */
export class InMemoryObjectStore<T extends object> implements ObjectStore<T, InMemoryTransaction> {
  readonly transactions: TransactionManager<InMemoryTransaction>;

  private objects = new Map<Id, T>();
  private relations = new Map<string, Map<Id, readonly object[]>>();
  private nextId = 1;
  private open: { readonly transaction: InMemoryTransaction; readonly saved: State<T> } | null = null;
  private readonly issued = new WeakSet<InMemoryTransaction>();
  private transactionCount = 0;

  private readonly factory: (row: Row) => T;
  private readonly name: string;
  private readonly primaryKey: string;
  private readonly descriptors: readonly AttributeDescriptor[] | undefined;
  private readonly describer: ((instance: T) => string) | undefined;
  private readonly validate: ((instance: T) => void) | undefined;

  constructor(options: InMemoryObjectStoreOptions<T>) {
    this.factory = options.factory;
    this.name = options.name ?? 'Object';
    this.primaryKey = options.primaryKey ?? 'id';
    this.descriptors = options.schema;
    this.describer = options.describe;
    this.validate = options.validate;
    this.transactions = {
      begin: () => this.begin(),
      commit: (transaction) => this.commit(transaction),
      rollback: (transaction) => this.rollback(transaction),
    };
  }

  /** Number of stored objects. */
  get size(): number {
    return this.objects.size;
  }

  /** Store instances as they are, assigning ids where missing. For test fixtures. */
  seed(instances: readonly T[]): void {
    for (const instance of instances) {
      this.objects.set(this.assignId(instance), copyOf(instance));
    }
  }

  /** Copies of every stored object, in id order. */
  all(): T[] {
    return this.sortedIds().map((id) => this.copyStored(id));
  }

  create(row: Row): T {
    return this.factory(row);
  }

  /**
   * Reads accept the handle of another store's transaction, as relation
   * lookups made inside that store's batch do; they see every write anyway.
   */
  find(criteria: Criteria, options?: FindOptions<InMemoryTransaction>): Promise<readonly T[]> {
    const transaction = options?.transaction;
    const closed = transaction !== undefined && this.issued.has(transaction) ? this.checkTransaction(transaction) : null;
    if (closed) return Promise.reject(closed);
    const entries = Object.entries(criteria);
    const matches: T[] = [];
    for (const id of this.sortedIds()) {
      const stored = this.copyStored(id);
      if (entries.every(([attribute, value]) => sameValue(Reflect.get(stored, attribute), value))) {
        matches.push(stored);
        if (options?.limit !== undefined && matches.length >= options.limit) break;
      }
    }
    return Promise.resolve(matches);
  }

  save(instance: T, transaction?: InMemoryTransaction): Promise<void> {
    const closed = this.checkTransaction(transaction);
    if (closed) return Promise.reject(closed);
    try {
      this.validate?.(instance);
    } catch (error) {
      return Promise.reject(error);
    }
    this.objects.set(this.assignId(instance), copyOf(instance));
    return Promise.resolve();
  }

  delete(instance: T, transaction?: InMemoryTransaction): Promise<void> {
    const closed = this.checkTransaction(transaction);
    if (closed) return Promise.reject(closed);
    const id = this.identify(instance);
    if (id === null || !this.objects.delete(id)) {
      return Promise.reject(new Error(`${this.name} object (${String(id)}) is not stored`));
    }
    for (const members of this.relations.values()) members.delete(id);
    return Promise.resolve();
  }

  async *iterate(): AsyncIterable<T> {
    for (const id of this.sortedIds()) {
      if (this.objects.has(id)) yield this.copyStored(id);
    }
  }

  identify(instance: T): Id | null {
    const id: unknown = Reflect.get(instance, this.primaryKey);
    return typeof id === 'string' || typeof id === 'number' ? id : null;
  }

  describe(instance: T): string {
    return this.describer ? this.describer(instance) : `${this.name} object (${String(this.identify(instance))})`;
  }

  getRelated(instance: T, attribute: string): Promise<readonly object[]> {
    const id = this.identify(instance);
    if (id === null) return Promise.resolve([]);
    return Promise.resolve(this.relations.get(attribute)?.get(id) ?? []);
  }

  setRelated(
    instance: T,
    attribute: string,
    members: readonly object[],
    transaction?: InMemoryTransaction,
  ): Promise<void> {
    const closed = this.checkTransaction(transaction);
    if (closed) return Promise.reject(closed);
    const id = this.identify(instance);
    if (id === null || !this.objects.has(id)) {
      return Promise.reject(new Error(`${this.name} must be saved before '${attribute}' can be set`));
    }
    const byOwner = this.relations.get(attribute) ?? new Map<Id, readonly object[]>();
    byOwner.set(id, [...members]);
    this.relations.set(attribute, byOwner);
    Reflect.set(instance, attribute, [...members]);
    return Promise.resolve();
  }

  schema(): readonly AttributeDescriptor[] {
    return this.descriptors ?? [];
  }

  private begin(): Promise<InMemoryTransaction> {
    if (this.open) return Promise.reject(new Error('A transaction is already open'));
    this.transactionCount += 1;
    const transaction = { id: this.transactionCount };
    this.open = { transaction, saved: this.snapshotState() };
    this.issued.add(transaction);
    return Promise.resolve(transaction);
  }

  private commit(transaction: InMemoryTransaction): Promise<void> {
    const closed = this.checkTransaction(transaction);
    if (closed) return Promise.reject(closed);
    this.open = null;
    return Promise.resolve();
  }

  private rollback(transaction: InMemoryTransaction): Promise<void> {
    const closed = this.checkTransaction(transaction);
    if (closed) return Promise.reject(closed);
    if (this.open) {
      const { saved } = this.open;
      this.objects = saved.objects;
      this.relations = saved.relations;
      this.nextId = saved.nextId;
    }
    this.open = null;
    return Promise.resolve();
  }

  /** Error for a handle that is not the open transaction, `null` when the call may proceed. */
  private checkTransaction(transaction: InMemoryTransaction | undefined): Error | null {
    if (transaction !== undefined && this.open?.transaction !== transaction) {
      return new Error(`Transaction ${String(transaction.id)} is not open`);
    }
    return null;
  }

  private snapshotState(): State<T> {
    const objects = new Map<Id, T>();
    for (const [id, stored] of this.objects) objects.set(id, copyOf(stored));
    const relations = new Map<string, Map<Id, readonly object[]>>();
    for (const [attribute, byOwner] of this.relations) relations.set(attribute, new Map(byOwner));
    return { objects, relations, nextId: this.nextId };
  }

  private assignId(instance: T): Id {
    const existing = this.identify(instance);
    if (existing !== null) {
      if (typeof existing === 'number' && existing >= this.nextId) this.nextId = existing + 1;
      return existing;
    }
    const id = this.nextId;
    this.nextId += 1;
    Reflect.set(instance, this.primaryKey, id);
    return id;
  }

  private sortedIds(): Id[] {
    return [...this.objects.keys()].sort((a, b) => String(a).localeCompare(String(b), undefined, { numeric: true }));
  }

  private copyStored(id: Id): T {
    const stored = this.objects.get(id);
    if (stored === undefined) throw new Error(`${this.name} object (${String(id)}) is not stored`);
    return copyOf(stored);
  }
}
