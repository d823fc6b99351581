import { Op } from 'sequelize';
import type { ModelStatic, Model, Transaction, TransactionOptions } from 'sequelize';
import { ConfigurationError } from '@recordsync/core';
import type { ObjectStore, Criteria, FindOptions, AttributeDescriptor } from '@recordsync/core';
import { SequelizeTransactionManager } from './SequelizeTransactionManager.js';
import { attributeKind } from './attributeKind.js';

type Key = string | number;
type WhereValue = string | number | boolean | Date | null;

/** Many-to-many relation stored as rows of a join model. */
export interface JoinRelation {
  /** Join model holding one row per (owner, member) pair. */
  readonly through: ModelStatic<Model>;
  /** Join column referencing the owner's primary key. */
  readonly ownerKey: string;
  /** Join column referencing the member's primary key. */
  readonly memberKey: string;
  /** Store of the member model. */
  readonly target: SequelizeObjectStore;
}

export interface SequelizeObjectStoreOptions {
  /** Multi-valued relations, keyed by the attribute name fields refer to. */
  readonly relations?: Readonly<Record<string, JoinRelation>>;
  /** Rows fetched per query while iterating. Default: 500. */
  readonly pageSize?: number;
  /** Text representation of an instance. Default: `<Model> object (<pk>)`. */
  readonly describe?: (instance: Model) => string;
  /** Options for every transaction the store begins (e.g. isolation level). */
  readonly transactionOptions?: TransactionOptions;
}

function isKey(value: unknown): value is Key {
  return typeof value === 'string' || typeof value === 'number';
}

function toWhereValue(attribute: string, value: unknown): WhereValue {
  if (value === null || value === undefined) return null;
  if (isKey(value) || typeof value === 'boolean' || value instanceof Date) return value;
  throw new ConfigurationError(`Cannot look up '${attribute}' by a value of type ${typeof value}`);
}

/**
 * Object store backed by a Sequelize model.
 *
 * Lookups and writes run inside the transaction handed in by the engine.
 * Many-to-many attributes are declared through `relations` and read or
 * replaced through their join model.
 *
 * @example
 * ```typescript
 * const tags = new SequelizeObjectStore(Tag);
 * const books = new SequelizeObjectStore(Book, {
 *   relations: { tags: { through: BookTag, ownerKey: 'bookId', memberKey: 'tagId', target: tags } },
 * });
 * const resource = modelResource(books);
 * ```
 */
export class SequelizeObjectStore implements ObjectStore<Model, Transaction> {
  readonly transactions: SequelizeTransactionManager;
  private readonly relations: ReadonlyMap<string, JoinRelation>;
  private readonly pageSize: number;
  private readonly describeInstance: ((instance: Model) => string) | undefined;

  constructor(
    readonly model: ModelStatic<Model>,
    options: SequelizeObjectStoreOptions = {},
  ) {
    const { sequelize } = model;
    if (!sequelize) {
      throw new ConfigurationError(`Model '${model.name}' is not attached to a Sequelize instance`);
    }
    this.transactions = new SequelizeTransactionManager(sequelize, options.transactionOptions);
    this.relations = new Map(Object.entries(options.relations ?? {}));
    this.pageSize = options.pageSize ?? 500;
    this.describeInstance = options.describe;
  }

  get primaryKey(): string {
    return this.model.primaryKeyAttribute;
  }

  create(): Model {
    return this.model.build();
  }

  async find(criteria: Criteria, options: FindOptions<Transaction> = {}): Promise<readonly Model[]> {
    const where: Record<string, WhereValue> = {};
    for (const [attribute, value] of Object.entries(criteria)) {
      where[attribute] = toWhereValue(attribute, value);
    }
    return this.model.findAll({ where, transaction: options.transaction, limit: options.limit });
  }

  /** Rows whose primary key is one of `keys`, in key order. */
  async findByKeys(keys: readonly Key[], transaction?: Transaction): Promise<Model[]> {
    if (keys.length === 0) return [];
    return this.model.findAll({
      where: { [this.primaryKey]: [...keys] },
      order: [[this.primaryKey, 'ASC']],
      transaction,
    });
  }

  async save(instance: Model, transaction?: Transaction): Promise<void> {
    await instance.save({ transaction });
  }

  async delete(instance: Model, transaction?: Transaction): Promise<void> {
    await instance.destroy({ transaction });
  }

  /** Pages by primary key: each page starts after the last key of the previous one. */
  async *iterate(): AsyncIterable<Model> {
    let after: Key | null = null;
    for (;;) {
      const page = await this.model.findAll({
        where: after === null ? {} : { [this.primaryKey]: { [Op.gt]: after } },
        order: [[this.primaryKey, 'ASC']],
        limit: this.pageSize,
      });
      yield* page;
      const last = page.at(-1);
      if (page.length < this.pageSize || last === undefined) return;
      after = this.identify(last);
      if (after === null) return;
    }
  }

  identify(instance: Model): Key | null {
    const id: unknown = instance.get(this.primaryKey);
    return isKey(id) ? id : null;
  }

  describe(instance: Model): string {
    if (this.describeInstance) return this.describeInstance(instance);
    return `${this.model.name} object (${String(this.identify(instance))})`;
  }

  async getRelated(instance: Model, attribute: string, transaction?: Transaction): Promise<readonly Model[]> {
    const relation = this.relation(attribute);
    const ownerId = this.identify(instance);
    if (ownerId === null) return [];

    const links = await relation.through.findAll({ where: { [relation.ownerKey]: ownerId }, transaction });
    const memberIds: Key[] = links.map((link): unknown => link.get(relation.memberKey)).filter(isKey);
    return relation.target.findByKeys(memberIds, transaction);
  }

  async setRelated(
    instance: Model,
    attribute: string,
    members: readonly object[],
    transaction?: Transaction,
  ): Promise<void> {
    const relation = this.relation(attribute);
    const ownerId = this.identify(instance);
    if (ownerId === null) {
      throw new Error(`Cannot set '${attribute}' on an unsaved ${this.model.name}`);
    }

    const links = members.map((member) => {
      const memberId: unknown = Reflect.get(member, relation.target.primaryKey);
      if (!isKey(memberId)) {
        throw new Error(`Cannot link an unsaved ${relation.target.model.name} through '${attribute}'`);
      }
      return { [relation.ownerKey]: ownerId, [relation.memberKey]: memberId };
    });

    await relation.through.destroy({ where: { [relation.ownerKey]: ownerId }, transaction });
    if (links.length > 0) {
      await relation.through.bulkCreate(links, { transaction });
    }
  }

  schema(): readonly AttributeDescriptor[] {
    const attributes: AttributeDescriptor[] = Object.entries(this.model.getAttributes()).map(([name, column]) => ({
      name,
      kind: attributeKind(column.type),
    }));
    for (const [name, relation] of this.relations) {
      attributes.push({ name, kind: 'manyToMany', target: relation.target });
    }
    return attributes;
  }

  private relation(attribute: string): JoinRelation {
    const relation = this.relations.get(attribute);
    if (!relation) {
      throw new ConfigurationError(`${this.model.name} has no relation '${attribute}'`);
    }
    return relation;
  }
}
