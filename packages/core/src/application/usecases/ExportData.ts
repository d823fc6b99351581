import { Dataset } from '../../domain/model/Dataset.js';
import type { ResourceContext } from '../ResourceContext.js';

/** Use case: export objects as dataset rows, one object in memory at a time. */
export class ExportData<T extends object, Tx = unknown> {
  constructor(private readonly ctx: ResourceContext<T, Tx>) {}

  /** Column labels in column order. */
  headers(): string[] {
    return this.ctx.columnOrder.map((name) => this.ctx.getField(name).columnName);
  }

  /** Exported values of one object, in column order. */
  async exportInstance(instance: T): Promise<string[]> {
    const values: string[] = [];
    for (const name of this.ctx.columnOrder) {
      values.push(await this.ctx.exportField(name, instance));
    }
    return values;
  }

  /** Lazily yield one row per object; defaults to every object in the store. */
  async *rows(objects?: AsyncIterable<T> | Iterable<T>): AsyncGenerator<string[]> {
    let rowCount = 0;
    for await (const instance of objects ?? this.ctx.store.iterate()) {
      yield await this.exportInstance(instance);
      rowCount++;
    }
    this.ctx.eventBus.emit({ type: 'export:completed', rowCount, timestamp: Date.now() });
  }

  /** Collect every exported row into a dataset headed by the column labels. */
  async execute(objects?: AsyncIterable<T> | Iterable<T>): Promise<Dataset> {
    const dataset = new Dataset(this.headers());
    for await (const values of this.rows(objects)) {
      dataset.append(values);
    }
    return dataset;
  }
}
