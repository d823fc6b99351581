import { describe, it, expect } from 'vitest';
import { Dataset } from '../../src/domain/model/Dataset.js';
import { Resource, modelResource } from '../../src/Resource.js';
import { Field } from '../../src/domain/model/Field.js';
import { ManyToManyWidget } from '../../src/domain/widgets/ManyToManyWidget.js';
import { ConfigurationError } from '../../src/domain/errors/RecordSyncError.js';
import type { ObjectStore } from '../../src/domain/ports/ObjectStore.js';
import { createLibrary } from '../support/library.js';
import type { Book } from '../support/library.js';
import { bookResource } from '../support/resources.js';

describe('Resource configuration', () => {
  it('should expose its fields in column order', () => {
    const { books } = createLibrary();
    const resource = bookResource(books, { columnOrder: ['price', 'name', 'id'] });

    expect(resource.getColumnOrder()).toEqual(['price', 'name', 'id']);
    expect(resource.getFields().map((f) => f.attribute)).toEqual(['price', 'name', 'id']);
    expect(resource.getDiffHeaders()).toEqual(['price', 'name', 'id']);
  });

  it('should name its fields', () => {
    const { books } = createLibrary();
    const resource = bookResource(books);
    const [, name] = resource.getFields();

    expect(name && resource.getFieldName(name)).toBe('name');
    expect(() => resource.getFieldName(new Field({ columnName: 'stray' }))).toThrow(
      "Field 'stray' does not exist in this resource",
    );
  });

  it('should identify rows by id unless told otherwise', () => {
    const { books } = createLibrary();
    expect(bookResource(books).getImportIdFields()).toEqual(['id']);
    expect(bookResource(books, { importIdFields: ['name'] }).getImportIdFields()).toEqual(['name']);
  });

  it('should build fields from the schema with declared ones first', () => {
    const { books } = createLibrary();
    const resource = modelResource(books, {
      fields: { title: { attribute: 'name', columnName: 'Title' } },
      options: { exclude: ['name', 'published', 'author', 'categories'] },
    });

    expect(resource.getColumnHeaders()).toEqual(['Title', 'id', 'price']);
  });

  it('should reject identification fields it does not have', async () => {
    const { books } = createLibrary();
    const resource = bookResource(books, { importIdFields: ['isbn'] });

    await expect(resource.importData(Dataset.fromRecords([{ id: '', name: 'Dune' }]))).rejects.toThrow(
      "Import id field 'isbn' is not a field with an attribute",
    );
  });

  it('should reject a column order naming unknown fields', () => {
    const { books } = createLibrary();
    expect(() => bookResource(books, { columnOrder: ['isbn'] })).toThrow(ConfigurationError);
  });

  it('should reject exporters and importers for unknown fields', () => {
    const { books } = createLibrary();
    expect(() => bookResource(books, undefined, { exporters: { isbn: () => '' } })).toThrow(
      "exporters names unknown field 'isbn'",
    );
    expect(() => bookResource(books, undefined, { importers: { isbn: () => undefined } })).toThrow(
      "importers names unknown field 'isbn'",
    );
  });

  it('should refuse many-to-many fields on a store without relation support', () => {
    const { books, categories } = createLibrary();
    const plain: ObjectStore<Book> = {
      create: (row) => books.create(row),
      find: (criteria) => books.find(criteria),
      save: (instance) => books.save(instance),
      delete: (instance) => books.delete(instance),
      iterate: () => books.iterate(),
      identify: (instance) => books.identify(instance),
      describe: (instance) => books.describe(instance),
    };

    expect(
      () =>
        new Resource({
          store: plain,
          fields: { categories: { attribute: 'categories', widget: new ManyToManyWidget({ store: categories }) } },
        }),
    ).toThrow("Field 'categories' is many-to-many but the store cannot read or write relations");
  });

  it('should let a subclass override hooks', async () => {
    const { books } = createLibrary();

    class ArchiveResource extends Resource<Book> {
      override forDelete(): Promise<boolean> {
        return Promise.resolve(true);
      }
    }

    const resource = new ArchiveResource({ store: books, fields: { id: { attribute: 'id' } } });
    const result = await resource.importData(Dataset.fromRecords([{ id: '' }]));

    expect(result.rows[0]?.importType).toBe('skip');
  });
});
