import { describe, it, expect, afterEach, vi } from 'vitest';
import { Dataset } from '../../src/domain/model/Dataset.js';
import { ConversionError, ConfigurationError, HookError } from '../../src/domain/errors/RecordSyncError.js';
import { Resource, modelResource } from '../../src/Resource.js';
import { configureSettings, resetSettings } from '../../src/config/settings.js';
import type { ObjectStore } from '../../src/domain/ports/ObjectStore.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { createLibrary, author, book, category } from '../support/library.js';
import type { Book } from '../support/library.js';
import { bookResource } from '../support/resources.js';

function recordEvents(resource: { onAny(handler: (event: DomainEvent) => void): unknown }): string[] {
  const seen: string[] = [];
  resource.onAny((event) => {
    seen.push(event.type === 'import:rolledBack' ? `${event.type}(${event.reason})` : event.type);
  });
  return seen;
}

const failingBatch = () =>
  Dataset.fromRecords([
    { id: '', name: 'Emma' },
    { id: 'abc', name: 'Dune' },
  ]);

describe('Transactions', () => {
  afterEach(() => {
    resetSettings();
  });

  describe('dry run', () => {
    it('should leave the store untouched without transactions', async () => {
      const { books } = createLibrary();
      books.seed([book({ id: 1, name: 'Dune' })]);
      const resource = bookResource(books);

      const result = await resource.importData(
        Dataset.fromRecords([
          { id: '1', name: 'Dune Messiah' },
          { id: '', name: 'Emma' },
        ]),
        { dryRun: true },
      );

      expect(result.rows.map((r) => r.importType)).toEqual(['update', 'new']);
      expect(result.rows[1]?.objectRepr).toBe('Emma');
      expect(result.rows[1]?.objectId).toBeNull();
      expect(books.all().map((b) => b.name)).toEqual(['Dune']);
    });

    it('should write inside the transaction and roll it back', async () => {
      const { books } = createLibrary();
      books.seed([book({ id: 1, name: 'Dune' })]);
      const resource = bookResource(books, { useTransactions: true });
      const events = recordEvents(resource);

      const result = await resource.importData(
        Dataset.fromRecords([
          { id: '1', name: 'Dune Messiah' },
          { id: '', name: 'Emma' },
        ]),
        { dryRun: true },
      );

      expect(result.rows.map((r) => r.importType)).toEqual(['update', 'new']);
      expect(result.rows[1]?.objectId).toBe(2);
      expect(books.all().map((b) => b.name)).toEqual(['Dune']);
      expect(events).toEqual([
        'import:started',
        'row:imported',
        'row:imported',
        'import:rolledBack(dry-run)',
        'import:completed',
      ]);
    });

    it('should leave a deletion undone without transactions', async () => {
      const { books } = createLibrary();
      books.seed([book({ id: 1, name: 'Dune' })]);
      const remove = vi.spyOn(books, 'delete');
      const resource = bookResource(
        books,
        { useTransactions: false },
        { hooks: { forDelete: (row) => row['delete'] === '1' } },
      );

      const result = await resource.importData(Dataset.fromRecords([{ id: '1', name: 'Dune', delete: '1' }]), {
        dryRun: true,
      });

      expect(result.rows.map((r) => r.importType)).toEqual(['delete']);
      expect(remove).not.toHaveBeenCalled();
      expect(books.all().map((b) => b.name)).toEqual(['Dune']);
    });
  });

  describe('relation lookups', () => {
    it('should resolve foreign keys inside the batch transaction', async () => {
      const { books, authors } = createLibrary();
      authors.seed([author({ id: 1, name: 'Ada' })]);
      const find = vi.spyOn(authors, 'find');
      const resource = modelResource(books, { options: { fields: ['id', 'name', 'author'], useTransactions: true } });

      const result = await resource.importData(Dataset.fromRecords([{ id: '', name: 'Dune', author: '1' }]));

      expect(result.rows.map((r) => r.importType)).toEqual(['new']);
      expect(find).toHaveBeenCalledWith({ id: '1' }, { transaction: { id: 1 }, limit: 1 });
    });

    it('should resolve many-to-many members inside the batch transaction', async () => {
      const { books, categories } = createLibrary();
      categories.seed([category({ id: 1, name: 'fiction' })]);
      const find = vi.spyOn(categories, 'find');
      const resource = modelResource(books, {
        options: { fields: ['id', 'name', 'categories'], useTransactions: true },
      });

      const result = await resource.importData(Dataset.fromRecords([{ id: '', name: 'Dune', categories: '1' }]));

      expect(result.rows.map((r) => r.importType)).toEqual(['new']);
      expect(find).toHaveBeenCalledWith({ id: '1' }, { transaction: { id: 1 }, limit: 1 });
    });
  });

  describe('atomicity', () => {
    it('should commit a clean batch', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: true });
      const events = recordEvents(resource);

      await resource.importData(Dataset.fromRecords([{ id: '', name: 'Emma' }]));

      expect(books.size).toBe(1);
      expect(events).toEqual(['import:started', 'row:imported', 'import:committed', 'import:completed']);
    });

    it('should keep no row when any row fails', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: true });
      const events = recordEvents(resource);

      const result = await resource.importData(failingBatch());

      expect(result.rows.map((r) => r.importType)).toEqual(['new', 'error']);
      expect(result.hasErrors()).toBe(true);
      expect(books.size).toBe(0);
      expect(events).toContain('import:rolledBack(errors)');
    });

    it('should keep the rows before the failure without transactions', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: false });

      await resource.importData(failingBatch());

      expect(books.all().map((b) => b.name)).toEqual(['Emma']);
    });

    it('should roll back a failed beforeImport', async () => {
      const { books } = createLibrary();
      const resource = bookResource(
        books,
        { useTransactions: true },
        {
          hooks: {
            beforeImport: () => {
              throw new Error('no setup');
            },
          },
        },
      );

      const result = await resource.importData(Dataset.fromRecords([{ id: '', name: 'Emma' }]));

      expect(result.rows.map((r) => r.importType)).toEqual(['new']);
      expect(books.size).toBe(0);
    });
  });

  describe('raiseErrors', () => {
    it('should roll back and re-throw the first row error', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: true });
      const events = recordEvents(resource);

      await expect(resource.importData(failingBatch(), { raiseErrors: true })).rejects.toThrow(ConversionError);

      expect(books.size).toBe(0);
      expect(events).toEqual(['import:started', 'row:imported', 'row:failed', 'import:rolledBack(raised)']);
    });

    it('should leave earlier rows in place without transactions', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books);

      await expect(resource.importData(failingBatch(), { raiseErrors: true })).rejects.toThrow(
        "Column 'id': Enter a valid integer, got 'abc'.",
      );

      expect(books.size).toBe(1);
    });

    it('should re-throw a failed beforeImport before any row runs', async () => {
      const { books } = createLibrary();
      const resource = bookResource(
        books,
        { useTransactions: true },
        {
          hooks: {
            beforeImport: () => {
              throw new Error('no setup');
            },
          },
        },
      );
      const events = recordEvents(resource);

      await expect(
        resource.importData(Dataset.fromRecords([{ id: '', name: 'Emma' }]), { raiseErrors: true }),
      ).rejects.toThrow(HookError);

      expect(books.size).toBe(0);
      expect(events).toEqual(['import:started', 'import:rolledBack(raised)']);
    });

    it('should let the transaction be reused after a rollback', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: true });

      await expect(resource.importData(failingBatch(), { raiseErrors: true })).rejects.toThrow();
      await resource.importData(Dataset.fromRecords([{ id: '', name: 'Emma' }]));

      expect(books.all().map((b) => b.name)).toEqual(['Emma']);
    });
  });

  describe('settings', () => {
    it('should fall back to the process-wide setting', async () => {
      const { books } = createLibrary();
      configureSettings({ useTransactions: true });
      const resource = bookResource(books);

      expect(resource.getUseTransactions()).toBe(true);
      await resource.importData(failingBatch());
      expect(books.size).toBe(0);
    });

    it('should prefer the resource option over the setting', () => {
      const { books } = createLibrary();
      configureSettings({ useTransactions: true });
      expect(bookResource(books, { useTransactions: false }).getUseTransactions()).toBe(false);
    });

    it('should prefer the call option over the resource option', async () => {
      const { books } = createLibrary();
      const resource = bookResource(books, { useTransactions: true });

      await resource.importData(failingBatch(), { useTransactions: false });

      expect(books.size).toBe(1);
    });

    it('should refuse transactions on a store without a transaction manager', async () => {
      const { books } = createLibrary();
      const plain: ObjectStore<Book> = {
        create: (row) => books.create(row),
        find: (criteria) => books.find(criteria),
        save: (instance) => books.save(instance),
        delete: (instance) => books.delete(instance),
        iterate: () => books.iterate(),
        identify: (instance) => books.identify(instance),
        describe: (instance) => books.describe(instance),
      };
      const resource = new Resource({ store: plain, fields: { id: { attribute: 'id' }, name: { attribute: 'name' } } });

      const importing = resource.importData(Dataset.fromRecords([{ id: '', name: 'Emma' }]), { useTransactions: true });

      await expect(importing).rejects.toThrow(ConfigurationError);
      await expect(importing).rejects.toThrow('useTransactions is set but the store has no transaction manager');
    });
  });
});
