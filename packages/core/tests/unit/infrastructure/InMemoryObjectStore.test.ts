import { describe, it, expect } from 'vitest';
import { InMemoryObjectStore } from '../../../src/infrastructure/store/InMemoryObjectStore.js';
import { createLibrary, author, book, category, Book } from '../../support/library.js';

describe('InMemoryObjectStore', () => {
  it('should assign increasing ids on save', async () => {
    const { books } = createLibrary();
    const first = book({ name: 'Dune' });
    const second = book({ name: 'Emma' });

    await books.save(first);
    await books.save(second);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(books.size).toBe(2);
  });

  it('should continue numbering after seeded ids', async () => {
    const { books } = createLibrary();
    books.seed([book({ id: 5, name: 'Dune' })]);
    const next = book({ name: 'Emma' });
    await books.save(next);
    expect(next.id).toBe(6);
  });

  it('should match criteria loosely across strings and numbers', async () => {
    const { books } = createLibrary();
    books.seed([book({ id: 1, name: 'Dune' }), book({ id: 2, name: 'Emma' })]);

    const found = await books.find({ id: '2' });
    expect(found.map((b) => b.name)).toEqual(['Emma']);
  });

  it('should honour the limit', async () => {
    const { books } = createLibrary();
    books.seed([book({ name: 'Dune' }), book({ name: 'Dune' }), book({ name: 'Dune' })]);
    expect(await books.find({ name: 'Dune' }, { limit: 2 })).toHaveLength(2);
  });

  it('should hand out copies that keep their class', async () => {
    const { books } = createLibrary();
    books.seed([book({ id: 1, name: 'Dune' })]);

    const [loaded] = await books.find({ id: 1 });
    expect(loaded).toBeInstanceOf(Book);
    if (loaded) loaded.name = 'Changed';

    const [again] = await books.find({ id: 1 });
    expect(again?.name).toBe('Dune');
  });

  it('should delete stored objects and reject unknown ones', async () => {
    const { books } = createLibrary();
    books.seed([book({ id: 1, name: 'Dune' })]);

    await books.delete(book({ id: 1 }));
    expect(books.size).toBe(0);
    await expect(books.delete(book({ id: 9 }))).rejects.toThrow('Book object (9) is not stored');
  });

  it('should iterate in id order', async () => {
    const { books } = createLibrary();
    books.seed([book({ id: 10, name: 'C' }), book({ id: 2, name: 'A' }), book({ id: 3, name: 'B' })]);

    const names: string[] = [];
    for await (const b of books.iterate()) names.push(b.name);
    expect(names).toEqual(['A', 'B', 'C']);
  });

  it('should describe objects by name and id unless told otherwise', () => {
    const { categories, books } = createLibrary();
    expect(categories.describe(category({ id: 3 }))).toBe('Category object (3)');
    expect(books.describe(book({ id: 3, name: 'Dune' }))).toBe('Dune');
  });

  it('should run the constraint check before saving', async () => {
    const store = new InMemoryObjectStore<Book>({
      factory: () => new Book(),
      validate: (b) => {
        if (b.name === '') throw new Error('name is required');
      },
    });
    await expect(store.save(book({ name: '' }))).rejects.toThrow('name is required');
    expect(store.size).toBe(0);
  });

  describe('relations', () => {
    it('should store relation members for saved owners', async () => {
      const { books } = createLibrary();
      books.seed([book({ id: 1, name: 'Dune' })]);
      const owner = book({ id: 1 });

      await books.setRelated(owner, 'categories', [category({ id: 2 })]);

      expect(await books.getRelated(owner, 'categories')).toEqual([category({ id: 2 })]);
      expect(owner.categories).toEqual([category({ id: 2 })]);
    });

    it('should refuse relations on unsaved owners', async () => {
      const { books } = createLibrary();
      await expect(books.setRelated(book({}), 'categories', [])).rejects.toThrow(
        "Book must be saved before 'categories' can be set",
      );
    });

    it('should read no members for unsaved owners', async () => {
      const { books } = createLibrary();
      expect(await books.getRelated(book({}), 'categories')).toEqual([]);
    });
  });

  describe('transactions', () => {
    it('should undo every change on rollback', async () => {
      const { books } = createLibrary();
      books.seed([book({ id: 1, name: 'Dune' })]);

      const tx = await books.transactions.begin();
      await books.save(book({ id: 1, name: 'Changed' }), tx);
      await books.save(book({ name: 'Emma' }), tx);
      await books.setRelated(book({ id: 1 }), 'categories', [category({ id: 1 })], tx);
      await books.transactions.rollback(tx);

      expect(books.all().map((b) => b.name)).toEqual(['Dune']);
      expect(await books.getRelated(book({ id: 1 }), 'categories')).toEqual([]);

      const next = book({ name: 'Emma' });
      await books.save(next);
      expect(next.id).toBe(2);
    });

    it('should keep changes on commit', async () => {
      const { books } = createLibrary();
      const tx = await books.transactions.begin();
      await books.save(book({ name: 'Dune' }), tx);
      await books.transactions.commit(tx);
      expect(books.size).toBe(1);
    });

    it('should allow one open transaction at a time', async () => {
      const { books } = createLibrary();
      await books.transactions.begin();
      await expect(books.transactions.begin()).rejects.toThrow('A transaction is already open');
    });

    it('should reject handles that are no longer open', async () => {
      const { books } = createLibrary();
      const tx = await books.transactions.begin();
      await books.transactions.commit(tx);
      await expect(books.save(book({ name: 'Dune' }), tx)).rejects.toThrow('Transaction 1 is not open');
    });

    it('should reject reads in its own closed transaction', async () => {
      const { books } = createLibrary();
      const tx = await books.transactions.begin();
      await books.transactions.rollback(tx);
      await expect(books.find({}, { transaction: tx })).rejects.toThrow('Transaction 1 is not open');
    });

    it("should serve reads made inside another store's transaction", async () => {
      const { books, authors } = createLibrary();
      authors.seed([author({ id: 1, name: 'Ada' })]);
      const tx = await books.transactions.begin();

      const found = await authors.find({ name: 'Ada' }, { transaction: tx });

      expect(found.map((a) => a.id)).toEqual([1]);
      await books.transactions.rollback(tx);
    });
  });
});
