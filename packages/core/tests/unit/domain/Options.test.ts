import { describe, it, expect } from 'vitest';
import { resolveOptions } from '../../../src/domain/model/Options.js';
import { emptySnapshot, snapshotsEqual } from '../../../src/domain/model/Snapshot.js';

describe('resolveOptions', () => {
  it('should apply defaults', () => {
    expect(resolveOptions()).toEqual({
      fields: null,
      exclude: null,
      importIdFields: ['id'],
      widgets: {},
      useTransactions: null,
      skipUnchanged: false,
      reportSkipped: true,
      columnOrder: null,
      instanceLoader: 'model',
    });
  });

  it('should keep explicit values', () => {
    const options = resolveOptions({ importIdFields: ['isbn'], skipUnchanged: true, useTransactions: false });
    expect(options.importIdFields).toEqual(['isbn']);
    expect(options.skipUnchanged).toBe(true);
    expect(options.useTransactions).toBe(false);
  });

  it('should freeze the result and copy the lists', () => {
    const fields = ['id', 'name'];
    const options = resolveOptions({ fields });
    fields.push('price');
    expect(options.fields).toEqual(['id', 'name']);
    expect(Object.isFrozen(options)).toBe(true);
  });
});

describe('Snapshot', () => {
  it('should compare every field of the first snapshot', () => {
    const a = new Map([['name', 'Dune'], ['price', '9']]);
    expect(snapshotsEqual(a, new Map([['name', 'Dune'], ['price', '9']]))).toBe(true);
    expect(snapshotsEqual(a, new Map([['name', 'Dune'], ['price', '10']]))).toBe(false);
  });

  it('should build an empty snapshot for every name', () => {
    expect([...emptySnapshot(['id', 'name'])]).toEqual([['id', ''], ['name', '']]);
  });
});
