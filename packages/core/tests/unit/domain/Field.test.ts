import { describe, it, expect } from 'vitest';
import { Field } from '../../../src/domain/model/Field.js';
import { IntegerWidget } from '../../../src/domain/widgets/IntegerWidget.js';
import { DateWidget } from '../../../src/domain/widgets/DateWidget.js';
import { ConversionError, ResolutionError } from '../../../src/domain/errors/RecordSyncError.js';
import { book, author } from '../../support/library.js';

describe('Field', () => {
  describe('clean', () => {
    it('should read the cell under its column name', async () => {
      const field = new Field({ attribute: 'name', columnName: 'Title' });
      expect(await field.clean({ Title: 'Dune' })).toBe('Dune');
    });

    it('should fail with the available columns when its column is missing', async () => {
      const field = new Field({ attribute: 'name', columnName: 'Title' });
      const error = await field.clean({ id: '1', Name: 'Dune' }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ResolutionError);
      expect(error).toHaveProperty('message', "Column 'Title' not found in dataset. Available columns are: id, Name");
    });

    it('should wrap widget failures with the column name', async () => {
      const field = new Field({ attribute: 'price', columnName: 'price', widget: new IntegerWidget() });
      const error = await field.clean({ price: 'abc' }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConversionError);
      expect(error).toHaveProperty('message', "Column 'price': Enter a valid integer, got 'abc'.");
      expect(error).toHaveProperty('column', 'price');
      expect(error).toHaveProperty('value', 'abc');
    });

    it('should use the default when the cell is blank', async () => {
      const field = new Field({ attribute: 'qty', columnName: 'qty', widget: new IntegerWidget(), default: 5 });
      expect(await field.clean({ qty: '' })).toBe(5);
      expect(await field.clean({ qty: '2' })).toBe(2);
    });

    it('should use the default for blank text but keep zero', async () => {
      const name = new Field({ attribute: 'name', columnName: 'name', default: 'untitled' });
      const qty = new Field({ attribute: 'qty', columnName: 'qty', widget: new IntegerWidget(), default: 5 });
      expect(await name.clean({ name: '' })).toBe('untitled');
      expect(await name.clean({ name: ' ' })).toBe(' ');
      expect(await qty.clean({ qty: '0' })).toBe(0);
    });

    it('should call a function default', async () => {
      const field = new Field({ attribute: 'name', columnName: 'name', default: () => 'untitled' });
      expect(await field.clean({ name: null })).toBe('untitled');
    });
  });

  describe('getValue', () => {
    it('should follow dotted attribute paths', () => {
      const field = new Field({ attribute: 'author.name', columnName: 'author' });
      expect(field.getValue(book({ author: author({ id: 1, name: 'Ada' }) }))).toBe('Ada');
    });

    it('should yield null when a link is missing', () => {
      const field = new Field({ attribute: 'author.name', columnName: 'author' });
      expect(field.getValue(book({ author: null }))).toBeNull();
    });

    it('should call function values on their owner', () => {
      const field = new Field({ attribute: 'fullName', columnName: 'full_name' });
      const person = {
        first: 'Ada',
        last: 'Lovelace',
        fullName(): string {
          return `${this.first} ${this.last}`;
        },
      };
      expect(field.getValue(person)).toBe('Ada Lovelace');
    });

    it('should yield null for export-only fields', () => {
      expect(new Field({ columnName: 'computed' }).getValue(book({}))).toBeNull();
    });
  });

  describe('save', () => {
    it('should assign the cleaned value', async () => {
      const field = new Field({ attribute: 'price', columnName: 'price', widget: new IntegerWidget() });
      const target = book({});
      await field.save(target, { price: '12' });
      expect(target.price).toBe(12);
    });

    it('should assign through a dotted path', async () => {
      const field = new Field({ attribute: 'author.name', columnName: 'author' });
      const target = book({ author: author({ id: 1, name: 'Ada' }) });
      await field.save(target, { author: 'Grace' });
      expect(target.author?.name).toBe('Grace');
    });

    it('should fail when the related object is missing', async () => {
      const field = new Field({ attribute: 'author.name', columnName: 'author' });
      await expect(field.save(book({ author: null }), { author: 'Grace' })).rejects.toThrow(
        "Cannot set 'author.name': the related object is missing.",
      );
    });

    it('should leave the instance untouched when readonly', async () => {
      const field = new Field({ attribute: 'name', columnName: 'name', readonly: true });
      const target = book({ name: 'Dune' });
      await field.save(target, { name: 'Emma' });
      expect(target.name).toBe('Dune');
    });
  });

  describe('export', () => {
    it('should render through the widget', () => {
      const field = new Field({ attribute: 'published', columnName: 'published', widget: new DateWidget() });
      expect(field.export(book({ published: new Date(Date.UTC(1965, 7, 1)) }))).toBe('1965-08-01');
    });

    it('should export null as an empty string', () => {
      const field = new Field({ attribute: 'price', columnName: 'price', widget: new IntegerWidget() });
      expect(field.export(book({ price: null }))).toBe('');
    });
  });

  it('should be immutable', () => {
    const field = new Field({ attribute: 'name', columnName: 'name' });
    expect(Object.isFrozen(field)).toBe(true);
  });
});
