import { describe, it, expect } from 'vitest';
import { DataTypes } from 'sequelize';
import { attributeKind } from '../../src/attributeKind.js';

describe('attributeKind', () => {
  it('should map integer column types', () => {
    expect(attributeKind(DataTypes.INTEGER)).toBe('integer');
    expect(attributeKind(DataTypes.BIGINT)).toBe('integer');
    expect(attributeKind(DataTypes.SMALLINT)).toBe('integer');
  });

  it('should map fractional column types to decimals', () => {
    expect(attributeKind(DataTypes.DECIMAL(10, 2))).toBe('decimal');
    expect(attributeKind(DataTypes.FLOAT)).toBe('decimal');
    expect(attributeKind(DataTypes.DOUBLE)).toBe('decimal');
  });

  it('should distinguish dates from timestamps', () => {
    expect(attributeKind(DataTypes.DATEONLY)).toBe('date');
    expect(attributeKind(DataTypes.DATE)).toBe('datetime');
  });

  it('should map booleans', () => {
    expect(attributeKind(DataTypes.BOOLEAN)).toBe('boolean');
  });

  it('should accept raw type names', () => {
    expect(attributeKind('bigint(20)')).toBe('integer');
    expect(attributeKind('VARCHAR(255)')).toBe('string');
  });

  it('should treat other types as text', () => {
    expect(attributeKind(DataTypes.STRING(40))).toBe('string');
    expect(attributeKind(DataTypes.TEXT)).toBe('string');
    expect(attributeKind(DataTypes.JSON)).toBe('string');
  });
});
