import type { AttributeKind } from '@recordsync/core';
import type { ModelAttributeColumnOptions } from 'sequelize';

const KINDS: Readonly<Record<string, AttributeKind>> = {
  INTEGER: 'integer',
  BIGINT: 'integer',
  SMALLINT: 'integer',
  TINYINT: 'integer',
  MEDIUMINT: 'integer',
  DECIMAL: 'decimal',
  FLOAT: 'decimal',
  DOUBLE: 'decimal',
  'DOUBLE PRECISION': 'decimal',
  REAL: 'decimal',
  BOOLEAN: 'boolean',
  DATEONLY: 'date',
  DATE: 'datetime',
};

/** Widget kind for a column type. Unknown types are treated as text. */
export function attributeKind(type: ModelAttributeColumnOptions['type']): AttributeKind {
  const raw = typeof type === 'string' ? type : type.key;
  const key = raw.toUpperCase().replace(/\(.*$/, '').trim();
  return KINDS[key] ?? 'string';
}
