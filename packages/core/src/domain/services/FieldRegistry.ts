import { Field, ATTRIBUTE_SEPARATOR } from '../model/Field.js';
import type { FieldOptions } from '../model/Field.js';
import type { ResolvedOptions, WidgetArguments } from '../model/Options.js';
import type { AttributeDescriptor, ObjectStore } from '../ports/ObjectStore.js';
import type { Widget } from '../widgets/Widget.js';
import { CharWidget } from '../widgets/CharWidget.js';
import { IntegerWidget } from '../widgets/IntegerWidget.js';
import { DecimalWidget } from '../widgets/DecimalWidget.js';
import { BooleanWidget } from '../widgets/BooleanWidget.js';
import { DateWidget } from '../widgets/DateWidget.js';
import { DateTimeWidget } from '../widgets/DateTimeWidget.js';
import { ForeignKeyWidget } from '../widgets/ForeignKeyWidget.js';
import { ManyToManyWidget } from '../widgets/ManyToManyWidget.js';
import { ConfigurationError } from '../errors/RecordSyncError.js';

/** A field declaration: a ready `Field`, or the options to build one. */
export type FieldDeclaration = Field | FieldOptions;

/**
 * Turn explicit declarations into fields, in declaration order. A field
 * without a column name takes its declaration name.
 */
export function declareFields(declarations: Readonly<Record<string, FieldDeclaration>>): Map<string, Field> {
  const fields = new Map<string, Field>();
  for (const [name, declaration] of Object.entries(declarations)) {
    fields.set(
      name,
      declaration instanceof Field
        ? declaration
        : new Field({ ...declaration, columnName: declaration.columnName ?? name }),
    );
  }
  return fields;
}

/** Widget for a schema attribute of the given kind, built with the configured arguments. */
export function widgetForAttribute(descriptor: AttributeDescriptor, args: WidgetArguments = {}): Widget {
  switch (descriptor.kind) {
    case 'integer':
      return new IntegerWidget();
    case 'decimal':
      return new DecimalWidget({ decimalPlaces: args.decimalPlaces });
    case 'boolean':
      return new BooleanWidget();
    case 'date':
      return new DateWidget({ format: args.format });
    case 'datetime':
      return new DateTimeWidget({ format: args.format });
    case 'foreignKey':
      return new ForeignKeyWidget({ store: requireTarget(descriptor), field: args.field, required: args.required });
    case 'manyToMany':
      return new ManyToManyWidget({ store: requireTarget(descriptor), field: args.field, separator: args.separator });
    case 'string':
    default:
      return new CharWidget();
  }
}

function requireTarget(descriptor: AttributeDescriptor): ObjectStore<object> {
  if (!descriptor.target) {
    throw new ConfigurationError(`Relation attribute '${descriptor.name}' does not name its target store`);
  }
  return descriptor.target;
}

function schemaOf(store: ObjectStore<object>, path: string): readonly AttributeDescriptor[] {
  if (!store.schema) {
    throw new ConfigurationError(`Cannot resolve '${path}': the store does not describe its schema`);
  }
  return store.schema();
}

/** Follow a dotted path through foreign keys to the descriptor of its last attribute. */
function resolvePath(store: ObjectStore<object>, path: string): AttributeDescriptor {
  const segments = path.split(ATTRIBUTE_SEPARATOR);
  let current = store;
  for (const [i, segment] of segments.entries()) {
    const descriptor = schemaOf(current, path).find((d) => d.name === segment);
    if (!descriptor) {
      throw new ConfigurationError(`Unknown attribute '${segment}' in field '${path}'`);
    }
    if (i === segments.length - 1) return descriptor;
    if (descriptor.kind !== 'foreignKey') {
      throw new ConfigurationError(`'${segment}' in field '${path}' is not a foreign key`);
    }
    current = requireTarget(descriptor);
  }
  throw new ConfigurationError(`Empty field name '${path}'`);
}

/**
 * Fields built from the store schema, appended after the declared ones.
 *
 * Schema attributes are kept when they pass the `fields` whitelist and the
 * `exclude` blacklist and are not declared already. Whitelisted names that
 * span relationships (`author.name`) are then resolved through the schema.
 */
export function buildSchemaFields(
  store: ObjectStore<object>,
  options: ResolvedOptions,
  declared: ReadonlyMap<string, Field>,
): Map<string, Field> {
  const fields = new Map(declared);
  const build = (name: string, descriptor: AttributeDescriptor): Field =>
    new Field({ attribute: name, columnName: name, widget: widgetForAttribute(descriptor, options.widgets[name]) });

  for (const descriptor of schemaOf(store, 'schema')) {
    const included = options.fields === null || options.fields.includes(descriptor.name);
    const excluded = options.exclude !== null && options.exclude.includes(descriptor.name);
    if (included && !excluded && !fields.has(descriptor.name)) {
      fields.set(descriptor.name, build(descriptor.name, descriptor));
    }
  }

  for (const name of options.fields ?? []) {
    if (fields.has(name) || !name.includes(ATTRIBUTE_SEPARATOR)) continue;
    fields.set(name, build(name, resolvePath(store, name)));
  }

  return fields;
}

/** Names of `fields` in `columnOrder`, or in declaration order when none is set. */
export function resolveColumnOrder(fields: ReadonlyMap<string, Field>, columnOrder: readonly string[] | null): string[] {
  if (columnOrder === null) return [...fields.keys()];
  for (const name of columnOrder) {
    if (!fields.has(name)) {
      throw new ConfigurationError(`Column order names unknown field '${name}'`);
    }
  }
  return [...columnOrder];
}
