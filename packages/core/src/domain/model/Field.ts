import type { Row } from './Row.js';
import type { Widget, CleanContext } from '../widgets/Widget.js';
import { CharWidget } from '../widgets/CharWidget.js';
import { ConversionError, ResolutionError, describeCause } from '../errors/RecordSyncError.js';

/** Separator between the segments of an attribute path spanning relationships. */
export const ATTRIBUTE_SEPARATOR = '.';

function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === '' || (Array.isArray(value) && value.length === 0);
}

/** Declaration options for a `Field`. */
export interface FieldOptions {
  /** Attribute path on the domain object, possibly dotted (`author.name`). Omit for export-only fields. */
  readonly attribute?: string;
  /** External column label. Default: the field's name in the resource. */
  readonly columnName?: string;
  /** Converter between cell and native values. Default: `CharWidget`. */
  readonly widget?: Widget;
  /** When `true`, the field is exported but never written on import. */
  readonly readonly?: boolean;
  /**
   * Value used when the cell cleans to an empty value: `null`, `''` or an
   * empty list. `0` and `false` are real values and keep no default.
   */
  readonly default?: unknown;
}

/**
 * A logical column: binds an external column name to an attribute path
 * through a widget. Immutable once declared.
 */
export class Field {
  readonly attribute: string | undefined;
  readonly columnName: string;
  readonly widget: Widget;
  readonly readonly: boolean;
  readonly default: unknown;

  constructor(options: FieldOptions & { readonly columnName: string }) {
    this.attribute = options.attribute;
    this.columnName = options.columnName;
    this.widget = options.widget ?? new CharWidget();
    this.readonly = options.readonly ?? false;
    this.default = options.default;
    Object.freeze(this);
  }

  /** Read the field's cell from `row` and convert it to a native value. */
  async clean(row: Row, context?: CleanContext): Promise<unknown> {
    if (!(this.columnName in row)) {
      throw new ResolutionError(
        `Column '${this.columnName}' not found in dataset. Available columns are: ${Object.keys(row).join(', ')}`,
      );
    }

    let value: unknown;
    try {
      value = await this.widget.clean(row[this.columnName], context);
    } catch (error) {
      throw new ConversionError(`Column '${this.columnName}': ${describeCause(error)}`, {
        column: this.columnName,
        value: row[this.columnName],
        cause: error,
      });
    }

    if (isEmptyValue(value) && this.default !== undefined) {
      return typeof this.default === 'function' ? Reflect.apply(this.default, undefined, []) : this.default;
    }
    return value;
  }

  /** Follow the attribute path on `instance`. Any missing link yields `null`. */
  getValue(instance: object): unknown {
    if (this.attribute === undefined) return null;

    let owner: object = instance;
    let value: unknown = instance;
    for (const segment of this.attribute.split(ATTRIBUTE_SEPARATOR)) {
      if (value === null || typeof value !== 'object') return null;
      owner = value;
      value = Reflect.get(owner, segment);
      if (value === undefined || value === null) return null;
    }
    return typeof value === 'function' ? Reflect.apply(value, owner, []) : value;
  }

  /** Assign an already cleaned value on the object at the end of the attribute path. */
  setValue(instance: object, value: unknown): void {
    if (this.readonly || this.attribute === undefined) return;

    const segments = this.attribute.split(ATTRIBUTE_SEPARATOR);
    const last = segments.pop();
    let target: unknown = instance;
    for (const segment of segments) {
      target = target !== null && typeof target === 'object' ? Reflect.get(target, segment) : undefined;
    }
    if (last === undefined || target === null || typeof target !== 'object') {
      throw new ResolutionError(`Cannot set '${this.attribute}': the related object is missing.`);
    }
    Reflect.set(target, last, value);
  }

  /** Clean the field's cell from `row` and assign it on `instance`. */
  async save(instance: object, row: Row, context?: CleanContext): Promise<void> {
    if (this.readonly) return;
    this.setValue(instance, await this.clean(row, context));
  }

  /** Render the field's current value on `instance`; `''` when the value is `null`. */
  export(instance: object): string {
    const value = this.getValue(instance);
    if (value === null || value === undefined) return '';
    return this.widget.render(value);
  }
}
