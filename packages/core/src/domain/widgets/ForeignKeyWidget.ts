import type { Widget, CleanContext } from './Widget.js';
import { isBlank } from './Widget.js';
import { CharWidget } from './CharWidget.js';
import type { ObjectStore } from '../ports/ObjectStore.js';
import { ConversionError } from '../errors/RecordSyncError.js';

export interface ForeignKeyWidgetOptions<R extends object> {
  /** Store holding the related objects. */
  readonly store: ObjectStore<R>;
  /** Attribute of the related object the cell holds. Default: `'id'`. */
  readonly field?: string;
  /** When `true`, a key that matches nothing is a conversion error instead of `null`. Default: `false`. */
  readonly required?: boolean;
  /** Widget cleaning the key before the lookup. Default: `CharWidget`. */
  readonly keyWidget?: Widget;
}

/**
 * Single-relation widget: resolves a key cell to one related object and
 * renders a related object back to its key.
 */
export class ForeignKeyWidget<R extends object> implements Widget<R> {
  readonly store: ObjectStore<R>;
  readonly field: string;
  private readonly required: boolean;
  private readonly keyWidget: Widget;

  constructor(options: ForeignKeyWidgetOptions<R>) {
    this.store = options.store;
    this.field = options.field ?? 'id';
    this.required = options.required ?? false;
    this.keyWidget = options.keyWidget ?? new CharWidget();
  }

  async clean(raw: unknown, context: CleanContext = {}): Promise<R | null> {
    if (isBlank(raw)) {
      if (this.required) throw new ConversionError('A related object is required.', { value: raw });
      return null;
    }

    const key = await this.keyWidget.clean(raw);
    const [match] = await this.store.find({ [this.field]: key }, { transaction: context.transaction, limit: 1 });
    if (match === undefined) {
      if (this.required) {
        throw new ConversionError(`No related object with ${this.field} '${String(raw)}'.`, { value: raw });
      }
      return null;
    }
    return match;
  }

  render(value: unknown): string {
    if (value === undefined || value === null || typeof value !== 'object') return '';
    const key: unknown = Reflect.get(value, this.field);
    return key === undefined || key === null ? '' : String(key);
  }
}
