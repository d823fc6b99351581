import type { Widget, CleanContext } from './Widget.js';
import { isBlank } from './Widget.js';
import { CharWidget } from './CharWidget.js';
import type { ObjectStore } from '../ports/ObjectStore.js';

export interface ManyToManyWidgetOptions<R extends object> {
  /** Store holding the related objects. */
  readonly store: ObjectStore<R>;
  /** Attribute of the related objects the cell lists. Default: `'id'`. */
  readonly field?: string;
  /** Separator between keys in the cell. Default: `','`. */
  readonly separator?: string;
  /** Widget cleaning each key before the lookup. Default: `CharWidget`. */
  readonly keyWidget?: Widget;
}

/**
 * Multi-relation widget: resolves a separated key list to the related
 * objects it names, in cell order. Keys that match nothing are dropped.
 * Rendering sorts the keys.
 *
 * Only computes the target set; the engine writes the relation through the
 * store once the owner has an identity.
 */
export class ManyToManyWidget<R extends object> implements Widget<readonly R[]> {
  readonly store: ObjectStore<R>;
  readonly field: string;
  readonly separator: string;
  private readonly keyWidget: Widget;

  constructor(options: ManyToManyWidgetOptions<R>) {
    this.store = options.store;
    this.field = options.field ?? 'id';
    this.separator = options.separator ?? ',';
    this.keyWidget = options.keyWidget ?? new CharWidget();
  }

  async clean(raw: unknown, context: CleanContext = {}): Promise<readonly R[]> {
    if (isBlank(raw)) return [];

    const keys = String(raw)
      .split(this.separator)
      .map((k) => k.trim())
      .filter((k) => k !== '');

    const members: R[] = [];
    for (const key of new Set(keys)) {
      const cleaned = await this.keyWidget.clean(key);
      const [match] = await this.store.find({ [this.field]: cleaned }, { transaction: context.transaction, limit: 1 });
      if (match !== undefined && !members.includes(match)) members.push(match);
    }
    return members;
  }

  /** Render members as their keys, sorted, so equal member sets render identically. */
  render(value: unknown): string {
    if (!Array.isArray(value)) return '';
    return this.keysOf(value)
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
      .join(this.separator);
  }

  private keysOf(members: readonly unknown[]): string[] {
    const keys: string[] = [];
    for (const member of members) {
      if (member === null || typeof member !== 'object') continue;
      const key: unknown = Reflect.get(member, this.field);
      if (key !== undefined && key !== null) keys.push(String(key));
    }
    return keys;
  }
}

/** Check whether a widget writes a multi-valued relation. */
export function isManyToManyWidget(widget: Widget): widget is ManyToManyWidget<object> {
  return widget instanceof ManyToManyWidget;
}
