/** Constructor arguments applied to a schema-built field's widget. */
export interface WidgetArguments {
  /** Date widgets: accepted formats, the first one used for rendering. */
  readonly format?: string | readonly string[];
  /** Decimal widget: fixed fraction digits when rendering. */
  readonly decimalPlaces?: number;
  /** Relation widgets: attribute of the related object used as key. */
  readonly field?: string;
  /** Many-to-many widget: separator between keys. */
  readonly separator?: string;
  /** Foreign-key widget: fail when the key matches nothing. */
  readonly required?: boolean;
}

/** Which instance loader resolves rows to existing objects. */
export type InstanceLoaderKind = 'model' | 'cached';

/** Declarative options of a resource. Read once, when the resource is defined. */
export interface ResourceOptions {
  /** Whitelist of schema fields to include. Also names relation-spanning fields (`author.name`). */
  readonly fields?: readonly string[];
  /** Blacklist of schema fields to leave out. */
  readonly exclude?: readonly string[];
  /** Fields whose values identify an existing object. Default: `['id']`. */
  readonly importIdFields?: readonly string[];
  /** Widget arguments per field name, for fields built from the schema. */
  readonly widgets?: Readonly<Record<string, WidgetArguments>>;
  /** Run imports inside a transaction. Default: `undefined` (use the process-wide setting). */
  readonly useTransactions?: boolean;
  /** Record unchanged rows as `skip` without saving them. Default: `false`. */
  readonly skipUnchanged?: boolean;
  /** Keep skipped rows in `Result.rows`. Default: `true`. */
  readonly reportSkipped?: boolean;
  /** Explicit column order. Fields not listed are left out. Default: declaration order. */
  readonly columnOrder?: readonly string[];
  /** Instance loader strategy. Default: `'model'`. */
  readonly instanceLoader?: InstanceLoaderKind;
}

/** Options with defaults applied. Frozen. */
export interface ResolvedOptions {
  readonly fields: readonly string[] | null;
  readonly exclude: readonly string[] | null;
  readonly importIdFields: readonly string[];
  readonly widgets: Readonly<Record<string, WidgetArguments>>;
  readonly useTransactions: boolean | null;
  readonly skipUnchanged: boolean;
  readonly reportSkipped: boolean;
  readonly columnOrder: readonly string[] | null;
  readonly instanceLoader: InstanceLoaderKind;
}

/** Apply defaults and freeze. */
export function resolveOptions(options?: ResourceOptions): ResolvedOptions {
  return Object.freeze({
    fields: options?.fields ? Object.freeze([...options.fields]) : null,
    exclude: options?.exclude ? Object.freeze([...options.exclude]) : null,
    importIdFields: Object.freeze([...(options?.importIdFields ?? ['id'])]),
    widgets: Object.freeze({ ...options?.widgets }),
    useTransactions: options?.useTransactions ?? null,
    skipUnchanged: options?.skipUnchanged ?? false,
    reportSkipped: options?.reportSkipped ?? true,
    columnOrder: options?.columnOrder ? Object.freeze([...options.columnOrder]) : null,
    instanceLoader: options?.instanceLoader ?? 'model',
  });
}
