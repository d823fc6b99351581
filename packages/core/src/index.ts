// Main entry point
export { Resource, modelResource } from './Resource.js';
export type { ResourceConfig } from './Resource.js';

// Domain model
export { Dataset } from './domain/model/Dataset.js';
export type { Row } from './domain/model/Row.js';
export { Field, ATTRIBUTE_SEPARATOR } from './domain/model/Field.js';
export type { FieldOptions } from './domain/model/Field.js';
export { ImportType } from './domain/model/ImportType.js';
export type { RowResult } from './domain/model/RowResult.js';
export { Result } from './domain/model/Result.js';
export type { ImportTotals } from './domain/model/Result.js';
export type { CapturedError } from './domain/model/CapturedError.js';
export { captureError } from './domain/model/CapturedError.js';
export type { Snapshot } from './domain/model/Snapshot.js';
export { emptySnapshot, snapshotsEqual } from './domain/model/Snapshot.js';
export { resolveOptions } from './domain/model/Options.js';
export type {
  ResourceOptions,
  ResolvedOptions,
  WidgetArguments,
  InstanceLoaderKind,
} from './domain/model/Options.js';

// Widgets
export type { Widget, CleanContext } from './domain/widgets/Widget.js';
export { isBlank } from './domain/widgets/Widget.js';
export { CharWidget } from './domain/widgets/CharWidget.js';
export { IntegerWidget } from './domain/widgets/IntegerWidget.js';
export { DecimalWidget } from './domain/widgets/DecimalWidget.js';
export type { DecimalWidgetOptions } from './domain/widgets/DecimalWidget.js';
export { BooleanWidget } from './domain/widgets/BooleanWidget.js';
export { DateWidget } from './domain/widgets/DateWidget.js';
export type { DateWidgetOptions } from './domain/widgets/DateWidget.js';
export { DateTimeWidget } from './domain/widgets/DateTimeWidget.js';
export { ForeignKeyWidget } from './domain/widgets/ForeignKeyWidget.js';
export type { ForeignKeyWidgetOptions } from './domain/widgets/ForeignKeyWidget.js';
export { ManyToManyWidget, isManyToManyWidget } from './domain/widgets/ManyToManyWidget.js';
export type { ManyToManyWidgetOptions } from './domain/widgets/ManyToManyWidget.js';
export { parseDate, formatDate } from './domain/widgets/dateFormat.js';

// Errors
export {
  RecordSyncError,
  ConversionError,
  ResolutionError,
  PersistenceError,
  HookError,
  ConfigurationError,
  FormatError,
  describeCause,
} from './domain/errors/RecordSyncError.js';
export type { RecordSyncErrorCode } from './domain/errors/RecordSyncError.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ImportStartedEvent,
  RowImportedEvent,
  RowFailedEvent,
  ImportCommittedEvent,
  ImportRolledBackEvent,
  ImportCompletedEvent,
  ExportCompletedEvent,
} from './domain/events/DomainEvents.js';

// Domain services
export { DiffEngine } from './domain/services/DiffEngine.js';
export { ModelInstanceLoader } from './domain/services/ModelInstanceLoader.js';
export type { IdentificationField } from './domain/services/ModelInstanceLoader.js';
export { CachedInstanceLoader } from './domain/services/CachedInstanceLoader.js';
export {
  declareFields,
  buildSchemaFields,
  resolveColumnOrder,
  widgetForAttribute,
} from './domain/services/FieldRegistry.js';
export type { FieldDeclaration } from './domain/services/FieldRegistry.js';

// Application internals (for extension packages composing their own pipelines)
export { EventBus } from './application/EventBus.js';
export { ResourceContext } from './application/ResourceContext.js';
export { ImportData } from './application/usecases/ImportData.js';
export type { ImportDataOptions, BatchHooks } from './application/usecases/ImportData.js';
export { ImportRow } from './application/usecases/ImportRow.js';
export type { RowHooks, RowRunOptions } from './application/usecases/ImportRow.js';
export { ExportData } from './application/usecases/ExportData.js';

// Ports (for custom implementations)
export type {
  ObjectStore,
  Criteria,
  FindOptions,
  AttributeKind,
  AttributeDescriptor,
} from './domain/ports/ObjectStore.js';
export type { TransactionManager } from './domain/ports/TransactionManager.js';
export type { Differ, Edit, EditOperation } from './domain/ports/Differ.js';
export type { InstanceLoader } from './domain/ports/InstanceLoader.js';
export type { ResourceHooks, FieldExporter, FieldImporter } from './domain/ports/ResourceHooks.js';

// Configuration
export { getSettings, configureSettings, resetSettings } from './config/settings.js';
export type { Settings } from './config/settings.js';

// Built-in adapters
export { InMemoryObjectStore } from './infrastructure/store/InMemoryObjectStore.js';
export type { InMemoryObjectStoreOptions, InMemoryTransaction } from './infrastructure/store/InMemoryObjectStore.js';
export { DiffMatchPatchDiffer } from './infrastructure/diff/DiffMatchPatchDiffer.js';
