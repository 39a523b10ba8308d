// Public surface of the backend package: the pipeline, usable without the server.
export { clean, TableBuilder, toTransaction, missingColumns, normalizePropertyType, COLUMN_ALIASES } from './services/cleaner.ts';
export type { CleanOptions, Check, RowOutcome } from './services/cleaner.ts';
export {
  aggregateGeo, aggregateTypes, aggregateTime, aggregateDistribution,
  buildViews, filterRows, defaultLevel, DEFAULT_VIEW_OPTIONS,
} from './services/aggregator.ts';
export { buildHierarchy } from './services/hierarchy.ts';
export { loadTable } from './services/loader.ts';
export type { LoadOptions } from './services/loader.ts';
export { TableStore } from './services/table-store.ts';
export {
  AppError, DataFormatError, TableNotReadyError, RefreshInProgressError, InvalidSelectionError,
} from './services/errors.ts';
export type * from './types.ts';
export { PROPERTY_TYPES, GEO_LEVELS, REJECT_REASONS } from './types.ts';
