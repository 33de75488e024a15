export { LoadError, type LoadErrorKind } from './errors.js';
export { connectDatabase, type Database } from './db.js';
export { loadConfig, type LoaderConfig } from './config.js';
export { ENTITY_CATALOG, LOAD_ORDER, getEntity } from './services/entity-catalog.js';
export { SheetReader, assertMandatory, type SheetRow } from './services/sheet-reader.js';
export { KeyResolver } from './services/key-resolver.js';
export { UpsertEngine } from './services/upsert-engine.js';
export {
  LoadOrchestrator,
  type EntityTally,
  type LoadReport,
  type LoadStatus,
  type RowFailure,
} from './services/load-orchestrator.js';
export { buildReportCsv, formatLoadReport, writeReportCsv } from './services/load-report.js';
export { PgStore } from './store/pg-store.js';
export type { RecordStore } from './store/record-store.js';
export { LoadLog, type LoadLogEntry } from './utils/load-log.js';
export type * from './types/loader.js';
