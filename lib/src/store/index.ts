/**
 * Progress Store Module
 */

export {
  OUTPUT_COLUMNS,
  type OutputColumn,
  RowStatus,
  OutputRowSchema,
  type OutputRow,
  rowKey,
  recordToRow,
  failureToRow,
  type LoadOptions,
  type ProgressStore,
  PersistenceErrorCode,
  PersistenceError,
  isPersistenceError,
} from './types.js';

export { escapeCsvField, formatCsvLine, formatCsv, readCsv, type CsvTable } from './csv.js';
export { CsvProgressStore, type CsvProgressStoreOptions } from './csv-store.js';
export { InMemoryProgressStore } from './memory-store.js';
