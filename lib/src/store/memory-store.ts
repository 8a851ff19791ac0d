/**
 * In-memory progress store for tests and dry runs.
 */

import type { FileKey } from '../extraction/index.js';
import {
  type LoadOptions,
  type OutputRow,
  type ProgressStore,
  PersistenceError,
  PersistenceErrorCode,
  RowStatus,
  rowKey,
} from './types.js';

export class InMemoryProgressStore implements ProgressStore {
  private rows: OutputRow[];

  constructor(initialRows: readonly OutputRow[] = []) {
    this.rows = [...initialRows];
  }

  async load(options: LoadOptions = {}): Promise<Set<FileKey>> {
    if (options.retryFailed) {
      this.rows = this.rows.filter((row) => row.status !== RowStatus.FAILED);
    }
    return new Set(this.rows.map(rowKey));
  }

  async append(row: OutputRow): Promise<void> {
    const key = rowKey(row);
    if (this.rows.some((existing) => rowKey(existing) === key)) {
      throw new PersistenceError(`Row for ${key} already exists`, PersistenceErrorCode.DUPLICATE_KEY);
    }
    this.rows.push(row);
  }

  getRows(): readonly OutputRow[] {
    return this.rows;
  }
}
