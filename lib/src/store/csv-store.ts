/**
 * CSV Progress Store
 *
 * Keeps the output table in memory and rewrites the whole file on every
 * append: write `<path>.tmp`, then rename over the output. A crash leaves
 * either the previous file or the new one.
 */

import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FileKey } from '../extraction/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { type CsvTable, formatCsv, readCsv } from './csv.js';
import {
  type LoadOptions,
  type OutputRow,
  type ProgressStore,
  OUTPUT_COLUMNS,
  OutputRowSchema,
  PersistenceError,
  PersistenceErrorCode,
  RowStatus,
  rowKey,
} from './types.js';

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export interface CsvProgressStoreOptions {
  logger?: Logger | undefined;
}

export class CsvProgressStore implements ProgressStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private rows: OutputRow[] = [];
  private keys = new Set<FileKey>();
  private loaded = false;

  constructor(filePath: string, options: CsvProgressStoreOptions = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? getGlobalLogger().child('store');
  }

  get path(): string {
    return this.filePath;
  }

  async load(options: LoadOptions = {}): Promise<Set<FileKey>> {
    const rows = await this.readRows();

    const keys = new Set<FileKey>();
    for (const row of rows) {
      const key = rowKey(row);
      if (keys.has(key)) {
        throw new PersistenceError(
          `Output contains more than one row for ${key}`,
          PersistenceErrorCode.INVALID_OUTPUT,
          { filePath: this.filePath }
        );
      }
      keys.add(key);
    }

    this.rows = rows;
    this.keys = keys;
    this.loaded = true;

    if (options.retryFailed) {
      const kept = rows.filter((row) => row.status !== RowStatus.FAILED);
      const pruned = rows.length - kept.length;
      if (pruned > 0) {
        await this.writeRows(kept);
        this.rows = kept;
        this.keys = new Set(kept.map(rowKey));
        this.logger.info('Removed failed rows for retry', { count: pruned });
      }
    }

    this.logger.debug('Loaded output', { path: this.filePath, rows: this.rows.length });
    return new Set(this.keys);
  }

  async append(row: OutputRow): Promise<void> {
    if (!this.loaded) {
      await this.load();
    }

    const key = rowKey(row);
    if (this.keys.has(key)) {
      throw new PersistenceError(
        `Row for ${key} already exists`,
        PersistenceErrorCode.DUPLICATE_KEY,
        { filePath: this.filePath }
      );
    }

    const next = [...this.rows, row];
    await this.writeRows(next);
    this.rows = next;
    this.keys.add(key);
  }

  /**
   * Rows currently in the output, in file order
   */
  getRows(): readonly OutputRow[] {
    return this.rows;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async readRows(): Promise<OutputRow[]> {
    let table: CsvTable;
    try {
      if (!(await fileExists(this.filePath))) {
        return [];
      }
      table = await readCsv(this.filePath);
    } catch (error) {
      throw new PersistenceError(
        `Failed to read output ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        PersistenceErrorCode.IO_ERROR,
        { filePath: this.filePath, cause: error }
      );
    }

    if (table.headers.length === 0 && table.rows.length === 0) {
      return [];
    }

    const expected = OUTPUT_COLUMNS.join(',');
    if (table.headers.join(',') !== expected) {
      throw new PersistenceError(
        `Unexpected output header in ${this.filePath}: expected "${expected}"`,
        PersistenceErrorCode.INVALID_OUTPUT,
        { filePath: this.filePath }
      );
    }

    return table.rows.map((raw, i) => {
      const parsed = OutputRowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new PersistenceError(
          `Invalid row ${i + 2} in ${this.filePath}: ${parsed.error.errors
            .map((e) => `${e.path.join('.')}: ${e.message}`)
            .join(', ')}`,
          PersistenceErrorCode.INVALID_OUTPUT,
          { filePath: this.filePath }
        );
      }
      return parsed.data;
    });
  }

  private async writeRows(rows: readonly OutputRow[]): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, formatCsv(OUTPUT_COLUMNS, rows), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temporary output', {
          path: tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw new PersistenceError(
        `Failed to write output ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        PersistenceErrorCode.IO_ERROR,
        { filePath: this.filePath, cause: error }
      );
    }
  }
}
