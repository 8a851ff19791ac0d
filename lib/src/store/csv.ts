/**
 * CSV encoding for the output table. Reading goes through csv-parser;
 * writing quotes every field that needs it.
 */

import { createReadStream } from 'node:fs';
import csv from 'csv-parser';

export interface CsvTable {
  headers: string[];
  rows: Array<Record<string, string>>;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvLine(values: readonly string[]): string {
  return values.map(escapeCsvField).join(',');
}

/**
 * Header line plus one line per row, each terminated by `\n`.
 */
export function formatCsv<K extends string>(
  columns: readonly K[],
  rows: ReadonlyArray<Record<K, string>>
): string {
  const lines = [
    formatCsvLine(columns),
    ...rows.map((row) => formatCsvLine(columns.map((column) => row[column]))),
  ];
  return `${lines.join('\n')}\n`;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

/**
 * Reads a CSV file with a header row. An empty file yields no headers.
 */
export function readCsv(filePath: string): Promise<CsvTable> {
  return new Promise((resolve, reject) => {
    const table: CsvTable = { headers: [], rows: [] };

    createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ strict: true }))
      .on('headers', (headers: unknown) => {
        if (Array.isArray(headers)) {
          table.headers = headers.map(String);
        }
      })
      .on('data', (row: unknown) => {
        if (isStringRecord(row)) {
          table.rows.push(row);
        } else {
          reject(new Error(`Unexpected CSV row at line ${table.rows.length + 2}`));
        }
      })
      .on('end', () => resolve(table))
      .on('error', reject);
  });
}
