/**
 * Input discovery: numbered subfolders and the PDFs inside them.
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { type PaperFile, PaperStatus, makeFileKey } from '../extraction/index.js';
import { type Subfolder, DEFAULT_SUBFOLDER_PREFIX } from './types.js';

export class DiscoveryError extends Error {
  readonly code = 'DISCOVERY_ERROR';
  readonly path: string;
  override readonly cause: Error | undefined;

  constructor(message: string, path: string, cause?: unknown) {
    super(message);
    this.name = 'DiscoveryError';
    this.path = path;
    this.cause = cause instanceof Error ? cause : undefined;
  }
}

export function isDiscoveryError(error: unknown): error is DiscoveryError {
  return error instanceof DiscoveryError;
}

/**
 * Orders strings by Unicode code point (not UTF-16 code unit, not locale).
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Directories named `<prefix><N>`, ordered by N. Anything else is ignored.
 *
 * @throws {DiscoveryError} If the input directory cannot be read
 */
export async function listSubfolders(
  inputDir: string,
  prefix: string = DEFAULT_SUBFOLDER_PREFIX
): Promise<Subfolder[]> {
  const root = resolve(inputDir);
  const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)$`);

  const entries = await readdir(root, { withFileTypes: true }).catch((error: unknown) => {
    throw new DiscoveryError(`Cannot read input directory: ${root}`, root, error);
  });

  const subfolders: Subfolder[] = [];
  for (const entry of entries) {
    const match = entry.isDirectory() ? pattern.exec(entry.name) : null;
    if (match?.[1] !== undefined) {
      subfolders.push({
        name: entry.name,
        ordinal: Number.parseInt(match[1], 10),
        path: join(root, entry.name),
      });
    }
  }

  // part_2 before part_10; part_01 and part_1 tie-break by name
  return subfolders.sort(
    (a, b) => a.ordinal - b.ordinal || compareCodePoints(a.name, b.name)
  );
}

/**
 * Regular files ending in `.pdf` (any case), in code-point order.
 *
 * @throws {DiscoveryError} If the subfolder cannot be read
 */
export async function listPaperFiles(subfolder: Subfolder): Promise<PaperFile[]> {
  const entries = await readdir(subfolder.path, { withFileTypes: true }).catch(
    (error: unknown) => {
      throw new DiscoveryError(`Cannot read subfolder: ${subfolder.path}`, subfolder.path, error);
    }
  );

  return entries
    .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort(compareCodePoints)
    .map((filename) => ({
      path: join(subfolder.path, filename),
      subfolder: subfolder.name,
      filename,
      key: makeFileKey(subfolder.name, filename),
      status: PaperStatus.PENDING,
    }));
}
