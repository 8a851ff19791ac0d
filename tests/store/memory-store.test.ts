/**
 * Unit Tests for In-Memory Progress Store and Row Mapping
 */

import { describe, it, expect } from 'vitest';
import { InMemoryProgressStore } from '../../lib/src/store/memory-store.js';
import {
  PersistenceErrorCode,
  failureToRow,
  isPersistenceError,
  recordToRow,
  type OutputRow,
} from '../../lib/src/store/types.js';
import type { PaperFile } from '../../lib/src/extraction/types.js';

const FILE: PaperFile = {
  path: '/papers/part_3/c.pdf',
  subfolder: 'part_3',
  filename: 'c.pdf',
  key: 'part_3/c.pdf',
  status: 'pending',
};

const row = (filename: string, status: OutputRow['status']): OutputRow => ({
  subfolder: 'part_1',
  filename,
  author_surname: '',
  author_initial: '',
  year: '',
  title: '',
  abstract: '',
  status,
  failure_reason: status === 'Failed' ? 'ApiError' : '',
});

describe('recordToRow', () => {
  it('should map a record to a succeeded row', () => {
    expect(
      recordToRow({
        authorSurname: 'Nguyen',
        authorInitial: 'T.',
        year: 1999,
        title: 'On Sorting',
        abstract: '',
        sourceFile: FILE,
      })
    ).toEqual({
      subfolder: 'part_3',
      filename: 'c.pdf',
      author_surname: 'Nguyen',
      author_initial: 'T.',
      year: '1999',
      title: 'On Sorting',
      abstract: '',
      status: 'Succeeded',
      failure_reason: '',
    });
  });

  it('should write an unknown year as text', () => {
    const mapped = recordToRow({
      authorSurname: 'Nguyen',
      authorInitial: 'T.',
      year: 'unknown',
      title: 'On Sorting',
      abstract: '',
      sourceFile: FILE,
    });

    expect(mapped.year).toBe('unknown');
  });
});

describe('failureToRow', () => {
  it('should record the cause with empty metadata', () => {
    expect(
      failureToRow(FILE, { stage: 'analysis', cause: 'SchemaMismatch', message: 'bad response' })
    ).toEqual({
      subfolder: 'part_3',
      filename: 'c.pdf',
      author_surname: '',
      author_initial: '',
      year: '',
      title: '',
      abstract: '',
      status: 'Failed',
      failure_reason: 'SchemaMismatch',
    });
  });
});

describe('InMemoryProgressStore', () => {
  it('should load the keys of its initial rows', async () => {
    const store = new InMemoryProgressStore([row('a.pdf', 'Succeeded'), row('b.pdf', 'Failed')]);

    expect(await store.load()).toEqual(new Set(['part_1/a.pdf', 'part_1/b.pdf']));
  });

  it('should drop failed rows when retrying failures', async () => {
    const store = new InMemoryProgressStore([row('a.pdf', 'Succeeded'), row('b.pdf', 'Failed')]);

    expect(await store.load({ retryFailed: true })).toEqual(new Set(['part_1/a.pdf']));
    expect(store.getRows()).toEqual([row('a.pdf', 'Succeeded')]);
  });

  it('should append rows in order', async () => {
    const store = new InMemoryProgressStore();

    await store.append(row('a.pdf', 'Succeeded'));
    await store.append(row('b.pdf', 'Failed'));

    expect(store.getRows().map((r) => r.filename)).toEqual(['a.pdf', 'b.pdf']);
  });

  it('should reject a duplicate key', async () => {
    const store = new InMemoryProgressStore([row('a.pdf', 'Failed')]);

    const error = await store.append(row('a.pdf', 'Succeeded')).catch((e: unknown) => e);

    expect(isPersistenceError(error) && error.code).toBe(PersistenceErrorCode.DUPLICATE_KEY);
    expect(store.getRows()).toHaveLength(1);
  });
});
