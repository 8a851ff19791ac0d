/**
 * Unit Tests for Batch Orchestrator
 *
 * Real directories on disk, an in-memory store, a scripted processor and a
 * scripted operator.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { BatchOrchestrator } from '../../lib/src/batch/orchestrator.js';
import { DiscoveryError } from '../../lib/src/batch/discovery.js';
import {
  OperatorDecision,
  RunPhase,
  type BatchRunEvents,
  type OperatorCheckpoint,
  type OperatorGate,
  type PaperProcessor,
} from '../../lib/src/batch/types.js';
import type {
  ExtractionFailed,
  GatewayResult,
  PaperFile,
} from '../../lib/src/extraction/types.js';
import { InMemoryProgressStore } from '../../lib/src/store/memory-store.js';
import {
  PersistenceError,
  PersistenceErrorCode,
  type LoadOptions,
  type OutputRow,
} from '../../lib/src/store/types.js';
import { Logger, createSilentLogger } from '../../lib/src/logging/logger.js';
import { LogLevel } from '../../lib/src/logging/types.js';

// =============================================================================
// Fakes
// =============================================================================

class ScriptedProcessor implements PaperProcessor {
  readonly processed: string[] = [];
  readonly outcomes = new Map<string, GatewayResult>();
  onProcess: ((file: PaperFile) => void) | undefined;

  async process(file: PaperFile): Promise<GatewayResult> {
    this.processed.push(file.key);
    this.onProcess?.(file);
    return (
      this.outcomes.get(file.key) ?? {
        ok: true,
        record: {
          authorSurname: 'Smith',
          authorInitial: 'J.',
          year: 2020,
          title: `Title of ${file.filename}`,
          abstract: '',
          sourceFile: file,
        },
      }
    );
  }

  fail(key: string, failure: ExtractionFailed): void {
    this.outcomes.set(key, { ok: false, failure });
  }
}

class ScriptedOperator implements OperatorGate {
  readonly checkpoints: OperatorCheckpoint[] = [];

  constructor(private readonly decisions: OperatorDecision[] = []) {}

  async awaitDecision(checkpoint: OperatorCheckpoint): Promise<OperatorDecision> {
    this.checkpoints.push(checkpoint);
    return this.decisions.shift() ?? OperatorDecision.CONTINUE;
  }
}

/**
 * Holds every decision until the test releases it.
 */
class HeldOperator implements OperatorGate {
  readonly checkpoints: OperatorCheckpoint[] = [];
  readonly reached: Promise<void>;
  private signalReached: () => void = () => {};
  private decide: (decision: OperatorDecision) => void = () => {};

  constructor() {
    this.reached = new Promise((resolve) => {
      this.signalReached = resolve;
    });
  }

  awaitDecision(checkpoint: OperatorCheckpoint): Promise<OperatorDecision> {
    this.checkpoints.push(checkpoint);
    return new Promise((resolve) => {
      this.decide = resolve;
      this.signalReached();
    });
  }

  release(decision: OperatorDecision): void {
    this.decide(decision);
  }
}

class FailingStore extends InMemoryProgressStore {
  constructor(
    private readonly failOn: 'load' | 'append',
    private readonly error: PersistenceError
  ) {
    super();
  }

  override async load(options?: LoadOptions): Promise<Set<string>> {
    if (this.failOn === 'load') {
      throw this.error;
    }
    return super.load(options);
  }

  override async append(row: OutputRow): Promise<void> {
    if (this.failOn === 'append') {
      throw this.error;
    }
    return super.append(row);
  }
}

// =============================================================================
// Fixtures
// =============================================================================

const EXHAUSTED: ExtractionFailed = {
  stage: 'analysis',
  cause: 'AllCredentialsExhausted',
  message: 'All 2 credential(s) unavailable (2 cooling, 0 revoked)',
};

const EMPTY_PAGE: ExtractionFailed = { stage: 'text', cause: 'EmptyPage', message: 'no text' };

const existingRow = (
  subfolder: string,
  filename: string,
  status: OutputRow['status']
): OutputRow => ({
  subfolder,
  filename,
  author_surname: '',
  author_initial: '',
  year: '',
  title: '',
  abstract: '',
  status,
  failure_reason: status === 'Failed' ? 'ApiError' : '',
});

// =============================================================================
// Test Suites
// =============================================================================

describe('BatchOrchestrator', () => {
  let inputDir: string;
  let processor: ScriptedProcessor;
  let operator: ScriptedOperator;
  let store: InMemoryProgressStore;

  const createTree = async (tree: Record<string, string[]>): Promise<void> => {
    for (const [subfolder, files] of Object.entries(tree)) {
      await mkdir(path.join(inputDir, subfolder), { recursive: true });
      for (const file of files) {
        await writeFile(path.join(inputDir, subfolder, file), '%PDF-1.4');
      }
    }
  };

  const createOrchestrator = (
    overrides: {
      events?: BatchRunEvents;
      signal?: AbortSignal;
      credentials?: { resetCursor: () => void };
      store?: InMemoryProgressStore;
    } = {}
  ): BatchOrchestrator =>
    new BatchOrchestrator({
      inputDir,
      processor,
      store: overrides.store ?? store,
      operator,
      credentials: overrides.credentials,
      events: overrides.events,
      signal: overrides.signal,
      logger: createSilentLogger(),
    });

  beforeEach(async () => {
    inputDir = await mkdtemp(path.join(tmpdir(), 'batch-'));
    processor = new ScriptedProcessor();
    operator = new ScriptedOperator();
    store = new InMemoryProgressStore();
  });

  afterEach(async () => {
    await rm(inputDir, { recursive: true, force: true });
  });

  describe('complete runs', () => {
    it('should process subfolders in numeric order and pause between them', async () => {
      await createTree({
        part_10: ['d.pdf'],
        part_1: ['b.pdf', 'a.pdf'],
        part_2: ['c.pdf'],
      });
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run();

      expect(processor.processed).toEqual([
        'part_1/a.pdf',
        'part_1/b.pdf',
        'part_2/c.pdf',
        'part_10/d.pdf',
      ]);
      expect(store.getRows().map((r) => `${r.subfolder}/${r.filename}`)).toEqual(
        processor.processed
      );
      expect(operator.checkpoints.map((c) => [c.completed.name, c.next.name, c.position])).toEqual([
        ['part_1', 'part_2', 1],
        ['part_2', 'part_10', 2],
      ]);
      expect(summary.outcome).toBe('completed');
      expect(summary.totals).toEqual({
        discovered: 4,
        skipped: 0,
        succeeded: 4,
        failed: 0,
        notAttempted: 0,
      });
      expect(summary.stoppedByLimit).toBe(false);
      expect(orchestrator.getPhase()).toBe(RunPhase.DONE);
    });

    it('should write succeeded rows with the extracted metadata', async () => {
      await createTree({ part_1: ['a.pdf'] });

      await createOrchestrator().run();

      expect(store.getRows()).toEqual([
        {
          subfolder: 'part_1',
          filename: 'a.pdf',
          author_surname: 'Smith',
          author_initial: 'J.',
          year: '2020',
          title: 'Title of a.pdf',
          abstract: '',
          status: 'Succeeded',
          failure_reason: '',
        },
      ]);
    });

    it('should complete with nothing to do when there are no subfolders', async () => {
      const summary = await createOrchestrator().run();

      expect(summary.outcome).toBe('completed');
      expect(summary.subfolders).toEqual([]);
      expect(operator.checkpoints).toEqual([]);
    });

    it('should reject a missing input directory', async () => {
      await rm(inputDir, { recursive: true, force: true });

      await expect(createOrchestrator().run()).rejects.toBeInstanceOf(DiscoveryError);
    });

    it('should refuse a second run while one is in progress', async () => {
      await createTree({ part_1: ['a.pdf'] });
      const orchestrator = createOrchestrator();

      const first = orchestrator.run();

      await expect(orchestrator.run()).rejects.toThrow('Batch run already in progress');
      await expect(first).resolves.toMatchObject({ outcome: 'completed' });
    });
  });

  describe('resumption', () => {
    it('should skip papers already in the output', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'], part_2: ['c.pdf'] });
      store = new InMemoryProgressStore([
        existingRow('part_1', 'a.pdf', 'Succeeded'),
        existingRow('part_2', 'c.pdf', 'Failed'),
      ]);

      const summary = await createOrchestrator().run();

      expect(processor.processed).toEqual(['part_1/b.pdf']);
      expect(summary.subfolders.map((s) => [s.name, s.skipped, s.succeeded])).toEqual([
        ['part_1', 1, 1],
        ['part_2', 1, 0],
      ]);
    });

    it('should reprocess failed papers when retrying failures', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'] });
      store = new InMemoryProgressStore([
        existingRow('part_1', 'a.pdf', 'Succeeded'),
        existingRow('part_1', 'b.pdf', 'Failed'),
      ]);

      await createOrchestrator().run({ retryFailed: true });

      expect(processor.processed).toEqual(['part_1/b.pdf']);
      expect(store.getRows().map((r) => [r.filename, r.status])).toEqual([
        ['a.pdf', 'Succeeded'],
        ['b.pdf', 'Succeeded'],
      ]);
    });
  });

  describe('per-file failures', () => {
    it('should record a failed row and keep going', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf', 'c.pdf'] });
      processor.fail('part_1/b.pdf', EMPTY_PAGE);

      const summary = await createOrchestrator().run();

      expect(processor.processed).toHaveLength(3);
      expect(store.getRows()[1]).toEqual({
        ...existingRow('part_1', 'b.pdf', 'Failed'),
        failure_reason: 'EmptyPage',
      });
      expect(summary.totals.failed).toBe(1);
      expect(summary.totals.succeeded).toBe(2);
    });
  });

  describe('halting', () => {
    it('should halt without a row when every credential is exhausted', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf', 'c.pdf'], part_2: ['d.pdf'] });
      processor.fail('part_1/b.pdf', EXHAUSTED);
      const onRunHalted = vi.fn();
      const orchestrator = createOrchestrator({ events: { onRunHalted } });

      const summary = await orchestrator.run();

      const expectedFatal = {
        stage: 'analysis',
        cause: 'AllCredentialsExhausted',
        message: 'All 2 credential(s) unavailable (2 cooling, 0 revoked)',
        file: 'part_1/b.pdf',
        lastProcessed: 'part_1/a.pdf',
      };
      expect(summary.outcome).toBe('halted');
      expect(summary.fatal).toEqual(expectedFatal);
      expect(onRunHalted).toHaveBeenCalledWith(expectedFatal);
      expect(processor.processed).toEqual(['part_1/a.pdf', 'part_1/b.pdf']);
      expect(store.getRows().map((r) => r.filename)).toEqual(['a.pdf']);
      expect(summary.subfolders[0]?.notAttempted).toBe(1);
      expect(operator.checkpoints).toEqual([]);
      expect(orchestrator.getPhase()).toBe(RunPhase.HALTED);
    });

    it('should leave reporting the halt to the observer', async () => {
      await createTree({ part_1: ['a.pdf'] });
      processor.fail('part_1/a.pdf', EXHAUSTED);
      const lines: string[] = [];
      const orchestrator = new BatchOrchestrator({
        inputDir,
        processor,
        store,
        operator,
        logger: new Logger({
          level: LogLevel.WARN,
          timestamps: false,
          output: (formatted) => {
            lines.push(formatted);
          },
        }),
      });

      const summary = await orchestrator.run();

      expect(summary.outcome).toBe('halted');
      expect(lines).toEqual([]);
    });

    it('should halt when a row cannot be written', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'] });
      const failing = new FailingStore(
        'append',
        new PersistenceError('Failed to write output out.csv: disk full', PersistenceErrorCode.IO_ERROR)
      );

      const summary = await createOrchestrator({ store: failing }).run();

      expect(summary.outcome).toBe('halted');
      expect(summary.fatal).toEqual({
        stage: 'persistence',
        cause: 'IO_ERROR',
        message: 'Failed to write output out.csv: disk full',
        file: 'part_1/a.pdf',
        lastProcessed: null,
      });
      expect(processor.processed).toEqual(['part_1/a.pdf']);
    });

    it('should halt before processing when the output cannot be loaded', async () => {
      await createTree({ part_1: ['a.pdf'] });
      const failing = new FailingStore(
        'load',
        new PersistenceError('Output contains more than one row for part_1/a.pdf', PersistenceErrorCode.INVALID_OUTPUT)
      );

      const summary = await createOrchestrator({ store: failing }).run();

      expect(summary.outcome).toBe('halted');
      expect(summary.fatal?.file).toBeNull();
      expect(summary.fatal?.cause).toBe('INVALID_OUTPUT');
      expect(processor.processed).toEqual([]);
    });

    it('should propagate errors that are not persistence errors', async () => {
      await createTree({ part_1: ['a.pdf'] });
      processor.onProcess = () => {
        throw new Error('processor bug');
      };

      await expect(createOrchestrator().run()).rejects.toThrow('processor bug');
    });
  });

  describe('operator gate', () => {
    it('should stop when the operator aborts', async () => {
      await createTree({ part_1: ['a.pdf'], part_2: ['b.pdf'] });
      operator = new ScriptedOperator([OperatorDecision.ABORT]);
      const orchestrator = createOrchestrator();

      const summary = await orchestrator.run();

      expect(summary.outcome).toBe('aborted');
      expect(processor.processed).toEqual(['part_1/a.pdf']);
      expect(summary.subfolders.map((s) => s.name)).toEqual(['part_1']);
      expect(orchestrator.getPhase()).toBe(RunPhase.ABORTED);
    });

    it('should make no further calls while the operator decides', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf', 'c.pdf'], part_2: ['d.pdf'] });
      processor.fail('part_1/b.pdf', EMPTY_PAGE);
      const held = new HeldOperator();
      const orchestrator = new BatchOrchestrator({
        inputDir,
        processor,
        store,
        operator: held,
        logger: createSilentLogger(),
      });

      const running = orchestrator.run();
      await held.reached;
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(processor.processed).toEqual(['part_1/a.pdf', 'part_1/b.pdf', 'part_1/c.pdf']);
      expect(store.getRows()).toHaveLength(3);
      expect(orchestrator.getPhase()).toBe(RunPhase.AWAITING_OPERATOR);
      expect(held.checkpoints[0]?.completed).toEqual({
        name: 'part_1',
        discovered: 3,
        skipped: 0,
        succeeded: 2,
        failed: 1,
        notAttempted: 0,
      });

      held.release(OperatorDecision.CONTINUE);
      const summary = await running;

      expect(summary.outcome).toBe('completed');
      expect(processor.processed).toEqual([
        'part_1/a.pdf',
        'part_1/b.pdf',
        'part_1/c.pdf',
        'part_2/d.pdf',
      ]);
      expect(store.getRows()).toHaveLength(4);
    });

    it('should not ask after the last subfolder', async () => {
      await createTree({ part_1: ['a.pdf'] });

      await createOrchestrator().run();

      expect(operator.checkpoints).toEqual([]);
    });

    it('should ask even when a subfolder had nothing pending', async () => {
      await createTree({ part_1: ['a.pdf'], part_2: ['b.pdf'] });
      store = new InMemoryProgressStore([existingRow('part_1', 'a.pdf', 'Succeeded')]);

      await createOrchestrator().run();

      expect(operator.checkpoints).toHaveLength(1);
      expect(operator.checkpoints[0]?.completed).toEqual({
        name: 'part_1',
        discovered: 1,
        skipped: 1,
        succeeded: 0,
        failed: 0,
        notAttempted: 0,
      });
      expect(operator.checkpoints[0]?.totalSubfolders).toBe(2);
    });
  });

  describe('limits and dry runs', () => {
    it('should stop once the file limit is reached', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'], part_2: ['c.pdf'] });

      const summary = await createOrchestrator().run({ limit: 1 });

      expect(processor.processed).toEqual(['part_1/a.pdf']);
      expect(summary.outcome).toBe('completed');
      expect(summary.stoppedByLimit).toBe(true);
      expect(summary.subfolders[0]?.notAttempted).toBe(1);
      expect(operator.checkpoints).toEqual([]);
    });

    it('should stop at a subfolder boundary when the limit is reached there', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'], part_2: ['c.pdf'] });

      const summary = await createOrchestrator().run({ limit: 2 });

      expect(processor.processed).toEqual(['part_1/a.pdf', 'part_1/b.pdf']);
      expect(summary.stoppedByLimit).toBe(true);
      expect(summary.subfolders.map((s) => s.name)).toEqual(['part_1']);
      expect(operator.checkpoints).toEqual([]);
    });

    it('should reject an invalid limit', async () => {
      await expect(createOrchestrator().run({ limit: 0 })).rejects.toThrow();
    });

    it('should list pending papers without processing or writing in a dry run', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'], part_2: ['c.pdf'] });
      store = new InMemoryProgressStore([existingRow('part_1', 'a.pdf', 'Failed')]);
      const onSubfolderStart = vi.fn();

      const summary = await createOrchestrator({ events: { onSubfolderStart } }).run({
        dryRun: true,
        retryFailed: true,
      });

      expect(processor.processed).toEqual([]);
      expect(operator.checkpoints).toEqual([]);
      expect(store.getRows()).toEqual([existingRow('part_1', 'a.pdf', 'Failed')]);
      expect(summary.dryRun).toBe(true);
      expect(summary.totals).toEqual({
        discovered: 3,
        skipped: 1,
        succeeded: 0,
        failed: 0,
        notAttempted: 2,
      });
      const pendingKeys = onSubfolderStart.mock.calls.map((call: unknown[]) =>
        Array.isArray(call[1]) ? call[1].map((f: PaperFile) => f.key) : []
      );
      expect(pendingKeys).toEqual([['part_1/b.pdf'], ['part_2/c.pdf']]);
    });
  });

  describe('cancellation', () => {
    it('should stop before the next file once the signal fires', async () => {
      await createTree({ part_1: ['a.pdf', 'b.pdf'], part_2: ['c.pdf'] });
      const controller = new AbortController();
      processor.onProcess = () => controller.abort();

      const summary = await createOrchestrator({ signal: controller.signal }).run();

      expect(processor.processed).toEqual(['part_1/a.pdf']);
      expect(store.getRows()).toHaveLength(1);
      expect(summary.outcome).toBe('aborted');
      expect(summary.subfolders[0]?.notAttempted).toBe(1);
      expect(operator.checkpoints).toEqual([]);
    });
  });

  describe('credentials', () => {
    it('should reset the credential cursor for every subfolder', async () => {
      await createTree({ part_1: ['a.pdf'], part_2: ['b.pdf'], part_3: [] });
      const credentials = { resetCursor: vi.fn() };

      await createOrchestrator({ credentials }).run();

      expect(credentials.resetCursor).toHaveBeenCalledTimes(3);
    });
  });

  describe('events', () => {
    it('should report transitions in order', async () => {
      await createTree({ part_1: ['a.pdf'], part_2: ['b.pdf'] });
      processor.fail('part_2/b.pdf', EMPTY_PAGE);
      const log: string[] = [];

      await createOrchestrator({
        events: {
          onPhaseChange: (from, to) => log.push(`phase:${from}->${to}`),
          onRunStart: (info) => log.push(`runStart:${info.subfolders.length}`),
          onSubfolderStart: (subfolder, pending) =>
            log.push(`subfolderStart:${subfolder.name}:${pending.length}`),
          onFileStart: (file, position) =>
            log.push(`fileStart:${file.key}:${position.index}/${position.total}`),
          onFileSucceeded: (file) => log.push(`fileSucceeded:${file.key}:${file.status}`),
          onFileFailed: (file, failure) =>
            log.push(`fileFailed:${file.key}:${file.status}:${failure.cause}`),
          onSubfolderComplete: (summary) => log.push(`subfolderComplete:${summary.name}`),
          onAwaitingOperator: (checkpoint) => log.push(`awaiting:${checkpoint.next.name}`),
          onRunComplete: (summary) => log.push(`runComplete:${summary.outcome}`),
        },
      }).run();

      expect(log).toEqual([
        'phase:idle->scanning',
        'runStart:2',
        'subfolderStart:part_1:1',
        'phase:scanning->processing',
        'fileStart:part_1/a.pdf:1/1',
        'fileSucceeded:part_1/a.pdf:succeeded',
        'subfolderComplete:part_1',
        'phase:processing->awaiting_operator',
        'awaiting:part_2',
        'phase:awaiting_operator->scanning',
        'subfolderStart:part_2:1',
        'phase:scanning->processing',
        'fileStart:part_2/b.pdf:1/1',
        'fileFailed:part_2/b.pdf:failed:EmptyPage',
        'subfolderComplete:part_2',
        'phase:processing->done',
        'runComplete:completed',
      ]);
    });
  });
});
