/**
 * Batch Orchestrator
 *
 * Walks the numbered subfolders in order, sends each pending paper through
 * the extraction gateway and appends one row per paper to the progress
 * store. Between subfolders the run waits for the operator.
 *
 * Resumption relies on the store: the keys present when the run starts are
 * never processed or written again.
 */

import {
  type ExtractionFailed,
  type FileKey,
  type PaperFile,
  PaperStatus,
  isRunFatal,
} from '../extraction/index.js';
import {
  type OutputRow,
  type ProgressStore,
  failureToRow,
  isPersistenceError,
  recordToRow,
} from '../store/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { listPaperFiles, listSubfolders } from './discovery.js';
import {
  type BatchOrchestratorOptions,
  type BatchRunEvents,
  type CursorResettable,
  type FatalCondition,
  type OperatorGate,
  type PaperProcessor,
  type RunOptions,
  type RunSummary,
  type Subfolder,
  type SubfolderSummary,
  DEFAULT_SUBFOLDER_PREFIX,
  OperatorDecision,
  RunOptionsSchema,
  RunOutcome,
  RunPhase,
  createSubfolderSummary,
  sumSubfolders,
} from './types.js';

/**
 * Raised inside a run to unwind to the halt handler
 */
class RunHalt extends Error {
  constructor(readonly fatal: FatalCondition) {
    super(fatal.message);
    this.name = 'RunHalt';
  }
}

type StopReason = 'limit' | 'signal' | 'operator';

export class BatchOrchestrator {
  private readonly inputDir: string;
  private readonly prefix: string;
  private readonly processor: PaperProcessor;
  private readonly store: ProgressStore;
  private readonly operator: OperatorGate;
  private readonly credentials: CursorResettable | undefined;
  private readonly events: BatchRunEvents;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;

  private phase: RunPhase = RunPhase.IDLE;
  private running = false;
  private lastProcessed: FileKey | null = null;

  constructor(options: BatchOrchestratorOptions) {
    this.inputDir = options.inputDir;
    this.prefix = options.subfolderPrefix ?? DEFAULT_SUBFOLDER_PREFIX;
    this.processor = options.processor;
    this.store = options.store;
    this.operator = options.operator;
    this.credentials = options.credentials;
    this.events = options.events ?? {};
    this.logger = options.logger ?? getGlobalLogger().child('batch');
    this.signal = options.signal;
  }

  getPhase(): RunPhase {
    return this.phase;
  }

  /**
   * Runs the batch to completion, operator abort, or halt.
   *
   * @throws {DiscoveryError} If the input directory cannot be read
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    if (this.running) {
      throw new Error('Batch run already in progress');
    }
    this.running = true;
    this.lastProcessed = null;
    this.setPhase(RunPhase.IDLE);

    try {
      return await this.execute(RunOptionsSchema.parse(options));
    } finally {
      this.running = false;
    }
  }

  // ===========================================================================
  // Run Loop
  // ===========================================================================

  private async execute(options: {
    limit?: number | undefined;
    dryRun: boolean;
    retryFailed: boolean;
  }): Promise<RunSummary> {
    const startTime = Date.now();
    const summaries: SubfolderSummary[] = [];
    const finish = (
      outcome: RunSummary['outcome'],
      stopReason?: StopReason,
      fatal?: FatalCondition
    ): RunSummary => {
      const summary: RunSummary = {
        outcome,
        subfolders: summaries,
        totals: sumSubfolders(summaries),
        fatal,
        stoppedByLimit: stopReason === 'limit',
        dryRun: options.dryRun,
        durationMs: Date.now() - startTime,
      };
      this.setPhase(
        outcome === RunOutcome.HALTED
          ? RunPhase.HALTED
          : outcome === RunOutcome.ABORTED
            ? RunPhase.ABORTED
            : RunPhase.DONE
      );
      this.events.onRunComplete?.(summary);
      return summary;
    };
    const halt = (fatal: FatalCondition): RunSummary => {
      this.logger.debug('Run halted', { ...fatal });
      this.events.onRunHalted?.(fatal);
      return finish(RunOutcome.HALTED, undefined, fatal);
    };

    this.setPhase(RunPhase.SCANNING);

    let done: Set<FileKey>;
    try {
      // A dry run never rewrites the output, so failed rows are not pruned
      done = await this.store.load({ retryFailed: options.retryFailed && !options.dryRun });
    } catch (error) {
      return halt(this.persistenceFatal(error, null));
    }

    const subfolders = await listSubfolders(this.inputDir, this.prefix);
    this.events.onRunStart?.({
      inputDir: this.inputDir,
      subfolders,
      alreadyDone: done.size,
      dryRun: options.dryRun,
    });

    let attempted = 0;

    for (const [i, subfolder] of subfolders.entries()) {
      this.setPhase(RunPhase.SCANNING);
      this.credentials?.resetCursor();

      const files = await listPaperFiles(subfolder);
      const pending = files.filter((file) => !done.has(file.key));
      const summary = createSubfolderSummary(subfolder.name);
      summary.discovered = files.length;
      summary.skipped = files.length - pending.length;
      summaries.push(summary);

      this.events.onSubfolderStart?.(subfolder, pending, summary.skipped);

      if (options.dryRun) {
        summary.notAttempted = pending.length;
        this.events.onSubfolderComplete?.(summary);
        continue;
      }

      this.setPhase(RunPhase.PROCESSING);
      let stopReason: StopReason | undefined;

      for (const [j, file] of pending.entries()) {
        if (options.limit !== undefined && attempted >= options.limit) {
          stopReason = 'limit';
        } else if (this.signal?.aborted) {
          stopReason = 'signal';
        }
        if (stopReason) {
          summary.notAttempted = pending.length - j;
          break;
        }

        attempted++;
        this.events.onFileStart?.(file, { index: j + 1, total: pending.length });

        try {
          await this.processFile(file, summary);
        } catch (error) {
          if (error instanceof RunHalt) {
            summary.notAttempted = pending.length - j - 1;
            this.events.onSubfolderComplete?.(summary);
            return halt(error.fatal);
          }
          throw error;
        }
      }

      this.events.onSubfolderComplete?.(summary);

      if (stopReason === undefined && options.limit !== undefined && attempted >= options.limit) {
        stopReason = 'limit';
      }
      if (stopReason === undefined && this.signal?.aborted) {
        stopReason = 'signal';
      }
      if (stopReason === 'limit') {
        this.logger.info('File limit reached', { limit: options.limit });
        return finish(RunOutcome.COMPLETED, stopReason);
      }
      if (stopReason === 'signal') {
        return finish(RunOutcome.ABORTED, stopReason);
      }

      const next = subfolders[i + 1];
      if (next && !(await this.askToContinue(summary, next, i + 1, subfolders.length))) {
        return finish(RunOutcome.ABORTED, 'operator');
      }
    }

    return finish(RunOutcome.COMPLETED);
  }

  /**
   * Processes one file and writes its row.
   *
   * @throws {RunHalt} On a run-fatal extraction failure or a persistence error
   */
  private async processFile(file: PaperFile, summary: SubfolderSummary): Promise<void> {
    const result = await this.processor.process(file);

    if (result.ok) {
      await this.writeRow(file, recordToRow(result.record));
      file.status = PaperStatus.SUCCEEDED;
      summary.succeeded++;
      this.events.onFileSucceeded?.(file, result.record);
      return;
    }

    const failure: ExtractionFailed = result.failure;
    if (isRunFatal(failure)) {
      throw new RunHalt({
        stage: failure.stage,
        cause: failure.cause,
        message: failure.message,
        file: file.key,
        lastProcessed: this.lastProcessed,
      });
    }

    await this.writeRow(file, failureToRow(file, failure));
    file.status = PaperStatus.FAILED;
    summary.failed++;
    this.events.onFileFailed?.(file, failure);
  }

  private async writeRow(file: PaperFile, row: OutputRow): Promise<void> {
    try {
      await this.store.append(row);
    } catch (error) {
      throw new RunHalt(this.persistenceFatal(error, file.key));
    }
    this.lastProcessed = file.key;
  }

  private async askToContinue(
    completed: SubfolderSummary,
    next: Subfolder,
    position: number,
    totalSubfolders: number
  ): Promise<boolean> {
    this.setPhase(RunPhase.AWAITING_OPERATOR);
    const checkpoint = { completed, next, position, totalSubfolders };
    this.events.onAwaitingOperator?.(checkpoint);

    const decision = await this.operator.awaitDecision(checkpoint);
    this.logger.debug('Operator decision', { decision, next: next.name });
    return decision === OperatorDecision.CONTINUE;
  }

  private persistenceFatal(error: unknown, file: FileKey | null): FatalCondition {
    if (!isPersistenceError(error)) {
      throw error;
    }
    return {
      stage: 'persistence',
      cause: error.code,
      message: error.message,
      file,
      lastProcessed: this.lastProcessed,
    };
  }

  private setPhase(next: RunPhase): void {
    const previous = this.phase;
    this.phase = next;
    if (previous !== next) {
      this.events.onPhaseChange?.(previous, next);
    }
  }
}
