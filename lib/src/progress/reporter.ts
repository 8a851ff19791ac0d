/**
 * Run Reporter
 *
 * Console feedback for a batch run. Subscribes to orchestrator events,
 * writes through the logger and keeps run statistics.
 */

import type {
  BatchRunEvents,
  FatalCondition,
  FilePosition,
  OperatorCheckpoint,
  RunStartInfo,
  RunSummary,
  Subfolder,
  SubfolderSummary,
} from '../batch/index.js';
import type { ExtractedRecord, ExtractionFailed, PaperFile } from '../extraction/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import {
  type RunStatistics,
  calculatePercentage,
  createEmptyStatistics,
  createProgressBar,
  estimateRemainingTime,
  formatDuration,
} from './types.js';

export interface RunReporterOptions {
  logger?: Logger | undefined;
  /** Clock for elapsed-time and ETA figures */
  now?: (() => Date) | undefined;
}

export class RunReporter implements BatchRunEvents {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private stats: RunStatistics = createEmptyStatistics();
  /** File positions restart at every subfolder, and so does the ETA */
  private subfolderStartTime: Date | undefined;

  constructor(options: RunReporterOptions = {}) {
    this.logger = options.logger ?? getGlobalLogger().child('progress');
    this.now = options.now ?? (() => new Date());
  }

  getStatistics(): Readonly<RunStatistics> {
    return this.stats;
  }

  onRunStart = (info: RunStartInfo): void => {
    this.stats = createEmptyStatistics();
    this.stats.startTime = this.now();
    this.subfolderStartTime = undefined;

    const mode = info.dryRun ? ' (dry run)' : '';
    this.logger.info(`Starting run${mode}`, {
      inputDir: info.inputDir,
      subfolders: info.subfolders.length,
      alreadyDone: info.alreadyDone,
    });
    if (info.subfolders.length === 0) {
      this.logger.warn('No subfolders found', { inputDir: info.inputDir });
    }
  };

  onSubfolderStart = (
    subfolder: Subfolder,
    pending: readonly PaperFile[],
    skipped: number
  ): void => {
    this.subfolderStartTime = this.now();
    this.stats.pending += pending.length;
    this.stats.skipped += skipped;
    this.logger.info(`Subfolder ${subfolder.name}`, { pending: pending.length, skipped });

    for (const file of pending) {
      this.logger.debug('Pending', { file: file.key });
    }
  };

  onFileStart = (file: PaperFile, position: FilePosition): void => {
    this.stats.attempted++;

    const elapsedMs = this.msSince(this.subfolderStartTime);
    const percentage = calculatePercentage(position.index - 1, position.total);
    const eta = estimateRemainingTime(position.index - 1, position.total, elapsedMs);
    this.logger.info(
      `${createProgressBar(percentage)} ${position.index}/${position.total} ${file.filename}`,
      eta !== undefined ? { eta: formatDuration(eta) } : undefined
    );
  };

  onFileSucceeded = (file: PaperFile, record: ExtractedRecord): void => {
    this.stats.succeeded++;
    this.logger.info(`Extracted ${file.key}`, {
      author: `${record.authorSurname}, ${record.authorInitial}`.replace(/^, |, $/g, ''),
      year: record.year,
    });
    this.logger.debug('Title', { file: file.key, title: record.title });
  };

  onFileFailed = (file: PaperFile, failure: ExtractionFailed): void => {
    this.stats.failed++;
    this.stats.failuresByCause[failure.cause] =
      (this.stats.failuresByCause[failure.cause] ?? 0) + 1;
    this.logger.warn(`Failed ${file.key}`, {
      stage: failure.stage,
      cause: failure.cause,
      message: failure.message,
    });
  };

  onSubfolderComplete = (summary: SubfolderSummary): void => {
    this.stats.subfoldersCompleted++;
    this.logger.info(`Finished ${summary.name}`, {
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      ...(summary.notAttempted > 0 && { notAttempted: summary.notAttempted }),
    });
  };

  onAwaitingOperator = (checkpoint: OperatorCheckpoint): void => {
    this.logger.info(`Waiting for operator before ${checkpoint.next.name}`, {
      completed: `${checkpoint.position}/${checkpoint.totalSubfolders}`,
    });
  };

  onRunHalted = (fatal: FatalCondition): void => {
    this.logger.error(`Run halted: ${fatal.cause}`, {
      stage: fatal.stage,
      message: fatal.message,
      file: fatal.file,
      lastProcessed: fatal.lastProcessed,
    });
    this.logger.error('Re-run the same command to resume from the first unprocessed file');
  };

  onRunComplete = (summary: RunSummary): void => {
    this.stats.endTime = this.now();
    const { totals } = summary;

    this.logger.info(`Run ${summary.outcome} in ${formatDuration(this.msSince(this.stats.startTime))}`, {
      succeeded: totals.succeeded,
      failed: totals.failed,
      skipped: totals.skipped,
      notAttempted: totals.notAttempted,
      ...(summary.stoppedByLimit && { stoppedByLimit: true }),
    });

    if (Object.keys(this.stats.failuresByCause).length > 0) {
      this.logger.info('Failures by cause', { ...this.stats.failuresByCause });
    }
  };

  private msSince(start: Date | null | undefined): number {
    return start ? this.now().getTime() - start.getTime() : 0;
  }
}

export function createRunReporter(logger?: Logger): RunReporter {
  return new RunReporter({ logger });
}
