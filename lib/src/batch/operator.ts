/**
 * Operator gates for the pause between subfolders.
 */

import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import {
  type OperatorCheckpoint,
  type OperatorGate,
  OperatorDecision,
} from './types.js';

/**
 * Always continues (the `--yes` flag).
 */
export class AutoContinueGate implements OperatorGate {
  async awaitDecision(): Promise<OperatorDecision> {
    return OperatorDecision.CONTINUE;
  }
}

export interface ConsoleOperatorGateOptions {
  input?: Readable | undefined;
  output?: Writable | undefined;
  /** Whether the input is interactive; defaults to `process.stdin.isTTY` */
  interactive?: boolean | undefined;
  /** Aborting cancels a pending question */
  signal?: AbortSignal | undefined;
}

export function formatCheckpointQuestion(checkpoint: OperatorCheckpoint): string {
  const { completed, next, position, totalSubfolders } = checkpoint;
  return (
    `Finished ${completed.name} (${position}/${totalSubfolders}): ` +
    `${completed.succeeded} succeeded, ${completed.failed} failed, ${completed.skipped} skipped. ` +
    `Continue with ${next.name}? [y/N]: `
  );
}

/**
 * Asks on the terminal. Anything but `y`/`yes` aborts, and so does a
 * non-interactive input.
 */
export class ConsoleOperatorGate implements OperatorGate {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly interactive: boolean;
  private readonly signal: AbortSignal | undefined;

  constructor(options: ConsoleOperatorGateOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.interactive = options.interactive ?? process.stdin.isTTY === true;
    this.signal = options.signal;
  }

  async awaitDecision(checkpoint: OperatorCheckpoint): Promise<OperatorDecision> {
    if (!this.interactive || this.signal?.aborted) {
      return OperatorDecision.ABORT;
    }

    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const question = formatCheckpointQuestion(checkpoint);
      const answer = this.signal
        ? await rl.question(question, { signal: this.signal })
        : await rl.question(question);
      const trimmed = answer.trim().toLowerCase();
      return trimmed === 'y' || trimmed === 'yes'
        ? OperatorDecision.CONTINUE
        : OperatorDecision.ABORT;
    } catch (error) {
      if (this.signal?.aborted) {
        return OperatorDecision.ABORT;
      }
      throw error;
    } finally {
      rl.close();
    }
  }
}
