/**
 * Run Statistics and Formatting Helpers
 */

import type { FailureCause } from '../extraction/index.js';

// =============================================================================
// Run Statistics
// =============================================================================

export interface RunStatistics {
  /** Pending files in the subfolders scanned so far */
  pending: number;
  /** Files sent through the gateway */
  attempted: number;
  succeeded: number;
  failed: number;
  /** Already in the output at run start */
  skipped: number;
  subfoldersCompleted: number;
  failuresByCause: Partial<Record<FailureCause, number>>;
  startTime: Date | null;
  endTime: Date | null;
}

export function createEmptyStatistics(): RunStatistics {
  return {
    pending: 0,
    attempted: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    subfoldersCompleted: 0,
    failuresByCause: {},
    startTime: null,
    endTime: null,
  };
}

// =============================================================================
// Utility Functions
// =============================================================================

export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

/**
 * Estimated time remaining based on the average time per item so far
 */
export function estimateRemainingTime(
  current: number,
  total: number,
  elapsedMs: number
): number | undefined {
  if (current === 0 || current >= total) return undefined;
  const msPerItem = elapsedMs / current;
  return Math.round(msPerItem * (total - current));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);

  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  const remainingMinutes = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Text progress bar, e.g. `[██████░░░░]`
 */
export function createProgressBar(percentage: number, width = 20): string {
  const filled = Math.round((Math.min(100, Math.max(0, percentage)) / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}]`;
}
