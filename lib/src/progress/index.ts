/**
 * Progress Reporting Module
 */

export {
  type RunStatistics,
  createEmptyStatistics,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  createProgressBar,
} from './types.js';

export { RunReporter, type RunReporterOptions, createRunReporter } from './reporter.js';
