/**
 * Batch Orchestration Module
 */

export {
  RunPhase,
  RunOutcome,
  type Subfolder,
  DEFAULT_SUBFOLDER_PREFIX,
  OperatorDecision,
  type OperatorCheckpoint,
  type OperatorGate,
  type SubfolderSummary,
  type FatalStage,
  type FatalCondition,
  type RunSummary,
  createSubfolderSummary,
  sumSubfolders,
  type RunStartInfo,
  type FilePosition,
  type BatchRunEvents,
  type PaperProcessor,
  type CursorResettable,
  RunOptionsSchema,
  type RunOptions,
  type BatchOrchestratorOptions,
} from './types.js';

export {
  DiscoveryError,
  isDiscoveryError,
  compareCodePoints,
  listSubfolders,
  listPaperFiles,
} from './discovery.js';

export {
  AutoContinueGate,
  ConsoleOperatorGate,
  type ConsoleOperatorGateOptions,
  formatCheckpointQuestion,
} from './operator.js';

export { BatchOrchestrator } from './orchestrator.js';
