/**
 * Feedback loop: records decisions and outcomes, trains situation priors
 */

// Types
export type {
  DecisionState,
  LearnedPriorsTable,
  TrainingStatus,
  TrainingCycleResult,
  RecordOutcomeResult,
  PriorPrediction,
  TrainingHistoryEntry,
} from "./types.js";

export { EMPTY_PRIORS_TABLE, TrainingHistoryEntrySchema } from "./types.js";

// Controller
export {
  FeedbackController,
  createFeedbackController,
  OUTCOMES_DIR,
  DATASETS_DIR,
  MODELS_DIR,
  HISTORY_FILE_NAME,
  MODEL_FILE_PREFIX,
  DEFAULT_BIAS_CONFIDENCE,
} from "./controller.js";
export type { FeedbackControllerOptions } from "./controller.js";
