/**
 * judgment-loop - decision outcome feedback loop for knowledge-type priors
 *
 * @packageDocumentation
 */

export const VERSION = "0.1.0";

// Outcome store
export {
  OutcomeStore,
  openOutcomeStore,
  deriveDecisionKey,
  foldLog,
  HIGH_REGRET_THRESHOLD,
  DecisionInputSchema,
  DecisionRecordSchema,
  OutcomeInputSchema,
  OutcomeSchema,
} from "./outcomes/index.js";
export type {
  DecisionInput,
  DecisionRecord,
  DecisionFeatures,
  FeatureGroup,
  OutcomeInput,
  Outcome,
  CorruptLogEntry,
  LogScan,
  OutcomeStats,
  OutcomeStoreOptions,
  KeyGenerator,
} from "./outcomes/index.js";

// Labels
export {
  adjustLabel,
  clampWeight,
  clampLabel,
  deriveLabelContext,
  defaultLabel,
  DEFAULT_LABEL,
  LABEL_BOUNDS,
  LABEL_STEP,
  KNOWLEDGE_TYPES,
  WEIGHT_FIELDS,
} from "./labels/index.js";
export type {
  TrainingLabel,
  LabelContext,
  ContextDeriver,
  KnowledgeType,
  WeightField,
} from "./labels/index.js";

// Training
export {
  TrainingSetBuilder,
  computeSituationHash,
  averageLabels,
  buildPriors,
  priorConfidence,
} from "./training/index.js";
export type {
  TrainingSample,
  Dataset,
  SituationHasher,
  TrainingSetBuilderOptions,
} from "./training/index.js";

// Feedback loop
export { FeedbackController, createFeedbackController, EMPTY_PRIORS_TABLE } from "./feedback/index.js";
export type {
  FeedbackControllerOptions,
  DecisionState,
  LearnedPriorsTable,
  TrainingCycleResult,
  RecordOutcomeResult,
  PriorPrediction,
  TrainingHistoryEntry,
} from "./feedback/index.js";

// Library utilities
export {
  // Errors
  JudgmentError,
  ValidationError,
  ConfigError,
  DuplicateKeyError,
  UnknownKeyError,
  OutcomeAlreadyRecordedError,
  PersistenceError,
  // Result
  ok,
  err,
  unwrap,
  unwrapOr,
  // Logger
  logger,
  // Config
  loadConfig,
  MIN_TRAINING_SAMPLES,
} from "./lib/index.js";
export type { Result, LogLevel, JudgmentConfig } from "./lib/index.js";
