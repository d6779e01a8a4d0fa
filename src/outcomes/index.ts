/**
 * Outcome store: decision log, outcome patches and the key index
 */

// Types
export type {
  FeatureGroup,
  DecisionFeatures,
  DecisionInput,
  DecisionRecord,
  OutcomeInput,
  Outcome,
  LogEntry,
  IndexEntry,
  CorruptLogEntry,
  CorruptLogEntryReason,
  LogScan,
  OutcomeStats,
} from "./types.js";

export {
  HIGH_REGRET_THRESHOLD,
  DecisionInputSchema,
  DecisionRecordSchema,
  OutcomeInputSchema,
  OutcomeSchema,
  LogEntrySchema,
} from "./types.js";

// Store
export {
  OutcomeStore,
  openOutcomeStore,
  deriveDecisionKey,
  foldLog,
  buildIndex,
  LOG_FILE_NAME,
  INDEX_FILE_NAME,
} from "./store.js";
export type { OutcomeStoreOptions, KeyGenerator } from "./store.js";
