// Error classes
export {
  JudgmentError,
  ValidationError,
  ConfigError,
  DuplicateKeyError,
  UnknownKeyError,
  OutcomeAlreadyRecordedError,
  PersistenceError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  tryCatch,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, LOG_LEVEL_NAMES } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";

// Configuration
export {
  ConfigSchema,
  loadConfig,
  getConfigPath,
  DEFAULT_DATA_DIR,
  DEFAULT_TRAINING_THRESHOLD,
  MIN_TRAINING_SAMPLES,
} from "./config.js";
export type { JudgmentConfig } from "./config.js";
