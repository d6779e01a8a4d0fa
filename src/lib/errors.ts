/**
 * Base error class for all judgment-loop errors
 */
export class JudgmentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "JudgmentError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends JudgmentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends JudgmentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * A derived decision key collided with one already in the log
 */
export class DuplicateKeyError extends JudgmentError {
  constructor(decisionKey: string) {
    super(`Decision key already exists: ${decisionKey}`, "DUPLICATE_KEY", { decisionKey });
    this.name = "DuplicateKeyError";
  }
}

/**
 * No decision was recorded under the key
 */
export class UnknownKeyError extends JudgmentError {
  constructor(decisionKey: string) {
    super(`Unknown decision key: ${decisionKey}`, "UNKNOWN_KEY", { decisionKey });
    this.name = "UnknownKeyError";
  }
}

/**
 * Outcomes are write-once per decision
 */
export class OutcomeAlreadyRecordedError extends JudgmentError {
  constructor(decisionKey: string, recordedAt?: string) {
    super(
      `Outcome already recorded for decision: ${decisionKey}`,
      "OUTCOME_ALREADY_RECORDED",
      { decisionKey, recordedAt }
    );
    this.name = "OutcomeAlreadyRecordedError";
  }
}

/**
 * A write to disk failed. The operation that raised it did not complete.
 */
export class PersistenceError extends JudgmentError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, "PERSISTENCE_FAILURE", {
      path,
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
    this.name = "PersistenceError";
  }
}
