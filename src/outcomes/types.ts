/**
 * Decision and outcome records
 *
 * Schemas for everything the outcome store accepts and persists. `analysis`,
 * `guidance` and `action` are opaque: they are validated as JSON objects and
 * passed through unchanged.
 */

import { z } from "zod";

/** `regretScore` above this counts as high regret */
export const HIGH_REGRET_THRESHOLD = 0.5;

/** Opaque structured value supplied by an external collaborator */
export const OpaqueBlobSchema = z.record(z.unknown());

/** name → numeric feature value */
export const FeatureGroupSchema = z.record(z.number().finite());

export const DecisionFeaturesSchema = z.object({
  situation: FeatureGroupSchema.default({}),
  constraint: FeatureGroupSchema.default({}),
  knowledge: FeatureGroupSchema.default({}),
});

/**
 * Outcome as supplied by the caller
 */
export const OutcomeInputSchema = z.object({
  success: z.boolean(),
  regretScore: z.number().min(0).max(1),
  recoveryTimeDays: z.number().int().nonnegative(),
  secondaryDamage: z.boolean(),
  notes: z.string().default(""),
});

/**
 * Outcome as stored, stamped with the time it was attached
 */
export const OutcomeSchema = OutcomeInputSchema.extend({
  recordedAt: z.string().datetime({ offset: true }),
});

/**
 * Decision as supplied by the caller
 */
export const DecisionInputSchema = z.object({
  decisionId: z.string().min(1),
  userInput: z.string(),
  analysis: OpaqueBlobSchema.default({}),
  guidance: OpaqueBlobSchema.default({}),
  features: DecisionFeaturesSchema.nullable().default(null),
  action: OpaqueBlobSchema.nullable().default(null),
});

/**
 * Full decision record, as reconstructed from the log
 */
export const DecisionRecordSchema = DecisionInputSchema.extend({
  decisionKey: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  outcome: OutcomeSchema.nullable(),
});

export type FeatureGroup = z.infer<typeof FeatureGroupSchema>;
export type DecisionFeatures = z.infer<typeof DecisionFeaturesSchema>;
export type OutcomeInput = z.input<typeof OutcomeInputSchema>;
export type Outcome = z.infer<typeof OutcomeSchema>;
export type DecisionInput = z.input<typeof DecisionInputSchema>;
export type DecisionRecord = z.infer<typeof DecisionRecordSchema>;

// ---------------------------------------------------------------------------
// Log and index formats
// ---------------------------------------------------------------------------

export const DecisionEntrySchema = z.object({
  kind: z.literal("decision"),
  decisionKey: z.string().min(1),
  record: DecisionRecordSchema.omit({ decisionKey: true, outcome: true }),
});

export const OutcomePatchEntrySchema = z.object({
  kind: z.literal("outcome-patch"),
  decisionKey: z.string().min(1),
  outcome: OutcomeSchema,
});

/** One line of the append log */
export const LogEntrySchema = z.discriminatedUnion("kind", [
  DecisionEntrySchema,
  OutcomePatchEntrySchema,
]);

export type DecisionEntry = z.infer<typeof DecisionEntrySchema>;
export type OutcomePatchEntry = z.infer<typeof OutcomePatchEntrySchema>;
export type LogEntry = z.infer<typeof LogEntrySchema>;

export const IndexEntrySchema = z.object({
  decisionId: z.string(),
  recordedAt: z.string(),
  hasOutcome: z.boolean(),
  /** The decision carries features, so its outcome can become a training sample */
  hasFeatures: z.boolean(),
  outcomeRecordedAt: z.string().optional(),
});

export const DecisionIndexSchema = z.object({
  version: z.literal(1),
  entries: z.record(IndexEntrySchema),
});

export type IndexEntry = z.infer<typeof IndexEntrySchema>;
export type DecisionIndex = z.infer<typeof DecisionIndexSchema>;

// ---------------------------------------------------------------------------
// Scan results
// ---------------------------------------------------------------------------

/** Why a log line was skipped during a scan */
export type CorruptLogEntryReason =
  | "malformed"
  | "truncated"
  | "duplicate-decision"
  | "orphan-patch"
  | "duplicate-outcome";

/** A log line that could not be folded into the reconstruction */
export interface CorruptLogEntry {
  /** 1-based line number in the log */
  line: number;
  reason: CorruptLogEntryReason;
  detail: string;
}

/** Result of folding the log */
export interface LogScan {
  /** Records in decision-append order */
  records: DecisionRecord[];
  corrupt: CorruptLogEntry[];
}

/**
 * Store statistics
 */
export interface OutcomeStats {
  totalDecisions: number;
  withOutcome: number;
  /** successes / withOutcome, 0 when no outcome has been recorded */
  successRate: number;
  /** outcomes with regretScore > HIGH_REGRET_THRESHOLD */
  highRegretCount: number;
  secondaryDamageCount: number;
}
