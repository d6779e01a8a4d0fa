/**
 * Feedback loop types
 */

import { z } from "zod";

import type { TrainingLabel } from "../labels/types.js";
import type { PersistenceError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";

/**
 * Where a single decision is in the loop
 *
 * recorded → outcome_known → labeled
 */
export type DecisionState = "recorded" | "outcome_known" | "labeled";

/**
 * Learned priors as of one training cycle. Replaced wholesale by the next
 * successful cycle, never modified in place.
 */
export interface LearnedPriorsTable {
  /** Model artifact the table was loaded from or written to; null before any training */
  readonly modelPath: string | null;
  readonly trainedAt: string | null;
  readonly sampleCount: number;
  /** situationHash → averaged label */
  readonly priors: Readonly<Record<string, TrainingLabel>>;
  /** situationHash → samples behind the average */
  readonly sampleCounts: Readonly<Record<string, number>>;
  readonly decisionKeys: readonly string[];
}

export const EMPTY_PRIORS_TABLE: LearnedPriorsTable = Object.freeze({
  modelPath: null,
  trainedAt: null,
  sampleCount: 0,
  priors: Object.freeze({}),
  sampleCounts: Object.freeze({}),
  decisionKeys: Object.freeze([]),
});

/** Training cycle status */
export type TrainingStatus = "success" | "insufficient_data";

/**
 * What a training cycle did
 */
export interface TrainingCycleResult {
  status: TrainingStatus;
  /** Samples in the dataset the cycle built */
  sampleCount: number;
  /** Null unless status is success */
  datasetPath: string | null;
  /** Null unless status is success */
  modelPath: string | null;
  /** Situations in the table after the cycle */
  learnedPriorsCount: number;
}

/**
 * Result of recording an outcome
 */
export interface RecordOutcomeResult {
  decisionKey: string;
  /** Outcomes recorded since the last successful training cycle */
  samplesSinceTraining: number;
  /** The training cycle this outcome triggered, if any */
  training: Result<TrainingCycleResult, PersistenceError> | null;
}

/**
 * Prior prediction for a situation
 */
export interface PriorPrediction {
  situationHash: string;
  label: TrainingLabel;
  /** 0.3 for an unseen situation, up to 0.95 with many samples */
  confidence: number;
}

export const TrainingHistoryEntrySchema = z.object({
  timestamp: z.string(),
  sampleCount: z.number().int().nonnegative(),
  datasetPath: z.string(),
  modelPath: z.string(),
  learnedPriorsCount: z.number().int().nonnegative(),
});

/** One line of the training history */
export type TrainingHistoryEntry = z.infer<typeof TrainingHistoryEntrySchema>;
