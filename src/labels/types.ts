/**
 * Training label types
 *
 * A label holds one trust weight per knowledge type. Weights live in
 * [LABEL_BOUNDS.min, LABEL_BOUNDS.max]; 1.0 means no learned bias.
 */

import { z } from "zod";

/** Knowledge types a label weighs */
export const KNOWLEDGE_TYPES = ["principle", "rule", "warning", "claim", "advice"] as const;

export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

export const LABEL_BOUNDS = {
  min: 0.7,
  max: 1.3,
} as const;

/** Size of a single rule's adjustment */
export const LABEL_STEP = 0.05;

/** Irreversibility above this makes a failure teach caution */
export const IRREVERSIBILITY_THRESHOLD = 0.7;

/** Recovery longer than this many days does not count as a recovery */
export const LONG_RECOVERY_DAYS = 90;

const weight = z.number().min(LABEL_BOUNDS.min).max(LABEL_BOUNDS.max);

export const TrainingLabelSchema = z.object({
  principleWeight: weight,
  ruleWeight: weight,
  warningWeight: weight,
  claimWeight: weight,
  adviceWeight: weight,
});

export type TrainingLabel = z.infer<typeof TrainingLabelSchema>;

export type WeightField = keyof TrainingLabel;

export const WEIGHT_FIELDS: readonly WeightField[] = [
  "principleWeight",
  "ruleWeight",
  "warningWeight",
  "claimWeight",
  "adviceWeight",
];

/**
 * Weight field for a knowledge type
 */
export function weightFieldFor(type: KnowledgeType): WeightField {
  return `${type}Weight`;
}

export const DEFAULT_LABEL: Readonly<TrainingLabel> = Object.freeze({
  principleWeight: 1.0,
  ruleWeight: 1.0,
  warningWeight: 1.0,
  claimWeight: 1.0,
  adviceWeight: 1.0,
});

/**
 * Fresh copy of the default label
 */
export function defaultLabel(): TrainingLabel {
  return { ...DEFAULT_LABEL };
}

/**
 * Signals derived from a decision's features, consumed by the label rules
 */
export interface LabelContext {
  /** 0..1, how hard the decision is to undo */
  irreversibility: number;
  /** Rule-based knowledge drove the decision */
  rulesFailed: boolean;
  /** Advice drove the decision */
  isAdviceDriven: boolean;
  /** The situation was recovered from */
  recoverySucceeded: boolean;
}
