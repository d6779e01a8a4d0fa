/**
 * Learned priors
 *
 * Groups training samples into coarse situation buckets and averages their
 * labels. Averaging happens on the raw labels and the mean is clamped once,
 * so the bounds never bias a bucket's average.
 */

import { clampLabel } from "../labels/generator.js";
import { WEIGHT_FIELDS, defaultLabel } from "../labels/types.js";

import type { FeatureGroup } from "../outcomes/types.js";
import type { TrainingLabel } from "../labels/types.js";
import type { TrainingSample } from "./types.js";

/** Maps situation features to a bucket key */
export type SituationHasher = (situation: FeatureGroup) => string;

export type ReversibilityClass = "irreversible" | "recoverable" | "reversible";
export type RiskTier = "high" | "medium" | "low";

/** Confidence reported for a situation with no learned prior */
export const UNKNOWN_SITUATION_CONFIDENCE = 0.3;

/** Upper bound on prior confidence, however many samples back it */
export const MAX_PRIOR_CONFIDENCE = 0.95;

/**
 * Reversibility class from `situation.irreversibility`
 */
export function reversibilityClass(irreversibility: number): ReversibilityClass {
  if (irreversibility > 0.7) return "irreversible";
  if (irreversibility > 0.3) return "recoverable";
  return "reversible";
}

/**
 * Risk tier from `situation.risk`
 */
export function riskTier(risk: number): RiskTier {
  if (risk > 0.66) return "high";
  if (risk > 0.33) return "medium";
  return "low";
}

/**
 * Default situation bucket: `<reversibility class>_<risk tier>`
 */
export const computeSituationHash: SituationHasher = (situation) =>
  `${reversibilityClass(situation["irreversibility"] ?? 0)}_${riskTier(situation["risk"] ?? 0)}`;

/**
 * Arithmetic mean per weight, clamped after averaging. An empty list
 * averages to the default label.
 */
export function averageLabels(labels: readonly TrainingLabel[]): TrainingLabel {
  if (labels.length === 0) return defaultLabel();

  const sum = defaultLabel();
  for (const field of WEIGHT_FIELDS) {
    sum[field] = 0;
  }
  for (const label of labels) {
    for (const field of WEIGHT_FIELDS) {
      sum[field] += label[field];
    }
  }
  for (const field of WEIGHT_FIELDS) {
    sum[field] /= labels.length;
  }
  return clampLabel(sum);
}

/**
 * Averaged labels and sample counts per situation bucket
 */
export interface PriorsGroups {
  priors: Record<string, TrainingLabel>;
  sampleCounts: Record<string, number>;
}

/**
 * Group samples by situation and average each group
 */
export function buildPriors(
  samples: readonly TrainingSample[],
  hasher: SituationHasher = computeSituationHash
): PriorsGroups {
  const grouped = new Map<string, TrainingLabel[]>();
  for (const sample of samples) {
    const hash = hasher(sample.features.situation);
    const labels = grouped.get(hash) ?? [];
    labels.push(sample.label);
    grouped.set(hash, labels);
  }

  const priors: Record<string, TrainingLabel> = {};
  const sampleCounts: Record<string, number> = {};
  for (const [hash, labels] of grouped) {
    priors[hash] = averageLabels(labels);
    sampleCounts[hash] = labels.length;
  }
  return { priors, sampleCounts };
}

/**
 * Confidence in a prior backed by `sampleCount` samples:
 * min(0.95, 0.5 + 0.1·ln(1 + n)), or 0.3 with no samples.
 */
export function priorConfidence(sampleCount: number): number {
  if (sampleCount <= 0) return UNKNOWN_SITUATION_CONFIDENCE;
  return Math.min(MAX_PRIOR_CONFIDENCE, 0.5 + 0.1 * Math.log(1 + sampleCount));
}
