/**
 * Label Generator
 *
 * Turns an observed outcome into a training label: which kinds of knowledge
 * should have counted for more, or less, in a decision like this one.
 *
 * Rules (δ = LABEL_STEP), each applied independently:
 *   failure + irreversibility > 0.7  → warning +δ, principle +δ
 *   failure + rules drove it         → rule −δ
 *   regret > 0.5 + advice drove it   → advice −δ
 *   success + recovery succeeded     → principle +δ
 *
 * Every weight is clamped to LABEL_BOUNDS afterwards. Everything here is pure.
 */

import { HIGH_REGRET_THRESHOLD } from "../outcomes/types.js";
import {
  IRREVERSIBILITY_THRESHOLD,
  LABEL_BOUNDS,
  LABEL_STEP,
  LONG_RECOVERY_DAYS,
  WEIGHT_FIELDS,
} from "./types.js";

import type { DecisionFeatures, Outcome, OutcomeInput } from "../outcomes/types.js";
import type { LabelContext, TrainingLabel } from "./types.js";

/** Derives label context from a decision's features and its outcome */
export type ContextDeriver = (features: DecisionFeatures, outcome: Outcome) => LabelContext;

/**
 * Clamp a single weight into LABEL_BOUNDS. NaN maps to the neutral 1.0.
 */
export function clampWeight(value: number): number {
  if (Number.isNaN(value)) return 1.0;
  return Math.min(LABEL_BOUNDS.max, Math.max(LABEL_BOUNDS.min, value));
}

/**
 * Clamp every weight of a label
 */
export function clampLabel(label: TrainingLabel): TrainingLabel {
  const clamped = { ...label };
  for (const field of WEIGHT_FIELDS) {
    clamped[field] = clampWeight(label[field]);
  }
  return clamped;
}

/**
 * Apply the outcome rules to a base label
 */
export function adjustLabel(
  baseLabel: TrainingLabel,
  outcome: Pick<OutcomeInput, "success" | "regretScore">,
  context: LabelContext
): TrainingLabel {
  const label = { ...baseLabel };

  if (!outcome.success && context.irreversibility > IRREVERSIBILITY_THRESHOLD) {
    label.warningWeight += LABEL_STEP;
    label.principleWeight += LABEL_STEP;
  }

  if (!outcome.success && context.rulesFailed) {
    label.ruleWeight -= LABEL_STEP;
  }

  if (outcome.regretScore > HIGH_REGRET_THRESHOLD && context.isAdviceDriven) {
    label.adviceWeight -= LABEL_STEP;
  }

  if (outcome.success && context.recoverySucceeded) {
    label.principleWeight += LABEL_STEP;
  }

  return clampLabel(label);
}

/**
 * Default context derivation. Reads:
 *   constraint.irreversibility, falling back to situation.irreversibility
 *   knowledge.usedRule, knowledge.usedAdvice (> 0.5 counts as used)
 * Recovery succeeded when there was no secondary damage and it took at most
 * LONG_RECOVERY_DAYS.
 */
export const deriveLabelContext: ContextDeriver = (features, outcome) => ({
  irreversibility:
    features.constraint["irreversibility"] ?? features.situation["irreversibility"] ?? 0,
  rulesFailed: (features.knowledge["usedRule"] ?? 0) > 0.5,
  isAdviceDriven: (features.knowledge["usedAdvice"] ?? 0) > 0.5,
  recoverySucceeded: !outcome.secondaryDamage && outcome.recoveryTimeDays <= LONG_RECOVERY_DAYS,
});
