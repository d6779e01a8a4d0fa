/**
 * Outcome → training label heuristics
 */

export type { TrainingLabel, WeightField, KnowledgeType, LabelContext } from "./types.js";

export {
  TrainingLabelSchema,
  KNOWLEDGE_TYPES,
  WEIGHT_FIELDS,
  LABEL_BOUNDS,
  LABEL_STEP,
  IRREVERSIBILITY_THRESHOLD,
  LONG_RECOVERY_DAYS,
  DEFAULT_LABEL,
  defaultLabel,
  weightFieldFor,
} from "./types.js";

export { adjustLabel, clampWeight, clampLabel, deriveLabelContext } from "./generator.js";
export type { ContextDeriver } from "./generator.js";
