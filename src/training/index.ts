/**
 * Training: labeled datasets and averaged situation priors
 */

export type { TrainingSample, Dataset, DatasetArtifact, ModelArtifact } from "./types.js";
export {
  TrainingSampleSchema,
  DatasetArtifactSchema,
  ModelArtifactSchema,
  DATASET_FORMAT,
  MODEL_FORMAT,
  ARTIFACT_VERSION,
} from "./types.js";

export { TrainingSetBuilder, DATASET_FILE_PREFIX } from "./dataset.js";
export type { TrainingSetBuilderOptions, DecisionSource } from "./dataset.js";

export {
  computeSituationHash,
  reversibilityClass,
  riskTier,
  averageLabels,
  buildPriors,
  priorConfidence,
  UNKNOWN_SITUATION_CONFIDENCE,
  MAX_PRIOR_CONFIDENCE,
} from "./priors.js";
export type { SituationHasher, ReversibilityClass, RiskTier, PriorsGroups } from "./priors.js";

export { writeArtifact, artifactStamp } from "./artifacts.js";
