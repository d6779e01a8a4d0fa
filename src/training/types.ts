/**
 * Training data types and artifact formats
 */

import { z } from "zod";

import { TrainingLabelSchema } from "../labels/types.js";
import { DecisionFeaturesSchema, OutcomeSchema } from "../outcomes/types.js";

export const TrainingSampleSchema = z.object({
  decisionKey: z.string(),
  features: DecisionFeaturesSchema,
  label: TrainingLabelSchema,
  outcome: OutcomeSchema,
});

export type TrainingSample = z.infer<typeof TrainingSampleSchema>;

/**
 * Samples built from one pass over the log
 */
export interface Dataset {
  /** When the dataset was built */
  timestamp: string;
  /** Ordered by originating decision timestamp */
  samples: TrainingSample[];
}

export const DATASET_FORMAT = "training-dataset";
export const MODEL_FORMAT = "learned-priors";
export const ARTIFACT_VERSION = 1;

/**
 * Dataset file contents
 */
export const DatasetArtifactSchema = z.object({
  format: z.literal(DATASET_FORMAT),
  version: z.literal(ARTIFACT_VERSION),
  timestamp: z.string(),
  numSamples: z.number().int().nonnegative(),
  samples: z.array(TrainingSampleSchema),
});

/**
 * Model file contents
 */
export const ModelArtifactSchema = z.object({
  format: z.literal(MODEL_FORMAT),
  version: z.literal(ARTIFACT_VERSION),
  timestamp: z.string(),
  sampleCount: z.number().int().nonnegative(),
  learnedPriors: z.record(TrainingLabelSchema),
  sampleCounts: z.record(z.number().int().nonnegative()),
  /** Decisions whose samples went into this model */
  decisionKeys: z.array(z.string()),
});

export type DatasetArtifact = z.infer<typeof DatasetArtifactSchema>;
export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;
