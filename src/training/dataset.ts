/**
 * Training Set Builder
 *
 * Pairs every decision that has both features and an outcome with a label
 * derived from that outcome. The same log always yields the same samples in
 * the same order.
 */

import { adjustLabel, deriveLabelContext } from "../labels/generator.js";
import { DEFAULT_LABEL } from "../labels/types.js";
import { PersistenceError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";
import { ARTIFACT_VERSION, DATASET_FORMAT } from "./types.js";
import { writeArtifact } from "./artifacts.js";

import type { ContextDeriver } from "../labels/generator.js";
import type { TrainingLabel } from "../labels/types.js";
import type { Result } from "../lib/result.js";
import type { DecisionRecord } from "../outcomes/types.js";
import type { Dataset, DatasetArtifact, TrainingSample } from "./types.js";

const log = logger.child("[training]");

export const DATASET_FILE_PREFIX = "training_dataset";

/**
 * Anything that can replay the decision log. Iteration may throw
 * {@link PersistenceError} when the log cannot be read.
 */
export interface DecisionSource {
  loadAll(): Iterable<DecisionRecord>;
}

/**
 * Options for building training sets
 */
export interface TrainingSetBuilderOptions {
  /** Directory dataset artifacts are saved to */
  datasetDir: string;
  /** Context derivation from features; defaults to {@link deriveLabelContext} */
  deriveContext?: ContextDeriver;
  /** Label the outcome rules adjust; defaults to all-1.0 */
  baseLabel?: TrainingLabel;
  now?: () => Date;
}

/**
 * Builds and saves labeled datasets from the decision log
 */
export class TrainingSetBuilder {
  readonly datasetDir: string;

  private readonly source: DecisionSource;
  private readonly deriveContext: ContextDeriver;
  private readonly baseLabel: TrainingLabel;
  private readonly now: () => Date;

  constructor(source: DecisionSource, options: TrainingSetBuilderOptions) {
    this.source = source;
    this.datasetDir = options.datasetDir;
    this.deriveContext = options.deriveContext ?? deriveLabelContext;
    this.baseLabel = { ...(options.baseLabel ?? DEFAULT_LABEL) };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Label every decision that has features and an outcome
   */
  build(): Result<Dataset, PersistenceError> {
    let records: DecisionRecord[];
    try {
      records = [...this.source.loadAll()];
    } catch (error) {
      if (error instanceof PersistenceError) return err(error);
      throw error;
    }

    const labeled: Array<{ time: number; sample: TrainingSample }> = [];
    for (const record of records) {
      const { features, outcome } = record;
      if (features === null || outcome === null) continue;

      const context = this.deriveContext(features, outcome);
      labeled.push({
        time: Date.parse(record.timestamp),
        sample: {
          decisionKey: record.decisionKey,
          features,
          label: adjustLabel(this.baseLabel, outcome, context),
          outcome,
        },
      });
    }

    // Array.prototype.sort is stable: equal timestamps keep log order
    labeled.sort((a, b) => a.time - b.time);
    const samples = labeled.map((entry) => entry.sample);

    log.debug(`Built dataset with ${samples.length} samples`);
    return ok({ timestamp: this.now().toISOString(), samples });
  }

  /**
   * Save a dataset as a new artifact file and return its path
   */
  save(dataset: Dataset): Result<string, PersistenceError> {
    const artifact: DatasetArtifact = {
      format: DATASET_FORMAT,
      version: ARTIFACT_VERSION,
      timestamp: dataset.timestamp,
      numSamples: dataset.samples.length,
      samples: dataset.samples,
    };
    return writeArtifact(this.datasetDir, DATASET_FILE_PREFIX, new Date(dataset.timestamp), artifact);
  }
}
