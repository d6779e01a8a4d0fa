/**
 * Feedback Controller
 *
 * Drives the loop: decisions and outcomes go to the outcome store, enough
 * new outcomes trigger a training cycle, and each successful cycle replaces
 * the learned-priors table that knowledge scoring reads through
 * {@link FeedbackController.getLearnedPriors}.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";

import { DEFAULT_TRAINING_THRESHOLD, MIN_TRAINING_SAMPLES } from "../lib/config.js";
import { PersistenceError, ValidationError } from "../lib/errors.js";
import { appendJsonLine } from "../lib/jsonl.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";
import { defaultLabel, KNOWLEDGE_TYPES, weightFieldFor } from "../labels/types.js";
import { OutcomeStore } from "../outcomes/store.js";
import { writeArtifact } from "../training/artifacts.js";
import { TrainingSetBuilder } from "../training/dataset.js";
import { buildPriors, computeSituationHash, priorConfidence } from "../training/priors.js";
import { ARTIFACT_VERSION, MODEL_FORMAT, ModelArtifactSchema } from "../training/types.js";
import { EMPTY_PRIORS_TABLE, TrainingHistoryEntrySchema } from "./types.js";

import type { JudgmentConfig } from "../lib/config.js";
import type {
  DuplicateKeyError,
  OutcomeAlreadyRecordedError,
  UnknownKeyError,
} from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { ContextDeriver } from "../labels/generator.js";
import type { KnowledgeType, TrainingLabel } from "../labels/types.js";
import type { KeyGenerator } from "../outcomes/store.js";
import type {
  DecisionInput,
  DecisionRecord,
  FeatureGroup,
  OutcomeInput,
  OutcomeStats,
} from "../outcomes/types.js";
import type { SituationHasher } from "../training/priors.js";
import type { ModelArtifact } from "../training/types.js";
import type {
  DecisionState,
  LearnedPriorsTable,
  PriorPrediction,
  RecordOutcomeResult,
  TrainingCycleResult,
  TrainingHistoryEntry,
} from "./types.js";

const log = logger.child("[feedback]");

export const OUTCOMES_DIR = "outcomes";
export const DATASETS_DIR = "datasets";
export const MODELS_DIR = "models";
export const HISTORY_FILE_NAME = "training_history.jsonl";
export const MODEL_FILE_PREFIX = "learned_priors";

/** Minimum prior confidence before knowledge scores are biased */
export const DEFAULT_BIAS_CONFIDENCE = 0.6;

/**
 * Options for opening a feedback controller
 */
export interface FeedbackControllerOptions {
  /** Root of every file the loop writes */
  dataDir: string;
  /** Outcomes between automatic training cycles; at least MIN_TRAINING_SAMPLES */
  trainingThreshold?: number;
  deriveContext?: ContextDeriver;
  situationHasher?: SituationHasher;
  generateKey?: KeyGenerator;
  now?: () => Date;
  /**
   * Serve neutral priors: every lookup returns the default label with
   * confidence 0 and knowledge scores pass through unchanged. Recording and
   * training still run. Used to measure the loop against a no-learning
   * baseline.
   */
  disabled?: boolean;
}

/**
 * Read the training history, oldest first. Unparseable lines are skipped.
 */
function readTrainingHistory(historyPath: string): Result<TrainingHistoryEntry[], PersistenceError> {
  if (!existsSync(historyPath)) return ok([]);

  const content = tryCatch(() => readFileSync(historyPath, "utf-8"));
  if (!content.success) {
    log.error(`Failed to read ${historyPath}: ${content.error.message}`);
    return err(new PersistenceError(`Failed to read ${historyPath}`, historyPath, content.error));
  }

  const entries: TrainingHistoryEntry[] = [];
  content.data.split("\n").forEach((line, i) => {
    if (line.trim() === "") return;
    const json = tryCatch((): unknown => JSON.parse(line));
    const parsed = json.success ? TrainingHistoryEntrySchema.safeParse(json.data) : null;
    if (parsed?.success === true) {
      entries.push(parsed.data);
    } else {
      log.warn(`Skipping malformed training history line ${i + 1}`);
    }
  });
  return ok(entries);
}

/**
 * Load the model of the newest committed training cycle, or null. A cycle
 * is committed once its history line is written; model files without one
 * are never loaded.
 */
function loadCommittedModel(history: readonly TrainingHistoryEntry[]): LearnedPriorsTable | null {
  for (const entry of [...history].reverse()) {
    const path = entry.modelPath;
    const json = tryCatch((): unknown => JSON.parse(readFileSync(path, "utf-8")));
    if (!json.success) {
      log.warn(`Skipping unreadable model artifact ${path}: ${json.error.message}`);
      continue;
    }
    const parsed = ModelArtifactSchema.safeParse(json.data);
    if (parsed.success) {
      return tableFromArtifact(path, parsed.data);
    }
    log.warn(`Skipping invalid model artifact ${path}`);
  }
  return null;
}

/**
 * Outcomes on decisions with features that no model has been trained on
 */
function countUntrainedOutcomes(records: readonly DecisionRecord[], labeledKeys: ReadonlySet<string>): number {
  let count = 0;
  for (const record of records) {
    if (record.outcome !== null && record.features !== null && !labeledKeys.has(record.decisionKey)) {
      count++;
    }
  }
  return count;
}

function tableFromArtifact(modelPath: string, artifact: ModelArtifact): LearnedPriorsTable {
  return Object.freeze({
    modelPath,
    trainedAt: artifact.timestamp,
    sampleCount: artifact.sampleCount,
    priors: Object.freeze({ ...artifact.learnedPriors }),
    sampleCounts: Object.freeze({ ...artifact.sampleCounts }),
    decisionKeys: Object.freeze([...artifact.decisionKeys]),
  });
}

/**
 * Coordinates recording, training and prior lookup for one data directory
 */
export class FeedbackController {
  readonly dataDir: string;
  readonly trainingThreshold: number;
  readonly disabled: boolean;

  private readonly store: OutcomeStore;
  private readonly builder: TrainingSetBuilder;
  private readonly hasher: SituationHasher;
  private readonly now: () => Date;
  private readonly modelsDir: string;
  private readonly historyPath: string;

  private table: LearnedPriorsTable;
  private labeledKeys: ReadonlySet<string>;
  private pendingSamples: number;

  private constructor(
    options: FeedbackControllerOptions & { trainingThreshold: number },
    store: OutcomeStore,
    table: LearnedPriorsTable,
    pendingSamples: number
  ) {
    this.dataDir = options.dataDir;
    this.trainingThreshold = options.trainingThreshold;
    this.disabled = options.disabled ?? false;
    this.store = store;
    this.hasher = options.situationHasher ?? computeSituationHash;
    this.now = options.now ?? (() => new Date());
    this.modelsDir = join(options.dataDir, MODELS_DIR);
    this.historyPath = join(options.dataDir, HISTORY_FILE_NAME);

    this.builder = new TrainingSetBuilder(store, {
      datasetDir: join(options.dataDir, DATASETS_DIR),
      deriveContext: options.deriveContext,
      now: this.now,
    });

    this.table = table;
    this.labeledKeys = new Set(table.decisionKeys);
    this.pendingSamples = pendingSamples;
  }

  /**
   * Open the loop over a data directory. The learned-priors table comes from
   * the newest training cycle recorded in the history.
   */
  static open(
    options: FeedbackControllerOptions
  ): Result<FeedbackController, ValidationError | PersistenceError> {
    const trainingThreshold = options.trainingThreshold ?? DEFAULT_TRAINING_THRESHOLD;
    if (!Number.isInteger(trainingThreshold) || trainingThreshold < MIN_TRAINING_SAMPLES) {
      return err(
        new ValidationError(`trainingThreshold must be an integer of at least ${MIN_TRAINING_SAMPLES}`, {
          trainingThreshold,
        })
      );
    }

    const store = OutcomeStore.open({
      directory: join(options.dataDir, OUTCOMES_DIR),
      now: options.now,
      generateKey: options.generateKey,
    });
    if (!store.success) return store;

    const history = readTrainingHistory(join(options.dataDir, HISTORY_FILE_NAME));
    if (!history.success) return history;
    const table = loadCommittedModel(history.data) ?? EMPTY_PRIORS_TABLE;
    if (table.modelPath !== null) {
      log.debug(`Loaded ${Object.keys(table.priors).length} learned priors from ${table.modelPath}`);
    }

    const scanned = store.data.scan();
    if (!scanned.success) return scanned;
    const pending = countUntrainedOutcomes(scanned.data.records, new Set(table.decisionKeys));

    return ok(
      new FeedbackController({ ...options, trainingThreshold }, store.data, table, pending)
    );
  }

  /**
   * Outcomes on decisions with features recorded since the last successful
   * training cycle
   */
  get samplesSinceTraining(): number {
    return this.pendingSamples;
  }

  /**
   * Record a decision; store failures come back unchanged
   */
  recordDecision(
    input: DecisionInput
  ): Result<string, DuplicateKeyError | ValidationError | PersistenceError> {
    return this.store.append(input);
  }

  /**
   * Record a decision's outcome. Only outcomes on decisions with features
   * count toward the training threshold. Reaching it runs a training cycle;
   * that cycle failing does not undo the recorded outcome.
   */
  recordOutcome(
    decisionKey: string,
    outcome: OutcomeInput
  ): Result<
    RecordOutcomeResult,
    UnknownKeyError | OutcomeAlreadyRecordedError | ValidationError | PersistenceError
  > {
    const attached = this.store.attachOutcome(decisionKey, outcome);
    if (!attached.success) return attached;

    let training: RecordOutcomeResult["training"] = null;
    if (this.store.lookup(decisionKey)?.hasFeatures !== true) {
      return ok({ decisionKey, samplesSinceTraining: this.pendingSamples, training });
    }

    this.pendingSamples++;
    if (this.pendingSamples >= this.trainingThreshold) {
      log.info(`${this.pendingSamples} new outcomes, starting training cycle`);
      training = this.runTrainingCycle();
      if (!training.success) {
        log.error(`Automatic training cycle failed: ${training.error.message}`);
      }
    }

    return ok({ decisionKey, samplesSinceTraining: this.pendingSamples, training });
  }

  /**
   * Build a dataset from the full log, average labels per situation, and
   * persist dataset, model and history entry. The in-memory table changes
   * only once all three are written. Running it twice over the same log
   * produces the same priors.
   */
  runTrainingCycle(): Result<TrainingCycleResult, PersistenceError> {
    const built = this.builder.build();
    if (!built.success) return built;
    const dataset = built.data;
    const sampleCount = dataset.samples.length;

    if (sampleCount < MIN_TRAINING_SAMPLES) {
      log.info(`Insufficient training data (${sampleCount} samples, need >= ${MIN_TRAINING_SAMPLES})`);
      return ok({
        status: "insufficient_data",
        sampleCount,
        datasetPath: null,
        modelPath: null,
        learnedPriorsCount: Object.keys(this.table.priors).length,
      });
    }

    const datasetPath = this.builder.save(dataset);
    if (!datasetPath.success) return datasetPath;

    const { priors, sampleCounts } = buildPriors(dataset.samples, this.hasher);
    const trainedAt = this.now();
    const artifact: ModelArtifact = {
      format: MODEL_FORMAT,
      version: ARTIFACT_VERSION,
      timestamp: trainedAt.toISOString(),
      sampleCount,
      learnedPriors: priors,
      sampleCounts,
      decisionKeys: dataset.samples.map((sample) => sample.decisionKey),
    };
    const modelPath = writeArtifact(this.modelsDir, MODEL_FILE_PREFIX, trainedAt, artifact);
    if (!modelPath.success) return modelPath;

    const learnedPriorsCount = Object.keys(priors).length;
    const historyEntry: TrainingHistoryEntry = {
      timestamp: artifact.timestamp,
      sampleCount,
      datasetPath: datasetPath.data,
      modelPath: modelPath.data,
      learnedPriorsCount,
    };
    const logged = appendJsonLine(this.historyPath, historyEntry);
    if (!logged.success) return logged;

    this.table = tableFromArtifact(modelPath.data, artifact);
    this.labeledKeys = new Set(this.table.decisionKeys);
    this.pendingSamples = 0;

    log.success(`Trained on ${sampleCount} samples: ${learnedPriorsCount} learned priors`);
    return ok({
      status: "success",
      sampleCount,
      datasetPath: datasetPath.data,
      modelPath: modelPath.data,
      learnedPriorsCount,
    });
  }

  /**
   * Learned label for a situation bucket, or the default label. Never fails.
   */
  getLearnedPriors(situationHash: string): TrainingLabel {
    if (this.disabled) return defaultLabel();
    const label = Object.hasOwn(this.table.priors, situationHash)
      ? this.table.priors[situationHash]
      : undefined;
    return label === undefined ? defaultLabel() : { ...label };
  }

  /**
   * The current learned-priors table
   */
  getPriorsTable(): LearnedPriorsTable {
    return this.table;
  }

  /**
   * Learned label for a situation's features, with a confidence that grows
   * with the samples behind it
   */
  predictPrior(situation: FeatureGroup): PriorPrediction {
    const situationHash = this.hasher(situation);
    if (this.disabled) {
      return { situationHash, label: defaultLabel(), confidence: 0 };
    }
    const sampleCount = Object.hasOwn(this.table.sampleCounts, situationHash)
      ? this.table.sampleCounts[situationHash] ?? 0
      : 0;
    return {
      situationHash,
      label: this.getLearnedPriors(situationHash),
      confidence: priorConfidence(sampleCount),
    };
  }

  /**
   * Scale knowledge scores by the learned weight of their type. Scores come
   * back unchanged when the prior's confidence is below `minConfidence`.
   */
  applyKnowledgeBias(
    scores: Partial<Record<KnowledgeType, number>>,
    situation: FeatureGroup,
    minConfidence = DEFAULT_BIAS_CONFIDENCE
  ): Partial<Record<KnowledgeType, number>> {
    if (this.disabled) return { ...scores };
    const prediction = this.predictPrior(situation);
    const adjusted: Partial<Record<KnowledgeType, number>> = {};

    for (const type of KNOWLEDGE_TYPES) {
      const score = scores[type];
      if (score === undefined) continue;
      adjusted[type] =
        prediction.confidence >= minConfidence
          ? score * prediction.label[weightFieldFor(type)]
          : score;
    }
    return adjusted;
  }

  /**
   * Where a decision is in the loop, or null for an unknown key
   */
  getDecisionState(decisionKey: string): DecisionState | null {
    const entry = this.store.lookup(decisionKey);
    if (entry === null) return null;
    if (!entry.hasOutcome) return "recorded";
    return this.labeledKeys.has(decisionKey) ? "labeled" : "outcome_known";
  }

  /**
   * Outcome store statistics
   */
  stats(): Result<OutcomeStats, PersistenceError> {
    return this.store.stats();
  }

  /**
   * Past training cycles, oldest first. Unparseable lines are skipped.
   */
  trainingHistory(): Result<TrainingHistoryEntry[], PersistenceError> {
    return readTrainingHistory(this.historyPath);
  }
}

/**
 * Open a feedback controller from loaded configuration
 */
export function createFeedbackController(
  config: JudgmentConfig,
  overrides: Omit<FeedbackControllerOptions, "dataDir" | "trainingThreshold"> = {}
): Result<FeedbackController, ValidationError | PersistenceError> {
  return FeedbackController.open({
    disabled: config.disabled,
    ...overrides,
    dataDir: config.dataDir,
    trainingThreshold: config.trainingThreshold,
  });
}
