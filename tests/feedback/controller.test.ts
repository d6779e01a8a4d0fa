import { describe, it, expect, beforeEach, afterEach, beforeAll } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";

import {
  EMPTY_PRIORS_TABLE,
  FeedbackController,
  createFeedbackController,
  HISTORY_FILE_NAME,
  MODELS_DIR,
} from "@/feedback/index.js";
import { logger } from "@/lib/logger.js";
import { defaultLabel } from "@/labels/index.js";
import { unwrap } from "@/lib/result.js";
import {
  createTestDecision,
  createTestOutcome,
  createTestClock,
  createSequentialKeys,
  createTempDir,
} from "@tests/fixtures/decisions.js";

import type { FeedbackControllerOptions } from "@/feedback/index.js";
import type { OutcomeInput } from "@/outcomes/index.js";

describe("FeedbackController", () => {
  let dir: string;
  let cleanup: () => void;

  beforeAll(() => {
    logger.configure({ level: "silent" });
  });

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  function open(options: Partial<FeedbackControllerOptions> = {}): FeedbackController {
    const result = FeedbackController.open({
      dataDir: dir,
      now: createTestClock(),
      generateKey: createSequentialKeys(),
      ...options,
    });
    if (!result.success) throw result.error;
    return result.data;
  }

  function decide(controller: FeedbackController, decisionId: string): string {
    const result = controller.recordDecision(createTestDecision({ decisionId }));
    if (!result.success) throw result.error;
    return result.data;
  }

  /** Record `count` decisions, each with an outcome */
  function recordMany(
    controller: FeedbackController,
    count: number,
    outcome: Partial<OutcomeInput> = {}
  ): string[] {
    const keys: string[] = [];
    for (let i = 0; i < count; i++) {
      const key = decide(controller, `d${i}`);
      const recorded = controller.recordOutcome(key, createTestOutcome(outcome));
      if (!recorded.success) throw recorded.error;
      keys.push(key);
    }
    return keys;
  }

  describe("open", () => {
    it("defaults the training threshold to 10", () => {
      expect(open().trainingThreshold).toBe(10);
    });

    it.each([4, 0, -1, 5.5])("rejects a training threshold of %s", (threshold) => {
      const result = FeedbackController.open({ dataDir: dir, trainingThreshold: threshold });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("VALIDATION_ERROR");
      }
    });

    it("starts with an empty priors table", () => {
      const controller = open();

      expect(controller.getPriorsTable()).toBe(EMPTY_PRIORS_TABLE);
      expect(controller.samplesSinceTraining).toBe(0);
    });

    it("opens from loaded configuration", () => {
      const result = createFeedbackController({
        dataDir: dir,
        trainingThreshold: 7,
        logLevel: "silent",
        disabled: true,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.trainingThreshold).toBe(7);
        expect(result.data.dataDir).toBe(dir);
        expect(result.data.disabled).toBe(true);
      }
    });

    it("fails when the training history cannot be read", () => {
      mkdirSync(join(dir, HISTORY_FILE_NAME));

      const result = FeedbackController.open({ dataDir: dir });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("PERSISTENCE_FAILURE");
        expect(result.error.context).toMatchObject({ path: join(dir, HISTORY_FILE_NAME) });
      }
    });
  });

  describe("recordOutcome", () => {
    it("counts outcomes since training without training below the threshold", () => {
      const controller = open();
      const key = decide(controller, "solo");

      const result = controller.recordOutcome(key, createTestOutcome());

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ decisionKey: key, samplesSinceTraining: 1, training: null });
      }
    });

    it("passes store errors through unchanged", () => {
      const controller = open();

      const result = controller.recordOutcome("dec_missing_0000", createTestOutcome());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("UNKNOWN_KEY");
      }
      expect(controller.samplesSinceTraining).toBe(0);
    });

    it("does not count a rejected second outcome", () => {
      const controller = open();
      const key = decide(controller, "once");
      controller.recordOutcome(key, createTestOutcome());

      const second = controller.recordOutcome(key, createTestOutcome({ success: false }));

      expect(second.success).toBe(false);
      expect(controller.samplesSinceTraining).toBe(1);
    });

    it("does not count outcomes on decisions without features", () => {
      const controller = open({ trainingThreshold: 5 });
      recordMany(controller, 4);
      const bare = controller.recordDecision(createTestDecision({ decisionId: "bare", features: null }));
      if (!bare.success) throw bare.error;

      const result = controller.recordOutcome(bare.data, createTestOutcome());

      expect(result).toEqual({
        success: true,
        data: { decisionKey: bare.data, samplesSinceTraining: 4, training: null },
      });
      expect(controller.getDecisionState(bare.data)).toBe("outcome_known");

      const fifth = controller.recordOutcome(decide(controller, "fifth"), createTestOutcome());
      expect(fifth.success).toBe(true);
      if (!fifth.success) return;
      expect(fifth.data.samplesSinceTraining).toBe(0);
      expect(fifth.data.training?.success && fifth.data.training.data).toMatchObject({
        status: "success",
        sampleCount: 5,
      });
    });

    it("triggers a training cycle when the threshold is reached", () => {
      const controller = open({ trainingThreshold: 5 });
      recordMany(controller, 4);
      expect(controller.samplesSinceTraining).toBe(4);

      const key = decide(controller, "fifth");
      const result = controller.recordOutcome(key, createTestOutcome());

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.samplesSinceTraining).toBe(0);
      const training = result.data.training;
      expect(training?.success).toBe(true);
      if (training?.success === true) {
        expect(training.data.status).toBe("success");
        expect(training.data.sampleCount).toBe(5);
        expect(training.data.learnedPriorsCount).toBe(1);
      }
    });

    it("keeps the outcome when the triggered cycle fails", () => {
      const controller = open({ trainingThreshold: 5 });
      mkdirSync(join(dir, HISTORY_FILE_NAME));
      recordMany(controller, 4);

      const key = decide(controller, "fifth");
      const result = controller.recordOutcome(key, createTestOutcome());

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.training?.success).toBe(false);
      expect(result.data.samplesSinceTraining).toBe(5);
      expect(controller.getDecisionState(key)).toBe("outcome_known");
    });
  });

  describe("runTrainingCycle", () => {
    it("reports insufficient data below five samples and leaves priors unchanged", () => {
      const controller = open();
      recordMany(controller, 4);

      const result = controller.runTrainingCycle();

      expect(result).toEqual({
        success: true,
        data: {
          status: "insufficient_data",
          sampleCount: 4,
          datasetPath: null,
          modelPath: null,
          learnedPriorsCount: 0,
        },
      });
      expect(controller.getPriorsTable()).toBe(EMPTY_PRIORS_TABLE);
      expect(existsSync(join(dir, MODELS_DIR))).toBe(false);
      expect(controller.samplesSinceTraining).toBe(4);
    });

    it("ignores decisions without outcomes when counting samples", () => {
      const controller = open();
      recordMany(controller, 4);
      decide(controller, "pending");

      const result = controller.runTrainingCycle();

      expect(result.success && result.data.status).toBe("insufficient_data");
    });

    it("learns a higher principle weight from clean successes", () => {
      const controller = open();
      recordMany(controller, 5);

      const result = controller.runTrainingCycle();

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe("success");
      expect(result.data.sampleCount).toBe(5);
      expect(result.data.learnedPriorsCount).toBe(1);

      const learned = controller.getLearnedPriors("reversible_low");
      expect(learned.principleWeight).toBeGreaterThanOrEqual(1.0);
      expect(learned.principleWeight).toBeCloseTo(1.05);
      expect(learned.ruleWeight).toBe(1.0);
    });

    it("writes dataset, model and history", () => {
      const controller = open();
      recordMany(controller, 5);

      const result = controller.runTrainingCycle();
      if (!result.success) throw result.error;

      expect(result.data.datasetPath).not.toBeNull();
      expect(result.data.modelPath).not.toBeNull();
      expect(readdirSync(join(dir, "datasets"))).toHaveLength(1);
      expect(readdirSync(join(dir, MODELS_DIR))).toHaveLength(1);

      const history = unwrap(controller.trainingHistory());
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        sampleCount: 5,
        datasetPath: result.data.datasetPath,
        modelPath: result.data.modelPath,
        learnedPriorsCount: 1,
      });
    });

    it("produces the same priors when run twice over the same log", () => {
      const controller = open();
      recordMany(controller, 3);
      recordMany(controller, 3, { success: false, regretScore: 0.9 });

      const first = controller.runTrainingCycle();
      const firstPriors = controller.getPriorsTable().priors;
      const second = controller.runTrainingCycle();

      expect(first.success && second.success).toBe(true);
      expect(controller.getPriorsTable().priors).toEqual(firstPriors);
      if (first.success && second.success) {
        expect(second.data.modelPath).not.toBe(first.data.modelPath);
      }
    });

    it("replaces the table only after history is written", () => {
      const controller = open();
      recordMany(controller, 5);
      mkdirSync(join(dir, HISTORY_FILE_NAME));

      const result = controller.runTrainingCycle();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("PERSISTENCE_FAILURE");
      }
      expect(controller.getPriorsTable()).toBe(EMPTY_PRIORS_TABLE);
      expect(controller.getLearnedPriors("reversible_low")).toEqual(defaultLabel());
      expect(controller.samplesSinceTraining).toBe(5);
    });
  });

  describe("getLearnedPriors", () => {
    it("returns the default label for an unknown situation", () => {
      expect(open().getLearnedPriors("irreversible_high")).toEqual(defaultLabel());
    });

    it("does not resolve inherited object keys", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();

      expect(controller.getLearnedPriors("toString")).toEqual(defaultLabel());
    });

    it("returns a copy the caller may modify", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();

      const label = controller.getLearnedPriors("reversible_low");
      label.principleWeight = 99;

      expect(controller.getLearnedPriors("reversible_low").principleWeight).toBeCloseTo(1.05);
    });
  });

  describe("predictPrior", () => {
    it("reports low confidence for an unseen situation", () => {
      const prediction = open().predictPrior({ irreversibility: 0.9, risk: 0.9 });

      expect(prediction).toEqual({
        situationHash: "irreversible_high",
        label: defaultLabel(),
        confidence: 0.3,
      });
    });

    it("reports confidence from the samples behind a learned prior", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();

      const prediction = controller.predictPrior({ irreversibility: 0.2, risk: 0.1 });

      expect(prediction.situationHash).toBe("reversible_low");
      expect(prediction.confidence).toBeCloseTo(0.5 + 0.1 * Math.log(6));
      expect(prediction.label.principleWeight).toBeCloseTo(1.05);
    });
  });

  describe("applyKnowledgeBias", () => {
    it("scales scores by learned weights when confident", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();

      const biased = controller.applyKnowledgeBias(
        { principle: 0.8, rule: 0.5 },
        { irreversibility: 0.2, risk: 0.1 }
      );

      expect(biased.principle).toBeCloseTo(0.84);
      expect(biased.rule).toBe(0.5);
      expect(biased.advice).toBeUndefined();
    });

    it("returns scores unchanged below the confidence floor", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();

      const biased = controller.applyKnowledgeBias(
        { principle: 0.8 },
        { irreversibility: 0.2, risk: 0.1 },
        0.9
      );

      expect(biased).toEqual({ principle: 0.8 });
    });

    it("leaves scores for unseen situations unchanged", () => {
      const biased = open().applyKnowledgeBias({ warning: 0.4 }, { irreversibility: 1, risk: 1 });

      expect(biased).toEqual({ warning: 0.4 });
    });
  });

  describe("disabled", () => {
    function trainedDisabled(): FeedbackController {
      const controller = open({ disabled: true });
      recordMany(controller, 5);
      const trained = controller.runTrainingCycle();
      if (!trained.success) throw trained.error;
      return controller;
    }

    it("still trains but serves the default label", () => {
      const controller = trainedDisabled();

      expect(controller.getPriorsTable().priors["reversible_low"]?.principleWeight).toBeCloseTo(1.05);
      expect(controller.getLearnedPriors("reversible_low")).toEqual(defaultLabel());
    });

    it("predicts the default label with zero confidence", () => {
      const prediction = trainedDisabled().predictPrior({ irreversibility: 0.2, risk: 0.1 });

      expect(prediction).toEqual({
        situationHash: "reversible_low",
        label: defaultLabel(),
        confidence: 0,
      });
    });

    it("returns knowledge scores unchanged", () => {
      const scores = { principle: 0.8, rule: 0.5 };

      const biased = trainedDisabled().applyKnowledgeBias(scores, { irreversibility: 0.2, risk: 0.1 }, 0);

      expect(biased).toEqual({ principle: 0.8, rule: 0.5 });
      expect(biased).not.toBe(scores);
    });
  });

  describe("getDecisionState", () => {
    it("follows a decision from recorded to labeled", () => {
      const controller = open();
      const key = decide(controller, "tracked");
      expect(controller.getDecisionState(key)).toBe("recorded");

      controller.recordOutcome(key, createTestOutcome());
      expect(controller.getDecisionState(key)).toBe("outcome_known");

      recordMany(controller, 4);
      controller.runTrainingCycle();
      expect(controller.getDecisionState(key)).toBe("labeled");
    });

    it("returns null for an unknown key", () => {
      expect(open().getDecisionState("dec_nobody_0000")).toBeNull();
    });
  });

  describe("reopening", () => {
    it("loads the newest model and restores labeled state", () => {
      const controller = open();
      const keys = recordMany(controller, 5);
      const trained = controller.runTrainingCycle();
      if (!trained.success) throw trained.error;

      const reopened = open();

      expect(reopened.getPriorsTable().modelPath).toBe(trained.data.modelPath);
      expect(reopened.getLearnedPriors("reversible_low").principleWeight).toBeCloseTo(1.05);
      expect(reopened.getDecisionState(keys[0] ?? "")).toBe("labeled");
      expect(reopened.samplesSinceTraining).toBe(0);
    });

    it("counts outcomes recorded after the last model as pending", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();
      const key = decide(controller, "late");
      controller.recordOutcome(key, createTestOutcome());

      const reopened = open({ generateKey: createSequentialKeys() });

      expect(reopened.samplesSinceTraining).toBe(1);
      expect(reopened.getDecisionState(key)).toBe("outcome_known");
    });

    it("does not count featureless outcomes as pending", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();
      const bare = controller.recordDecision(createTestDecision({ decisionId: "bare", features: null }));
      if (!bare.success) throw bare.error;
      controller.recordOutcome(bare.data, createTestOutcome());

      const reopened = open({ generateKey: createSequentialKeys() });

      expect(reopened.samplesSinceTraining).toBe(0);
    });

    it("falls back to the previous cycle when the newest model does not parse", () => {
      const controller = open();
      recordMany(controller, 5);
      const first = controller.runTrainingCycle();
      const second = controller.runTrainingCycle();
      if (!first.success) throw first.error;
      if (!second.success) throw second.error;
      const newest = second.data.modelPath;
      if (newest === null) throw new Error("second cycle wrote no model");
      writeFileSync(newest, "{ broken");

      const reopened = open();

      expect(reopened.getPriorsTable().modelPath).toBe(first.data.modelPath);
    });

    it("ignores a model file whose cycle never reached the history", () => {
      const controller = open();
      recordMany(controller, 5);
      mkdirSync(join(dir, HISTORY_FILE_NAME));
      const failed = controller.runTrainingCycle();
      expect(failed.success).toBe(false);
      rmSync(join(dir, HISTORY_FILE_NAME), { recursive: true });

      const reopened = open();

      expect(readdirSync(join(dir, MODELS_DIR))).toHaveLength(1);
      expect(unwrap(reopened.trainingHistory())).toEqual([]);
      expect(reopened.getPriorsTable()).toBe(EMPTY_PRIORS_TABLE);
      expect(reopened.getLearnedPriors("reversible_low")).toEqual(defaultLabel());
      expect(reopened.samplesSinceTraining).toBe(5);
    });
  });

  describe("trainingHistory", () => {
    it("is empty before any training", () => {
      expect(open().trainingHistory()).toEqual({ success: true, data: [] });
    });

    it("skips malformed lines", () => {
      const controller = open();
      recordMany(controller, 5);
      controller.runTrainingCycle();
      appendFileSync(join(dir, HISTORY_FILE_NAME), "not json\n");
      controller.runTrainingCycle();

      const history = unwrap(controller.trainingHistory());

      expect(history).toHaveLength(2);
      expect(history.map((h) => h.sampleCount)).toEqual([5, 5]);
    });
  });

  describe("stats", () => {
    it("reports store statistics", () => {
      const controller = open();
      recordMany(controller, 2);
      recordMany(controller, 1, { success: false, regretScore: 0.75, secondaryDamage: true });
      decide(controller, "pending");

      expect(unwrap(controller.stats())).toEqual({
        totalDecisions: 4,
        withOutcome: 3,
        successRate: 2 / 3,
        highRegretCount: 1,
        secondaryDamageCount: 1,
      });
    });
  });
});
