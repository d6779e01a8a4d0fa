#!/usr/bin/env node
/**
 * judgment CLI entry point
 *
 * Commands:
 * - stats    - Outcome store statistics
 * - train    - Run a training cycle
 * - priors   - Show learned priors
 * - report   - Markdown report of the loop
 * - record   - Record a decision from a JSON file
 * - outcome  - Record the outcome of a decision
 */

import { readFileSync } from "fs";
import { resolve } from "path";

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import ora from "ora";

import { createFeedbackController } from "../feedback/index.js";
import { VERSION } from "../index.js";
import { loadConfig, logger, tryCatch, ValidationError } from "../lib/index.js";
import { DecisionInputSchema } from "../outcomes/index.js";

import type { FeedbackController } from "../feedback/index.js";
import type { OutcomeInput } from "../outcomes/index.js";

import {
  formatError,
  formatLabel,
  formatPriorsTable,
  formatStats,
  formatSuccess,
  formatTrainingResult,
  generateReport,
} from "./formatters.js";

interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Load configuration and open the controller, exiting on failure
 */
function openController(options: GlobalOptions): FeedbackController {
  const projectRoot = resolve(options.cwd ?? process.cwd());
  const config = loadConfig(projectRoot);
  if (!config.success) {
    console.error(formatError(config.error));
    process.exit(1);
  }

  if (options.quiet === true) {
    logger.configure({ level: "error" });
  } else if (options.verbose === true) {
    logger.configure({ level: "debug" });
  } else {
    logger.configure({ level: config.data.logLevel });
  }
  logger.debug(`Data directory: ${config.data.dataDir}`);

  const controller = createFeedbackController(config.data);
  if (!controller.success) {
    console.error(formatError(controller.error));
    process.exit(1);
  }
  return controller.data;
}

function parseUnitInterval(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Expected a number between 0 and 1.");
  }
  return parsed;
}

function parseDays(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("judgment")
  .description("Decision outcome feedback loop: record outcomes, learn knowledge-type priors")
  .version(VERSION)
  .option("-C, --cwd <dir>", "Project root containing .judgment/")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)");

program
  .command("stats")
  .description("Show outcome store statistics")
  .option("--json", "Output JSON")
  .action((options: { json?: boolean }, command: Command) => {
    const controller = openController(command.optsWithGlobals<GlobalOptions>());
    const stats = controller.stats();
    if (!stats.success) {
      console.error(formatError(stats.error));
      process.exit(1);
    }
    console.log(options.json === true ? JSON.stringify(stats.data, null, 2) : formatStats(stats.data));
  });

program
  .command("train")
  .description("Run a training cycle over every recorded outcome")
  .option("--json", "Output JSON")
  .action((options: { json?: boolean }, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const controller = openController(globals);

    const showSpinner = options.json !== true && globals.quiet !== true;
    const spinner = showSpinner ? ora("Building training set...").start() : null;

    const result = controller.runTrainingCycle();
    if (!result.success) {
      spinner?.fail("Training failed");
      console.error(formatError(result.error));
      process.exit(1);
    }
    spinner?.stop();

    console.log(options.json === true ? JSON.stringify(result.data, null, 2) : formatTrainingResult(result.data));
  });

program
  .command("priors [situationHash]")
  .description("Show learned priors, or the label for one situation")
  .option("--json", "Output JSON")
  .action((situationHash: string | undefined, options: { json?: boolean }, command: Command) => {
    const controller = openController(command.optsWithGlobals<GlobalOptions>());

    if (situationHash !== undefined) {
      const label = controller.getLearnedPriors(situationHash);
      console.log(
        options.json === true
          ? JSON.stringify(label, null, 2)
          : `${chalk.cyan(situationHash)}  ${formatLabel(label)}`
      );
      return;
    }

    const table = controller.getPriorsTable();
    console.log(options.json === true ? JSON.stringify(table, null, 2) : formatPriorsTable(table));
  });

program
  .command("report")
  .description("Print a markdown report of outcomes and learned priors")
  .action((_options: unknown, command: Command) => {
    const controller = openController(command.optsWithGlobals<GlobalOptions>());
    const stats = controller.stats();
    if (!stats.success) {
      console.error(formatError(stats.error));
      process.exit(1);
    }
    const history = controller.trainingHistory();
    if (!history.success) {
      console.error(formatError(history.error));
      process.exit(1);
    }
    console.log(generateReport(stats.data, controller.getPriorsTable(), history.data));
  });

program
  .command("record <file>")
  .description("Record a decision from a JSON file")
  .action((file: string, _options: unknown, command: Command) => {
    const controller = openController(command.optsWithGlobals<GlobalOptions>());

    const input = tryCatch((): unknown => JSON.parse(readFileSync(resolve(file), "utf-8")));
    if (!input.success) {
      console.error(formatError(input.error));
      process.exit(1);
    }

    const decision = DecisionInputSchema.safeParse(input.data);
    if (!decision.success) {
      console.error(formatError(new ValidationError(`Invalid decision file: ${decision.error.issues[0]?.message ?? "unknown"}`)));
      process.exit(1);
    }

    const recorded = controller.recordDecision(decision.data);
    if (!recorded.success) {
      console.error(formatError(recorded.error));
      process.exit(1);
    }
    console.log(formatSuccess(`Recorded decision ${recorded.data}`));
  });

program
  .command("outcome <decisionKey>")
  .description("Record the observed outcome of a decision")
  .option("--success", "The decision succeeded")
  .option("--failure", "The decision failed")
  .option("--regret <score>", "Regret score between 0 and 1", parseUnitInterval, 0)
  .option("--recovery-days <days>", "Days to recover", parseDays, 0)
  .option("--secondary-damage", "The decision caused secondary damage")
  .option("--notes <text>", "Free-text notes", "")
  .action(
    (
      decisionKey: string,
      options: {
        success?: boolean;
        failure?: boolean;
        regret: number;
        recoveryDays: number;
        secondaryDamage?: boolean;
        notes: string;
      },
      command: Command
    ) => {
      if (options.success === options.failure) {
        console.error(formatError(new Error("Pass exactly one of --success or --failure")));
        process.exit(1);
      }

      const controller = openController(command.optsWithGlobals<GlobalOptions>());
      const outcome: OutcomeInput = {
        success: options.success === true,
        regretScore: options.regret,
        recoveryTimeDays: options.recoveryDays,
        secondaryDamage: options.secondaryDamage === true,
        notes: options.notes,
      };

      const recorded = controller.recordOutcome(decisionKey, outcome);
      if (!recorded.success) {
        console.error(formatError(recorded.error));
        process.exit(1);
      }

      console.log(formatSuccess(`Recorded outcome for ${decisionKey}`));
      const training = recorded.data.training;
      if (training === null) return;
      if (training.success) {
        console.log(formatTrainingResult(training.data));
      } else {
        console.error(formatError(training.error));
        process.exitCode = 1;
      }
    }
  );

program.parse();
