import chalk from "chalk";

import { WEIGHT_FIELDS } from "../labels/types.js";

import type { LearnedPriorsTable, TrainingCycleResult, TrainingHistoryEntry } from "../feedback/types.js";
import type { TrainingLabel, WeightField } from "../labels/types.js";
import type { OutcomeStats } from "../outcomes/types.js";

const WEIGHT_LABELS: Record<WeightField, string> = {
  principleWeight: "principle",
  ruleWeight: "rule",
  warningWeight: "warning",
  claimWeight: "claim",
  adviceWeight: "advice",
};

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Color a weight by its direction from the neutral 1.0
 */
function colorWeight(value: number): string {
  const text = value.toFixed(3);
  if (value > 1) return chalk.green(text);
  if (value < 1) return chalk.red(text);
  return chalk.gray(text);
}

/**
 * Format one label as `principle 1.050  rule 0.950 ...`
 */
export function formatLabel(label: TrainingLabel): string {
  return WEIGHT_FIELDS.map((field) => `${WEIGHT_LABELS[field]} ${colorWeight(label[field])}`).join("  ");
}

/**
 * Format outcome store statistics for terminal output
 */
export function formatStats(stats: OutcomeStats): string {
  return [
    chalk.bold.underline("Outcome store"),
    `  Decisions recorded:  ${stats.totalDecisions}`,
    `  With outcome:        ${stats.withOutcome}`,
    `  Success rate:        ${percent(stats.successRate)}`,
    `  High regret:         ${stats.highRegretCount}`,
    `  Secondary damage:    ${stats.secondaryDamageCount}`,
  ].join("\n");
}

/**
 * Format a training cycle result for terminal output
 */
export function formatTrainingResult(result: TrainingCycleResult): string {
  if (result.status === "insufficient_data") {
    return chalk.yellow(
      `Insufficient training data: ${result.sampleCount} sample${result.sampleCount === 1 ? "" : "s"}. Learned priors unchanged.`
    );
  }
  return [
    formatSuccess(`Trained on ${result.sampleCount} samples`),
    `  Learned priors: ${result.learnedPriorsCount}`,
    `  Dataset:        ${chalk.gray(result.datasetPath ?? "-")}`,
    `  Model:          ${chalk.gray(result.modelPath ?? "-")}`,
  ].join("\n");
}

/**
 * Format the learned-priors table, situations sorted by name
 */
export function formatPriorsTable(table: LearnedPriorsTable): string {
  const hashes = Object.keys(table.priors).sort();
  if (hashes.length === 0) {
    return chalk.yellow("No learned priors yet. Record outcomes and run `judgment train`.");
  }

  const lines: string[] = [
    chalk.bold.underline(`Learned priors (${hashes.length} situations, ${table.sampleCount} samples)`),
    chalk.gray(`Model: ${table.modelPath ?? "-"}`),
  ];
  const width = Math.max(...hashes.map((hash) => hash.length));
  for (const hash of hashes) {
    const label = table.priors[hash];
    if (label === undefined) continue;
    const count = table.sampleCounts[hash] ?? 0;
    lines.push(`  ${chalk.cyan(hash.padEnd(width))}  ${formatLabel(label)}  ${chalk.gray(`(n=${count})`)}`);
  }
  return lines.join("\n");
}

/**
 * Generate a markdown report of the loop's state
 */
export function generateReport(
  stats: OutcomeStats,
  table: LearnedPriorsTable,
  history: TrainingHistoryEntry[]
): string {
  const lines: string[] = [
    "# Judgment Feedback Report",
    "",
    `Decisions recorded: ${stats.totalDecisions}`,
    `Outcomes recorded: ${stats.withOutcome}`,
    `Success rate: ${percent(stats.successRate)}`,
    `High regret outcomes: ${stats.highRegretCount}`,
    `Secondary damage: ${stats.secondaryDamageCount}`,
    `Training cycles: ${history.length}`,
    "",
  ];

  const hashes = Object.keys(table.priors).sort();
  if (hashes.length > 0) {
    lines.push("## Learned Priors");
    lines.push("");
    lines.push("| Situation | Samples | Principle | Rule | Warning | Claim | Advice |");
    lines.push("|---|---|---|---|---|---|---|");
    for (const hash of hashes) {
      const label = table.priors[hash];
      if (label === undefined) continue;
      const weights = WEIGHT_FIELDS.map((field) => label[field].toFixed(3)).join(" | ");
      lines.push(`| ${hash} | ${table.sampleCounts[hash] ?? 0} | ${weights} |`);
    }
    lines.push("");
  }

  if (history.length > 0) {
    lines.push("## Recent Training Cycles");
    lines.push("");
    for (const entry of history.slice(-10).reverse()) {
      lines.push(`- ${entry.timestamp}: ${entry.sampleCount} samples, ${entry.learnedPriorsCount} priors`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
