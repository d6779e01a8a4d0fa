/**
 * Configuration Management
 *
 * Reads `.judgment/config.yaml` from the project root. Environment variables
 * take precedence over the file.
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join, resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { LOG_LEVEL_NAMES } from "./logger.js";
import { ok, err } from "./result.js";

import type { Result } from "./result.js";

export const DEFAULT_DATA_DIR = ".judgment";
export const CONFIG_FILE_NAME = "config.yaml";

/** Training is refused below this many samples, whatever the configuration says */
export const MIN_TRAINING_SAMPLES = 5;

/** Outcomes recorded between automatic training cycles */
export const DEFAULT_TRAINING_THRESHOLD = 10;

/**
 * Configuration file schema
 */
export const ConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  trainingThreshold: z
    .number()
    .int()
    .min(MIN_TRAINING_SAMPLES, `trainingThreshold must be at least ${MIN_TRAINING_SAMPLES}`)
    .default(DEFAULT_TRAINING_THRESHOLD),
  logLevel: z.enum(LOG_LEVEL_NAMES).default("info"),
  /** Serve neutral priors while still recording and training */
  disabled: z.boolean().default(false),
});

export type JudgmentConfig = z.infer<typeof ConfigSchema>;

/**
 * Get config file path for a project
 */
export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, DEFAULT_DATA_DIR, CONFIG_FILE_NAME);
}

/**
 * Load configuration for a project. `dataDir` comes back absolute.
 */
export function loadConfig(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Result<JudgmentConfig, ConfigError> {
  const configPath = getConfigPath(projectRoot);

  let raw: unknown = {};
  if (existsSync(configPath)) {
    try {
      raw = YAML.parse(readFileSync(configPath, "utf-8")) ?? {};
    } catch (error) {
      return err(
        new ConfigError(`Failed to parse ${configPath}`, {
          path: configPath,
          reason: error instanceof Error ? error.message : String(error),
        })
      );
    }
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return err(new ConfigError(`Config must be a mapping: ${configPath}`, { path: configPath }));
  }

  const merged: Record<string, unknown> = { ...raw };
  const envDataDir = env["JUDGMENT_DATA_DIR"];
  if (envDataDir !== undefined && envDataDir.length > 0) {
    merged["dataDir"] = envDataDir;
  }
  const envLogLevel = env["JUDGMENT_LOG_LEVEL"];
  if (envLogLevel !== undefined && envLogLevel.length > 0) {
    merged["logLevel"] = envLogLevel;
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    return err(
      new ConfigError("Invalid configuration", {
        path: configPath,
        issues: parsed.error.issues,
      })
    );
  }

  const config = parsed.data;
  return ok({
    ...config,
    dataDir: isAbsolute(config.dataDir) ? config.dataDir : resolve(projectRoot, config.dataDir),
  });
}
