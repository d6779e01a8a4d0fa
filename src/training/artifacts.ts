/**
 * Versioned artifact files
 *
 * Datasets and models are written once under a timestamped name and never
 * overwritten. A name clash within the same millisecond gets a numeric suffix.
 */

import { closeSync, fsyncSync, mkdirSync, openSync, writeSync } from "fs";
import { join } from "path";

import { PersistenceError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import type { Result } from "../lib/result.js";

/** Attempts at a free file name before giving up */
const MAX_NAME_ATTEMPTS = 100;

/**
 * File-name-safe, lexically sortable timestamp
 */
export function artifactStamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-");
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Write `document` as pretty JSON to `<dir>/<prefix>_<stamp>[_n].json`
 * with exclusive create, flushed to disk. Returns the path written.
 */
export function writeArtifact(
  directory: string,
  prefix: string,
  date: Date,
  document: unknown
): Result<string, PersistenceError> {
  const content = JSON.stringify(document, null, 2);
  const base = `${prefix}_${artifactStamp(date)}`;

  try {
    mkdirSync(directory, { recursive: true });
  } catch (error) {
    return err(new PersistenceError(`Failed to create ${directory}`, directory, error));
  }

  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const filePath = join(directory, attempt === 0 ? `${base}.json` : `${base}_${attempt}.json`);
    let fd: number | undefined;
    try {
      fd = openSync(filePath, "wx");
      writeSync(fd, content);
      fsyncSync(fd);
      return ok(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") continue;
      return err(new PersistenceError(`Failed to write ${filePath}`, filePath, error));
    } finally {
      if (fd !== undefined) closeSync(fd);
    }
  }

  return err(new PersistenceError(`No free artifact name for ${base}`, join(directory, base)));
}
