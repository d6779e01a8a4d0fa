/**
 * Durable JSON-lines appends
 */

import { closeSync, fstatSync, fsyncSync, openSync, readSync, writeSync } from "fs";

import { PersistenceError } from "./errors.js";
import { ok, err } from "./result.js";

import type { Result } from "./result.js";

const NEWLINE = 0x0a;

/**
 * Append one JSON value as a line and fsync before returning. If the file
 * ends in a torn line from an earlier crash, the new line starts fresh.
 */
export function appendJsonLine(filePath: string, value: unknown): Result<void, PersistenceError> {
  let fd: number | undefined;
  try {
    fd = openSync(filePath, "a+");
    const { size } = fstatSync(fd);
    let prefix = "";
    if (size > 0) {
      const last = Buffer.alloc(1);
      readSync(fd, last, 0, 1, size - 1);
      if (last[0] !== NEWLINE) prefix = "\n";
    }
    writeSync(fd, `${prefix}${JSON.stringify(value)}\n`);
    fsyncSync(fd);
    return ok(undefined);
  } catch (error) {
    return err(new PersistenceError(`Failed to append to ${filePath}`, filePath, error));
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}
