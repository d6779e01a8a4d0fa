/**
 * Outcome Store
 *
 * Append-only JSONL log of decisions and outcome patches, plus a derived
 * index for key lookup. The log is never rewritten: attaching an outcome
 * appends a patch entry, and readers fold the log to get current records.
 *
 * Writes go to the log first and the index second, each flushed before the
 * call returns, so after a crash the index can only be behind the log. The
 * index is re-derived from the log whenever the store opens.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { createHash, randomBytes } from "crypto";
import { join } from "path";

import {
  DuplicateKeyError,
  OutcomeAlreadyRecordedError,
  PersistenceError,
  UnknownKeyError,
  ValidationError,
} from "../lib/errors.js";
import { appendJsonLine } from "../lib/jsonl.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatch, unwrap } from "../lib/result.js";
import {
  DecisionIndexSchema,
  DecisionInputSchema,
  HIGH_REGRET_THRESHOLD,
  LogEntrySchema,
  OutcomeInputSchema,
} from "./types.js";

import type { Result } from "../lib/result.js";
import type {
  CorruptLogEntry,
  DecisionEntry,
  DecisionIndex,
  DecisionInput,
  DecisionRecord,
  IndexEntry,
  LogEntry,
  LogScan,
  OutcomeInput,
  OutcomePatchEntry,
  OutcomeStats,
} from "./types.js";

const log = logger.child("[outcomes]");

export const LOG_FILE_NAME = "decision_log.jsonl";
export const INDEX_FILE_NAME = "decision_index.json";

/** Derives a decision key from the caller's id and the creation timestamp */
export type KeyGenerator = (decisionId: string, timestamp: string) => string;

/**
 * Options for opening an outcome store
 */
export interface OutcomeStoreOptions {
  /** Directory holding the log and the index; created if missing */
  directory: string;
  /** Clock used for decision and outcome timestamps */
  now?: () => Date;
  /** Key derivation; defaults to {@link deriveDecisionKey} */
  generateKey?: KeyGenerator;
}

/** Characters a decision id may contribute to its key unchanged */
const KEY_UNSAFE_CHARS = /[^A-Za-z0-9._-]/g;

/**
 * Default key derivation: `dec_<decisionId>_<8 hex>`, the suffix hashing the
 * id, the timestamp and fresh random bytes. Characters outside
 * `[A-Za-z0-9._-]` in the id become `_` in the key; the record keeps the id
 * as given.
 */
export function deriveDecisionKey(decisionId: string, timestamp: string): string {
  const digest = createHash("sha256")
    .update(`${decisionId}_${timestamp}_`)
    .update(randomBytes(8))
    .digest("hex")
    .slice(0, 8);
  return `dec_${decisionId.replace(KEY_UNSAFE_CHARS, "_")}_${digest}`;
}

/**
 * Fold raw log content into records. Lines that fail to parse or cannot be
 * applied are reported and skipped; later lines still apply.
 */
export function foldLog(content: string): LogScan {
  const byKey = new Map<string, DecisionRecord>();
  const corrupt: CorruptLogEntry[] = [];
  const lines = content.split("\n");
  const unterminatedTail = content.length > 0 && !content.endsWith("\n");

  lines.forEach((line, i) => {
    if (line.trim() === "") return;
    const lineNumber = i + 1;
    const isTornTail = unterminatedTail && i === lines.length - 1;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      corrupt.push({
        line: lineNumber,
        reason: isTornTail ? "truncated" : "malformed",
        detail: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    const parsed = LogEntrySchema.safeParse(json);
    if (!parsed.success) {
      corrupt.push({
        line: lineNumber,
        reason: isTornTail ? "truncated" : "malformed",
        detail: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
      });
      return;
    }

    const entry = parsed.data;
    const existing = byKey.get(entry.decisionKey);

    if (entry.kind === "decision") {
      if (existing !== undefined) {
        corrupt.push({
          line: lineNumber,
          reason: "duplicate-decision",
          detail: `decision ${entry.decisionKey} already present`,
        });
        return;
      }
      byKey.set(entry.decisionKey, {
        ...entry.record,
        decisionKey: entry.decisionKey,
        outcome: null,
      });
      return;
    }

    if (existing === undefined) {
      corrupt.push({
        line: lineNumber,
        reason: "orphan-patch",
        detail: `outcome for unknown decision ${entry.decisionKey}`,
      });
      return;
    }
    if (existing.outcome !== null) {
      corrupt.push({
        line: lineNumber,
        reason: "duplicate-outcome",
        detail: `decision ${entry.decisionKey} already has an outcome`,
      });
      return;
    }
    byKey.set(entry.decisionKey, { ...existing, outcome: entry.outcome });
  });

  // Map iteration follows first insertion, i.e. decision-append order
  return { records: [...byKey.values()], corrupt };
}

/**
 * Derive the index from reconstructed records
 */
export function buildIndex(records: DecisionRecord[]): Map<string, IndexEntry> {
  const index = new Map<string, IndexEntry>();
  for (const record of records) {
    const entry: IndexEntry = {
      decisionId: record.decisionId,
      recordedAt: record.timestamp,
      hasOutcome: record.outcome !== null,
      hasFeatures: record.features !== null,
    };
    if (record.outcome !== null) {
      entry.outcomeRecordedAt = record.outcome.recordedAt;
    }
    index.set(record.decisionKey, entry);
  }
  return index;
}

function sameIndex(a: Map<string, IndexEntry>, b: Map<string, IndexEntry>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, entry] of a) {
    const other = b.get(key);
    if (
      other === undefined ||
      other.decisionId !== entry.decisionId ||
      other.recordedAt !== entry.recordedAt ||
      other.hasOutcome !== entry.hasOutcome ||
      other.hasFeatures !== entry.hasFeatures ||
      other.outcomeRecordedAt !== entry.outcomeRecordedAt
    ) {
      return false;
    }
  }
  return true;
}

/**
 * Append-only store of decisions and their outcomes
 */
export class OutcomeStore {
  readonly directory: string;
  readonly logPath: string;
  readonly indexPath: string;

  private readonly now: () => Date;
  private readonly generateKey: KeyGenerator;

  /** decisionKey → index entry; always consistent with the log */
  private index: Map<string, IndexEntry> = new Map();

  private constructor(options: OutcomeStoreOptions) {
    this.directory = options.directory;
    this.logPath = join(options.directory, LOG_FILE_NAME);
    this.indexPath = join(options.directory, INDEX_FILE_NAME);
    this.now = options.now ?? (() => new Date());
    this.generateKey = options.generateKey ?? deriveDecisionKey;
  }

  /**
   * Open a store, creating its directory and reconciling the index with the log
   */
  static open(options: OutcomeStoreOptions): Result<OutcomeStore, PersistenceError> {
    const store = new OutcomeStore(options);
    try {
      mkdirSync(store.directory, { recursive: true });
    } catch (error) {
      return err(new PersistenceError(`Failed to create ${store.directory}`, store.directory, error));
    }

    const scanned = store.scan();
    if (!scanned.success) return scanned;
    const derived = buildIndex(scanned.data.records);
    const stored = store.readIndexFile();
    store.index = derived;

    if (stored === null || !sameIndex(derived, stored)) {
      if (stored !== null) {
        log.warn(`Index out of date with ${LOG_FILE_NAME}, rebuilding (${stored.size} → ${derived.size} entries)`);
      }
      const saved = store.saveIndex();
      if (!saved.success) return saved;
    }

    return ok(store);
  }

  /**
   * Number of decisions in the index
   */
  get size(): number {
    return this.index.size;
  }

  /**
   * Check if a decision key exists
   */
  has(decisionKey: string): boolean {
    return this.index.has(decisionKey);
  }

  /**
   * Index entry for a key, or null
   */
  lookup(decisionKey: string): IndexEntry | null {
    const entry = this.index.get(decisionKey);
    return entry === undefined ? null : { ...entry };
  }

  /**
   * Record a new decision and return its key. Once the log entry is written
   * the decision is recorded: an index write failing after that is logged,
   * and the index is re-derived on the next open.
   */
  append(
    input: DecisionInput
  ): Result<string, DuplicateKeyError | ValidationError | PersistenceError> {
    const parsed = DecisionInputSchema.safeParse(input);
    if (!parsed.success) {
      return err(new ValidationError("Invalid decision", { issues: parsed.error.issues }));
    }

    const timestamp = this.now().toISOString();
    const decisionKey = this.generateKey(parsed.data.decisionId, timestamp);
    if (this.index.has(decisionKey)) {
      return err(new DuplicateKeyError(decisionKey));
    }

    const entry: DecisionEntry = {
      kind: "decision",
      decisionKey,
      record: { ...parsed.data, timestamp },
    };
    const written = this.appendEntry(entry);
    if (!written.success) return written;

    this.index.set(decisionKey, {
      decisionId: parsed.data.decisionId,
      recordedAt: timestamp,
      hasOutcome: false,
      hasFeatures: parsed.data.features !== null,
    });
    this.saveIndexAfterAppend(decisionKey);

    log.debug(`Recorded decision ${decisionKey}`);
    return ok(decisionKey);
  }

  /**
   * Attach the observed outcome to a decision. Write-once: a second outcome
   * for the same key is rejected and the first one stays. As with
   * {@link append}, the outcome counts as recorded once the log entry is
   * written.
   */
  attachOutcome(
    decisionKey: string,
    outcome: OutcomeInput
  ): Result<
    true,
    UnknownKeyError | OutcomeAlreadyRecordedError | ValidationError | PersistenceError
  > {
    const existing = this.index.get(decisionKey);
    if (existing === undefined) {
      return err(new UnknownKeyError(decisionKey));
    }
    if (existing.hasOutcome) {
      return err(new OutcomeAlreadyRecordedError(decisionKey, existing.outcomeRecordedAt));
    }

    const parsed = OutcomeInputSchema.safeParse(outcome);
    if (!parsed.success) {
      return err(
        new ValidationError("Invalid outcome", { decisionKey, issues: parsed.error.issues })
      );
    }

    const recordedAt = this.now().toISOString();
    const entry: OutcomePatchEntry = {
      kind: "outcome-patch",
      decisionKey,
      outcome: { ...parsed.data, recordedAt },
    };
    const written = this.appendEntry(entry);
    if (!written.success) return written;

    this.index.set(decisionKey, { ...existing, hasOutcome: true, outcomeRecordedAt: recordedAt });
    this.saveIndexAfterAppend(decisionKey);

    log.debug(`Attached outcome to ${decisionKey}`);
    return ok(true);
  }

  /**
   * Fold the log into current records, reporting skipped lines
   */
  scan(): Result<LogScan, PersistenceError> {
    if (!existsSync(this.logPath)) {
      return ok({ records: [], corrupt: [] });
    }
    const content = tryCatch(() => readFileSync(this.logPath, "utf-8"));
    if (!content.success) {
      log.error(`Failed to read ${this.logPath}: ${content.error.message}`);
      return err(new PersistenceError(`Failed to read ${this.logPath}`, this.logPath, content.error));
    }
    const result = foldLog(content.data);
    if (result.corrupt.length > 0) {
      log.warn(`Skipped ${result.corrupt.length} corrupt entr${result.corrupt.length === 1 ? "y" : "ies"} in ${this.logPath}`);
      for (const entry of result.corrupt) {
        log.debug(`  line ${entry.line} (${entry.reason}): ${entry.detail}`);
      }
    }
    return ok(result);
  }

  /**
   * All decisions in append order. The log is read when iteration starts,
   * so the same iterable can be walked again to see newer writes.
   *
   * @throws {PersistenceError} when iteration starts and the log cannot be read
   */
  loadAll(): Iterable<DecisionRecord> {
    return {
      [Symbol.iterator]: () => unwrap(this.scan()).records[Symbol.iterator](),
    };
  }

  /**
   * Get one decision by key, or null for an unknown key
   */
  get(decisionKey: string): Result<DecisionRecord | null, PersistenceError> {
    if (!this.index.has(decisionKey)) return ok(null);
    const scanned = this.scan();
    if (!scanned.success) return scanned;
    return ok(scanned.data.records.find((r) => r.decisionKey === decisionKey) ?? null);
  }

  /**
   * Aggregate statistics over the whole log
   */
  stats(): Result<OutcomeStats, PersistenceError> {
    const scanned = this.scan();
    if (!scanned.success) return scanned;

    let totalDecisions = 0;
    let withOutcome = 0;
    let successes = 0;
    let highRegretCount = 0;
    let secondaryDamageCount = 0;

    for (const record of scanned.data.records) {
      totalDecisions++;
      const outcome = record.outcome;
      if (outcome === null) continue;
      withOutcome++;
      if (outcome.success) successes++;
      if (outcome.regretScore > HIGH_REGRET_THRESHOLD) highRegretCount++;
      if (outcome.secondaryDamage) secondaryDamageCount++;
    }

    return ok({
      totalDecisions,
      withOutcome,
      successRate: withOutcome > 0 ? successes / withOutcome : 0,
      highRegretCount,
      secondaryDamageCount,
    });
  }

  /**
   * Rebuild the index from the log and persist it
   */
  reindex(): Result<number, PersistenceError> {
    const scanned = this.scan();
    if (!scanned.success) return scanned;
    this.index = buildIndex(scanned.data.records);
    const saved = this.saveIndex();
    if (!saved.success) return saved;
    log.info(`Rebuilt index with ${this.index.size} entries`);
    return ok(this.index.size);
  }

  private appendEntry(entry: LogEntry): Result<void, PersistenceError> {
    const written = appendJsonLine(this.logPath, entry);
    if (!written.success) {
      log.error(written.error.message);
    }
    return written;
  }

  private saveIndexAfterAppend(decisionKey: string): void {
    const saved = this.saveIndex();
    if (!saved.success) {
      log.error(`${decisionKey} is in ${LOG_FILE_NAME} but the index was not updated; it is rebuilt on next open`);
    }
  }

  /**
   * Rewrite the index file via a temp file and rename
   */
  private saveIndex(): Result<void, PersistenceError> {
    const document: DecisionIndex = {
      version: 1,
      entries: Object.fromEntries(this.index),
    };
    const tmpPath = `${this.indexPath}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(document, null, 2));
      renameSync(tmpPath, this.indexPath);
      return ok(undefined);
    } catch (error) {
      log.error(`Failed to write ${this.indexPath}`);
      return err(new PersistenceError(`Failed to write ${this.indexPath}`, this.indexPath, error));
    }
  }

  private readIndexFile(): Map<string, IndexEntry> | null {
    if (!existsSync(this.indexPath)) return null;
    try {
      const parsed = DecisionIndexSchema.safeParse(JSON.parse(readFileSync(this.indexPath, "utf-8")));
      if (!parsed.success) {
        log.warn(`Ignoring invalid index ${this.indexPath}`);
        return null;
      }
      return new Map(Object.entries(parsed.data.entries));
    } catch (error) {
      log.warn(`Ignoring unreadable index ${this.indexPath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

/**
 * Open an outcome store in a directory
 */
export function openOutcomeStore(
  directory: string,
  options: Omit<OutcomeStoreOptions, "directory"> = {}
): Result<OutcomeStore, PersistenceError> {
  return OutcomeStore.open({ ...options, directory });
}
