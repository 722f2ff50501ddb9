/**
 * Lineage Store — persistence for the lineage ledger document.
 *
 * Implementations:
 * - InMemoryLineageStore: tests and embedding
 * - JsonFileLineageStore: one JSON document on disk
 *
 * Write discipline (file store), all under the lock:
 * 1. Copy the current file to a timestamped backup
 * 2. Write the new document to a temp file and rename it into place
 * 3. Read it back and compare; on mismatch restore the backup
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { canonicalize } from "json-canonicalize";
import { IntegrityError } from "@compliance-ledger/types";
import type { LineageChain } from "@compliance-ledger/types";
import { atomicWriteJson } from "./atomic-write.js";
import { withFileLock } from "./file-lock.js";
import type { FileLockOptions } from "./file-lock.js";
import { KeyedMutex } from "./mutex.js";
import { LineageChainSchema, describeIssues } from "./schema.js";

export interface CommitResult {
  /** Where the previous state was backed up, if there was one */
  readonly backup: string | null;
}

export interface LineageStore {
  /** Human-readable location, used in evidence and logs */
  readonly location: string;

  /** Current persisted chain, or null if none has been written */
  read(): Promise<LineageChain | null>;

  /** Run `fn` holding the exclusive write lock */
  withLock<T>(fn: () => Promise<T>): Promise<T>;

  /** Replace the persisted chain; call only while holding the lock */
  commit(next: LineageChain): Promise<CommitResult>;
}

function parseChain(text: string, location: string): LineageChain {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IntegrityError(`Lineage ledger ${location} is not valid JSON`, {
      location,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = LineageChainSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IntegrityError(
      `Lineage ledger ${location} is malformed: ${describeIssues(parsed.error)}`,
      { location },
    );
  }
  return parsed.data;
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemoryLineageStore implements LineageStore {
  readonly location = "memory://lineage";
  private text: string | null;
  private readonly mutex = new KeyedMutex();
  private commits = 0;

  constructor(initial: LineageChain | null = null) {
    this.text = initial === null ? null : JSON.stringify(initial);
  }

  async read(): Promise<LineageChain | null> {
    return this.text === null ? null : parseChain(this.text, this.location);
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.run("lineage", fn);
  }

  async commit(next: LineageChain): Promise<CommitResult> {
    const backup = this.text === null ? null : `memory://lineage-backup-${++this.commits}`;
    this.text = JSON.stringify(next);
    return { backup };
  }

  /** Overwrite the stored document without checks (tamper simulation) */
  overwrite(document: unknown): void {
    this.text = JSON.stringify(document);
  }
}

// =============================================================================
// JSON file
// =============================================================================

export interface JsonFileLineageStoreOptions {
  /** Directory for pre-write backups (default: "<dir>/backups") */
  readonly backupDir?: string;
  readonly lock?: FileLockOptions;
}

export class JsonFileLineageStore implements LineageStore {
  readonly location: string;
  private readonly backupDir: string;
  private readonly lockOptions: FileLockOptions;
  private readonly mutex = new KeyedMutex();

  constructor(path: string, options: JsonFileLineageStoreOptions = {}) {
    this.location = path;
    this.backupDir = options.backupDir ?? join(dirname(path), "backups");
    this.lockOptions = options.lock ?? {};
  }

  async read(): Promise<LineageChain | null> {
    if (!existsSync(this.location)) return null;
    return parseChain(readFileSync(this.location, "utf8"), this.location);
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.run("lineage", () =>
      withFileLock(`${this.location}.lock`, fn, this.lockOptions),
    );
  }

  async commit(next: LineageChain): Promise<CommitResult> {
    const backup = this.backup();
    atomicWriteJson(this.location, next);

    const written = readFileSync(this.location, "utf8");
    if (canonicalize(JSON.parse(written)) !== canonicalize(next)) {
      if (backup !== null) copyFileSync(backup, this.location);
      throw new IntegrityError(`Read-back of ${this.location} does not match what was written`, {
        location: this.location,
        restored_from: backup,
      });
    }

    return { backup };
  }

  private backup(): string | null {
    if (!existsSync(this.location)) return null;
    mkdirSync(this.backupDir, { recursive: true });

    const ext = extname(this.location);
    const stem = basename(this.location, ext);
    const stamp = new Date().toISOString().replace(/[-:.]/g, "");
    let target = join(this.backupDir, `${stem}_backup_${stamp}${ext}`);
    for (let n = 1; existsSync(target); n++) {
      target = join(this.backupDir, `${stem}_backup_${stamp}_${n}${ext}`);
    }
    copyFileSync(this.location, target);
    return target;
  }
}
