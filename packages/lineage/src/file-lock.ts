/**
 * Cross-process exclusive lock on a sibling ".lock" file.
 *
 * Acquisition is an exclusive create; the holder removes the file when
 * done. A lock file older than `staleMs` is treated as abandoned by a
 * crashed holder and removed.
 */

import { closeSync, openSync, rmSync, statSync, writeSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { ExecutionError } from "@compliance-ledger/types";

export interface FileLockOptions {
  /** Give up after this long (default 10 s) */
  readonly timeoutMs?: number;

  /** Break locks older than this (default 60 s) */
  readonly staleMs?: number;

  /** Poll interval while waiting (default 25 ms) */
  readonly retryMs?: number;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function tryAcquire(lockPath: string): boolean {
  try {
    const fd = openSync(lockPath, "wx");
    try {
      writeSync(fd, `${process.pid} ${new Date().toISOString()}\n`);
    } finally {
      closeSync(fd);
    }
    return true;
  } catch (err) {
    if (errorCode(err) === "EEXIST") return false;
    throw err;
  }
}

/** Age of the lock file in ms, or null if it vanished meanwhile */
function lockAge(lockPath: string): number | null {
  try {
    return Date.now() - statSync(lockPath).mtimeMs;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? 10_000;
  const staleMs = options.staleMs ?? 60_000;
  const retryMs = options.retryMs ?? 25;
  const started = Date.now();

  while (!tryAcquire(lockPath)) {
    const age = lockAge(lockPath);
    if (age !== null && age > staleMs) {
      rmSync(lockPath, { force: true });
      continue;
    }
    if (Date.now() - started >= timeoutMs) {
      throw new ExecutionError(`Timed out waiting for lock ${lockPath}`, {
        lock: lockPath,
        timeout_ms: timeoutMs,
      });
    }
    await sleep(retryMs);
  }

  try {
    return await fn();
  } finally {
    rmSync(lockPath, { force: true });
  }
}
