/**
 * Tests for the cross-process file lock and the in-process keyed mutex.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { ExecutionError } from "@compliance-ledger/types";
import { withFileLock } from "../src/file-lock.js";
import { KeyedMutex } from "../src/mutex.js";

let dir: string;
let lockPath: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lineage-lock-"));
  lockPath = join(dir, "lineage.json.lock");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("withFileLock", () => {
  it("holds the lock file only while running", async () => {
    const seen = await withFileLock(lockPath, async () => existsSync(lockPath));
    expect(seen).toBe(true);
    expect(existsSync(lockPath)).toBe(false);
  });

  it("releases the lock when the callback throws", async () => {
    await expect(
      withFileLock(lockPath, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(existsSync(lockPath)).toBe(false);
  });

  it("serializes holders", async () => {
    const events: string[] = [];
    const hold = (name: string) =>
      withFileLock(
        lockPath,
        async () => {
          events.push(`${name}:start`);
          await sleep(20);
          events.push(`${name}:end`);
        },
        { retryMs: 5 },
      );

    await Promise.all([hold("a"), hold("b")]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("times out while another holder keeps the lock", async () => {
    writeFileSync(lockPath, "other");
    await expect(
      withFileLock(lockPath, async () => "never", { timeoutMs: 50, retryMs: 5 }),
    ).rejects.toThrow(ExecutionError);
    expect(existsSync(lockPath)).toBe(true);
  });

  it("breaks a stale lock", async () => {
    writeFileSync(lockPath, "crashed");
    const old = new Date(Date.now() - 120_000);
    utimesSync(lockPath, old, old);

    const value = await withFileLock(lockPath, async () => "acquired", { staleMs: 60_000 });
    expect(value).toBe("acquired");
  });
});

describe("KeyedMutex", () => {
  it("runs calls for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string, ms: number) =>
      mutex.run("k", async () => {
        events.push(`${name}:start`);
        await sleep(ms);
        events.push(`${name}:end`);
      });

    await Promise.all([task("slow", 20), task("fast", 1)]);
    expect(events).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
  });

  it("does not serialize different keys", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (key: string, ms: number) =>
      mutex.run(key, async () => {
        events.push(`${key}:start`);
        await sleep(ms);
        events.push(`${key}:end`);
      });

    await Promise.all([task("a", 20), task("b", 1)]);
    expect(events).toEqual(["a:start", "b:start", "b:end", "a:end"]);
  });

  it("keeps going after a failed call and cleans up", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("k", async () => {
      throw new Error("first");
    });
    const next = mutex.run("k", async () => "second");

    await expect(failed).rejects.toThrow("first");
    expect(await next).toBe("second");
    expect(mutex.pending()).toBe(0);
  });
});
