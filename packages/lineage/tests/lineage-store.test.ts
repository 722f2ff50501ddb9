/**
 * Tests for the JSON file lineage store.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { IntegrityError } from "@compliance-ledger/types";
import { serializeJson } from "../src/atomic-write.js";
import { buildCandidateEntry } from "../src/candidate.js";
import { LineageChainManager } from "../src/chain-manager.js";
import { JsonFileLineageStore } from "../src/lineage-store.js";
import { chainOf, source, steppingClock } from "./fixtures.js";

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lineage-store-"));
  path = join(dir, "lineage.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("JsonFileLineageStore", () => {
  it("reads null before anything is written", async () => {
    expect(await new JsonFileLineageStore(path).read()).toBeNull();
  });

  it("writes the chain and reads it back", async () => {
    const store = new JsonFileLineageStore(path);
    const chain = chainOf(2);
    const { backup } = await store.commit(chain);

    expect(backup).toBeNull();
    expect(readFileSync(path, "utf8")).toBe(serializeJson(chain));
    expect(await store.read()).toEqual(chain);
  });

  it("backs up the previous document before overwriting", async () => {
    const store = new JsonFileLineageStore(path);
    await store.commit(chainOf(1));
    const { backup } = await store.commit(chainOf(2));

    expect(backup).not.toBeNull();
    expect(readdirSync(join(dir, "backups"))).toHaveLength(1);
    expect(readdirSync(join(dir, "backups"))[0]).toMatch(
      /^lineage_backup_\d{8}T\d{9}Z(_\d+)?\.json$/,
    );
    expect(readFileSync(backup ?? "", "utf8")).toBe(serializeJson(chainOf(1)));
  });

  it("honours a custom backup directory", async () => {
    const backupDir = join(dir, "elsewhere");
    const store = new JsonFileLineageStore(path, { backupDir });
    await store.commit(chainOf(1));
    await store.commit(chainOf(2));
    expect(readdirSync(backupDir)).toHaveLength(1);
  });

  it("leaves no temp or lock files behind", async () => {
    const store = new JsonFileLineageStore(path);
    await store.withLock(() => store.commit(chainOf(1)));
    expect(readdirSync(dir)).toEqual(["lineage.json"]);
  });

  it("rejects a document that is not JSON", async () => {
    writeFileSync(path, "{ not json");
    await expect(new JsonFileLineageStore(path).read()).rejects.toThrow(IntegrityError);
  });

  it("rejects a document with unknown fields", async () => {
    const chain = chainOf(1);
    writeFileSync(
      path,
      JSON.stringify({ ...chain, entries: [{ ...chain.entries[0]!, injected: true }] }),
    );
    await expect(new JsonFileLineageStore(path).read()).rejects.toThrow(/malformed/);
  });

  it("backs a manager through successive appends", async () => {
    const manager = new LineageChainManager(new JsonFileLineageStore(path), {
      clock: steppingClock(),
    });
    for (const tag of ["a", "b", "c"]) {
      await manager.append(buildCandidateEntry(await manager.load(), source(tag)));
    }

    const report = await manager.verify();
    expect(report.valid).toBe(true);
    expect(report.total_entries).toBe(3);
    expect(readdirSync(join(dir, "backups"))).toHaveLength(2);
  });
});
