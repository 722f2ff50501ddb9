/**
 * Tests for the immutable archival sinks.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { canonicalize } from "json-canonicalize";
import { IntegrityError } from "@compliance-ledger/types";
import {
  FileArchivalSink,
  InMemoryArchivalSink,
  archiveName,
  compactTimestamp,
} from "../src/archive.js";
import { sha256 } from "./fixtures.js";

const AT = new Date("2026-03-04T05:06:07.890Z");

describe("archive naming", () => {
  it("compacts ISO timestamps", () => {
    expect(compactTimestamp(AT)).toBe("20260304T050607Z");
  });

  it("builds <kind>_<timestamp>_<id>.json with a safe id", () => {
    expect(archiveName("compliance_signature", "ab12", AT)).toBe(
      "compliance_signature_20260304T050607Z_ab12.json",
    );
    expect(archiveName("lineage", "../x y", AT)).toBe("lineage_20260304T050607Z_.._x_y.json");
  });
});

describe("FileArchivalSink", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ledger-archive-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the document once and returns a receipt", async () => {
    const sink = new FileArchivalSink(join(dir, "worm"));
    const doc = { b: 2, a: 1 };
    const receipt = await sink.archive("compliance_signature", "abc", doc, AT);

    expect(receipt).toEqual({
      kind: "compliance_signature",
      snapshot_id: "compliance_signature_20260304T050607Z_abc.json",
      location: join(dir, "worm", "compliance_signature_20260304T050607Z_abc.json"),
      archived_at: "2026-03-04T05:06:07.890Z",
      content_hash: sha256(canonicalize(doc)),
    });
    expect(JSON.parse(readFileSync(receipt.location, "utf8"))).toEqual(doc);
  });

  it("never overwrites an existing entry", async () => {
    const sink = new FileArchivalSink(dir);
    await sink.archive("k", "same", { v: 1 }, AT);
    await expect(sink.archive("k", "same", { v: 2 }, AT)).rejects.toThrow(IntegrityError);

    const name = readdirSync(dir)[0]!;
    expect(JSON.parse(readFileSync(join(dir, name), "utf8"))).toEqual({ v: 1 });
  });

  it("locates the latest entry for a kind and id", async () => {
    const sink = new FileArchivalSink(dir);
    await sink.archive("lineage", "7", { v: 1 }, AT);
    await sink.archive("lineage", "7", { v: 2 }, new Date("2026-03-05T00:00:00.000Z"));
    await sink.archive("lineage_entry", "7", { v: 3 }, new Date("2026-03-06T00:00:00.000Z"));

    expect(await sink.locate("lineage", "7")).toBe(join(dir, "lineage_20260305T000000Z_7.json"));
    expect(await sink.locate("lineage", "8")).toBeNull();
  });

  it("locates nothing before the directory exists", async () => {
    expect(await new FileArchivalSink(join(dir, "absent")).locate("k", "x")).toBeNull();
  });
});

describe("InMemoryArchivalSink", () => {
  it("keeps documents and refuses duplicates", async () => {
    const sink = new InMemoryArchivalSink();
    const receipt = await sink.archive("lineage", "1", { entry: 1 }, AT);
    expect(receipt.location).toBe("memory://lineage_20260304T050607Z_1.json");
    expect(sink.names()).toEqual(["lineage_20260304T050607Z_1.json"]);
    expect(sink.read("lineage_20260304T050607Z_1.json")).toEqual({ entry: 1 });
    await expect(sink.archive("lineage", "1", {}, AT)).rejects.toThrow(IntegrityError);
    expect(await sink.locate("lineage", "1")).toBe("memory://lineage_20260304T050607Z_1.json");
    expect(await sink.locate("lineage", "2")).toBeNull();
  });
});
