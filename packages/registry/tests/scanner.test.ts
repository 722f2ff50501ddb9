/**
 * Tests for the file-backed manifestation scanner.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EvidenceMissingError } from "@compliance-ledger/types";
import { FileManifestationScanner } from "../src/scanner.js";
import type { ManifestationCatalog } from "../src/scanner.js";
import { MISSING_SLOT_HASH } from "../src/hashing.js";
import { buildRegistry } from "../src/builder.js";
import { sha256 } from "./fixtures.js";

const catalog: ManifestationCatalog = {
  version: "1",
  standards: [
    {
      standard_id: "SOC2",
      name: "SOC 2",
      rules: [
        {
          rule_id: "CC6.1",
          name: "Logical access",
          slots: {
            implementation: "src/access.ts",
            policy: "policies/access.json",
            contract: "contracts/access.json",
            interface: "docs/access.md",
          },
        },
      ],
    },
  ],
};

describe("FileManifestationScanner", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "ledger-scan-"));
    mkdirSync(join(root, "src"));
    mkdirSync(join(root, "policies"));
    writeFileSync(join(root, "src/access.ts"), "export const access = 1;\n");
    writeFileSync(join(root, "policies/access.json"), "{}");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("hashes present files and marks absent ones", async () => {
    const [standard] = await new FileManifestationScanner(catalog, root).scan();
    const slots = standard!.rules[0]!.slots;

    expect(slots.map((s) => s.role)).toEqual(["implementation", "policy", "contract", "interface"]);
    expect(slots[0]).toEqual({
      role: "implementation",
      path: "src/access.ts",
      hash: sha256("export const access = 1;\n"),
      exists: true,
      size: 25,
    });
    expect(slots[1]!.hash).toBe(sha256("{}"));
    expect(slots[2]).toEqual({
      role: "contract",
      path: "contracts/access.json",
      hash: MISSING_SLOT_HASH,
      exists: false,
      size: 0,
    });
  });

  it("feeds the builder", async () => {
    const inputs = await new FileManifestationScanner(catalog, root).scan();
    const registry = buildRegistry(inputs, { version: "1", generatedAt: "2026-01-01T00:00:00.000Z" });
    expect(registry.compliance_score).toBe(0.5);
    expect(registry.standards[0]!.rules[0]!.status).toBe("partial");
  });

  it("changes the root when a file changes", async () => {
    const scanner = new FileManifestationScanner(catalog, root);
    const before = buildRegistry(await scanner.scan(), { version: "1" });
    writeFileSync(join(root, "policies/access.json"), "{\"v\":2}");
    const after = buildRegistry(await scanner.scan(), { version: "1" });
    expect(after.global_merkle_root).not.toBe(before.global_merkle_root);
  });

  it("rejects a catalog rule that omits a role", async () => {
    const broken: ManifestationCatalog = {
      version: "1",
      standards: [
        {
          standard_id: "S",
          name: "S",
          rules: [{ rule_id: "R", name: "R", slots: { implementation: "a", policy: "b" } }],
        },
      ],
    };
    await expect(new FileManifestationScanner(broken, root).scan()).rejects.toThrow(
      EvidenceMissingError,
    );
  });

  it("rejects a catalog rule that declares an extra slot", async () => {
    const extra: ManifestationCatalog = {
      version: "1",
      standards: [
        {
          standard_id: "S",
          name: "S",
          rules: [
            {
              rule_id: "R",
              name: "R",
              slots: { implementation: "a", policy: "b", contract: "c", interface: "d", extra: "e" },
            },
          ],
        },
      ],
    };
    const scanner = new FileManifestationScanner(extra, root);
    await expect(scanner.scan()).rejects.toThrow(EvidenceMissingError);
    await expect(scanner.scan()).rejects.toThrow(
      "Catalog rule S/R declares 5 slots (expected 4: implementation, policy, contract, interface)",
    );
  });

  it("rejects a catalog rule whose roles do not match the layout", async () => {
    const renamed: ManifestationCatalog = {
      version: "1",
      standards: [
        {
          standard_id: "S",
          name: "S",
          rules: [
            {
              rule_id: "R",
              name: "R",
              slots: { implementation: "a", policy: "b", contract: "c", api: "d" },
            },
          ],
        },
      ],
    };
    await expect(new FileManifestationScanner(renamed, root).scan()).rejects.toThrow(
      EvidenceMissingError,
    );
  });
});
