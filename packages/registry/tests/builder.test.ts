/**
 * Tests for the Merkle registry builder.
 */

import { describe, it, expect } from "vitest";
import { DeterminismError, EvidenceMissingError } from "@compliance-ledger/types";
import {
  aggregateRoots,
  buildRegistry,
  buildRule,
  buildStandard,
  ruleStatus,
} from "../src/builder.js";
import { MISSING_SLOT_HASH } from "../src/hashing.js";
import { summarizeRegistry, ruleRoots } from "../src/summary.js";
import { GENERATED_AT, SAMPLE, rule, sha256, slot, standard } from "./fixtures.js";

// =============================================================================
// Rules
// =============================================================================

describe("buildRule", () => {
  it("computes root as H(H(s0+s1) + H(s2+s3))", () => {
    const r = buildRule("STD", rule("R1"));
    const [s0, s1, s2, s3] = [
      sha256("R1-implementation"),
      sha256("R1-policy"),
      sha256("R1-contract"),
      sha256("R1-interface"),
    ];
    const left = sha256(s0 + s1);
    const right = sha256(s2 + s3);

    expect(r.leaf_hashes).toEqual([s0, s1, s2, s3]);
    expect(r.intermediate_hashes).toEqual([left, right]);
    expect(r.root_hash).toBe(sha256(left + right));
    expect(r.standard_id).toBe("STD");
    expect(r.status).toBe("compliant");
  });

  it("substitutes the missing-slot hash for absent slots", () => {
    const r = buildRule("STD", rule("R1", ["policy"]));
    expect(r.leaf_hashes[1]).toBe(MISSING_SLOT_HASH);
    expect(r.slots[1]!.hash).toBe(MISSING_SLOT_HASH);
    expect(r.slots[1]!.size).toBe(0);
    expect(r.status).toBe("partial");
  });

  it("ignores whatever hash the scanner gave an absent slot", () => {
    const input = rule("R1", ["policy"]);
    const withJunk = {
      ...input,
      slots: input.slots.map((s) => (s.exists ? s : { ...s, hash: sha256("junk") })),
    };
    expect(buildRule("STD", withJunk).root_hash).toBe(buildRule("STD", input).root_hash);
  });

  it("MISSING_SLOT_HASH is SHA-256 of the string MISSING", () => {
    expect(MISSING_SLOT_HASH).toBe(sha256("MISSING"));
  });

  it("rejects a rule with too few slots", () => {
    const input = rule("R1");
    expect(() => buildRule("STD", { ...input, slots: input.slots.slice(0, 3) })).toThrow(
      EvidenceMissingError,
    );
  });

  it("rejects a rule with too many slots", () => {
    const input = rule("R1");
    const slots = [...input.slots, slot("extra", "x")];
    expect(() => buildRule("STD", { ...input, slots })).toThrow(EvidenceMissingError);
  });

  it("rejects slots out of layout order", () => {
    const input = rule("R1");
    const slots = [input.slots[1]!, input.slots[0]!, input.slots[2]!, input.slots[3]!];
    expect(() => buildRule("STD", { ...input, slots })).toThrow(/slot 0 is "policy"/);
  });

  it("rejects an existing slot without a valid hash", () => {
    const input = rule("R1");
    const slots = input.slots.map((s, i) => (i === 2 ? { ...s, hash: "not-a-hash" } : s));
    expect(() => buildRule("STD", { ...input, slots })).toThrow(EvidenceMissingError);
  });

  it("honours a custom layout with an odd slot count", () => {
    const layout = { roles: ["a", "b", "c"] };
    const input = {
      rule_id: "R",
      name: "R",
      slots: [slot("a", "1"), slot("b", "2"), slot("c", "3")],
    };
    const r = buildRule("STD", input, layout);
    const h01 = sha256(sha256("1") + sha256("2"));
    const h22 = sha256(sha256("3") + sha256("3"));
    expect(r.root_hash).toBe(sha256(h01 + h22));
  });
});

describe("ruleStatus", () => {
  it("classifies by existing slot count", () => {
    expect(ruleStatus([{ exists: true }, { exists: true }])).toBe("compliant");
    expect(ruleStatus([{ exists: true }, { exists: false }])).toBe("partial");
    expect(ruleStatus([{ exists: false }, { exists: false }])).toBe("missing");
  });
});

// =============================================================================
// Aggregation
// =============================================================================

describe("aggregateRoots", () => {
  it("refuses unsorted input", () => {
    expect(() =>
      aggregateRoots("test", [
        { id: "b", root: sha256("b") },
        { id: "a", root: sha256("a") },
      ]),
    ).toThrow(DeterminismError);
  });

  it("refuses duplicate ids", () => {
    expect(() =>
      aggregateRoots("test", [
        { id: "a", root: sha256("a") },
        { id: "a", root: sha256("a2") },
      ]),
    ).toThrow(/Duplicate id "a"/);
  });

  it("refuses empty input", () => {
    expect(() => aggregateRoots("test", [])).toThrow(DeterminismError);
  });
});

describe("buildStandard", () => {
  it("sorts rules by rule_id before aggregating", () => {
    const a = buildStandard(standard("S", [rule("R2"), rule("R1")]));
    const b = buildStandard(standard("S", [rule("R1"), rule("R2")]));
    expect(a.rules.map((r) => r.rule_id)).toEqual(["R1", "R2"]);
    expect(a.merkle_root).toBe(b.merkle_root);
    expect(a.merkle_root).toBe(sha256(a.rules[0]!.root_hash + a.rules[1]!.root_hash));
  });

  it("uses code-unit order, not numeric order", () => {
    const s = buildStandard(standard("S", [rule("R10"), rule("R9"), rule("R2")]));
    expect(s.rules.map((r) => r.rule_id)).toEqual(["R10", "R2", "R9"]);
  });

  it("rejects duplicate rule ids", () => {
    expect(() => buildStandard(standard("S", [rule("R1"), rule("R1")]))).toThrow(
      DeterminismError,
    );
  });

  it("rejects a standard with no rules", () => {
    expect(() => buildStandard(standard("S", []))).toThrow(EvidenceMissingError);
  });

  it("scores existing slots over total slots", () => {
    const s = buildStandard(standard("S", [rule("R1"), rule("R2", ["policy", "contract"])]));
    expect(s.compliance_score).toBe(6 / 8);
  });
});

// =============================================================================
// Registry
// =============================================================================

describe("buildRegistry", () => {
  const registry = buildRegistry(SAMPLE, { version: "1.0.0", generatedAt: GENERATED_AT });

  it("orders standards by standard_id", () => {
    expect(registry.standards.map((s) => s.standard_id)).toEqual(["GDPR", "SOC2"]);
    expect(registry.standards[0]!.rules.map((r) => r.rule_id)).toEqual([
      "ART-30",
      "ART-32",
      "ART-5",
    ]);
  });

  it("aggregates standard roots into the global root", () => {
    const gdpr = registry.standards[0]!.merkle_root;
    const soc2 = registry.standards[1]!.merkle_root;
    expect(registry.global_merkle_root).toBe(sha256(gdpr + soc2));
    expect(registry.standard_merkle_roots).toEqual({ GDPR: gdpr, SOC2: soc2 });
  });

  it("counts rules and manifestations", () => {
    expect(registry.total_rules).toBe(5);
    expect(registry.total_manifestations).toBe(20);
    expect(registry.compliance_score).toBe(15 / 20);
    expect(registry.standards[1]!.compliance_score).toBe(7 / 8);
  });

  it("records version and generation time", () => {
    expect(registry.version).toBe("1.0.0");
    expect(registry.generated_at).toBe(GENERATED_AT);
  });

  it("records per-rule status", () => {
    const gdpr = registry.standards[0]!;
    expect(gdpr.rules.map((r) => r.status)).toEqual(["missing", "compliant", "compliant"]);
  });

  it("rejects an empty registry", () => {
    expect(() => buildRegistry([], { version: "1" })).toThrow(EvidenceMissingError);
  });

  it("rejects duplicate standard ids", () => {
    expect(() =>
      buildRegistry([standard("S", [rule("R1")]), standard("S", [rule("R2")])], {
        version: "1",
      }),
    ).toThrow(DeterminismError);
  });

  it("roots do not depend on generation time or input order", () => {
    const other = buildRegistry([...SAMPLE].reverse(), {
      version: "1.0.0",
      generatedAt: "2030-06-01T00:00:00.000Z",
    });
    expect(other.global_merkle_root).toBe(registry.global_merkle_root);
  });
});

// =============================================================================
// Summary projections
// =============================================================================

describe("summarizeRegistry", () => {
  it("keeps exactly the signed field set", () => {
    const registry = buildRegistry(SAMPLE, { version: "2.0.0", generatedAt: GENERATED_AT });
    const summary = summarizeRegistry(registry);
    expect(Object.keys(summary).sort()).toEqual([
      "compliance_score",
      "generated_at",
      "global_merkle_root",
      "standard_merkle_roots",
      "total_manifestations",
      "total_rules",
      "version",
    ]);
    expect(summary.global_merkle_root).toBe(registry.global_merkle_root);
  });
});

describe("ruleRoots", () => {
  it("keys every rule by standard and rule id", () => {
    const registry = buildRegistry(SAMPLE, { version: "1", generatedAt: GENERATED_AT });
    const roots = ruleRoots(registry);
    expect(Object.keys(roots)).toEqual([
      "GDPR/ART-30",
      "GDPR/ART-32",
      "GDPR/ART-5",
      "SOC2/CC6.1",
      "SOC2/CC6.2",
    ]);
    expect(roots["SOC2/CC6.1"]).toBe(registry.standards[1]!.rules[0]!.root_hash);
  });
});
