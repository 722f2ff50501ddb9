/**
 * Registry Verification.
 *
 * Recomputes every root of a stored registry from its slot hashes and
 * compares against what was stored. Never throws on bad content; every
 * discrepancy becomes a violation. Recomputation carries upward from the
 * recomputed values, so a tampered slot shows at its rule, its standard
 * and the global root.
 */

import { isHexHash } from "@compliance-ledger/types";
import type { GlobalRegistry, Rule, Standard } from "@compliance-ledger/types";
import { compareIds, leafHash, ruleStatus } from "./builder.js";
import { MISSING_SLOT_HASH } from "./hashing.js";
import { MerkleTree } from "./merkle-tree.js";
import { DEFAULT_SLOT_LAYOUT } from "./types.js";
import type { RegistryReport, RegistryViolation, SlotLayout } from "./types.js";

function rootOf(leaves: readonly string[]): string {
  return MerkleTree.build(leaves).getRoot() ?? "";
}

function sameHashes(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((h, i) => h === b[i]);
}

function slotRatio(rules: readonly Rule[]): number {
  let total = 0;
  let existing = 0;
  for (const r of rules) {
    total += r.slots.length;
    existing += r.slots.filter((slot) => slot.exists).length;
  }
  return total === 0 ? 0 : existing / total;
}

function verifyRule(
  standardId: string,
  rule: Rule,
  layout: SlotLayout,
  violations: RegistryViolation[],
): string {
  const location = `${standardId}/${rule.rule_id}`;

  if (rule.slots.length !== layout.roles.length) {
    violations.push({
      kind: "slot_count",
      location,
      message: `Rule declares ${rule.slots.length} slots`,
      expected: layout.roles.length,
      actual: rule.slots.length,
    });
  }

  rule.slots.forEach((slot, i) => {
    const role = layout.roles[i];
    if (role !== undefined && slot.role !== role) {
      violations.push({
        kind: "slot_role",
        location,
        message: `Slot ${i} is "${slot.role}" where the layout expects "${role}"`,
        expected: role,
        actual: slot.role,
      });
    }
    if (slot.exists && !isHexHash(slot.hash)) {
      violations.push({
        kind: "slot_hash",
        location,
        message: `Slot ${i} ("${slot.role}") has a malformed content hash`,
        actual: slot.hash,
      });
    } else if (!slot.exists && slot.hash !== MISSING_SLOT_HASH) {
      violations.push({
        kind: "slot_hash",
        location,
        message: `Slot ${i} ("${slot.role}") is absent but does not carry the missing-slot hash`,
        expected: MISSING_SLOT_HASH,
        actual: slot.hash,
      });
    }
  });

  const leaves = rule.slots.map(leafHash);
  const tree = MerkleTree.build(leaves);
  if (!sameHashes(leaves, rule.leaf_hashes)) {
    violations.push({
      kind: "leaf_hashes",
      location,
      message: "leaf_hashes do not match the slots",
    });
  }
  if (!sameHashes(tree.getLevel(1), rule.intermediate_hashes)) {
    violations.push({
      kind: "intermediate_hashes",
      location,
      message: "intermediate_hashes do not match the slots",
    });
  }

  const root = tree.getRoot() ?? "";
  if (root !== rule.root_hash) {
    violations.push({
      kind: "rule_root",
      location,
      message: "Rule root does not match its slots",
      expected: root,
      actual: rule.root_hash,
    });
  }

  const status = ruleStatus(rule.slots);
  if (status !== rule.status) {
    violations.push({
      kind: "rule_status",
      location,
      message: "Rule status does not match slot existence",
      expected: status,
      actual: rule.status,
    });
  }

  return root;
}

function checkOrder(
  ids: readonly string[],
  location: string | null,
  violations: RegistryViolation[],
): void {
  for (let i = 1; i < ids.length; i++) {
    if (compareIds(ids[i - 1]!, ids[i]!) >= 0) {
      violations.push({
        kind: "ordering",
        location,
        message: `"${ids[i]}" is out of canonical order or duplicated`,
      });
    }
  }
}

function verifyStandard(
  registry: GlobalRegistry,
  standard: Standard,
  layout: SlotLayout,
  violations: RegistryViolation[],
): string {
  const location = standard.standard_id;
  checkOrder(standard.rules.map((r) => r.rule_id), location, violations);

  const recomputed = [...standard.rules]
    .sort((a, b) => compareIds(a.rule_id, b.rule_id))
    .map((rule) => verifyRule(location, rule, layout, violations));
  const root = rootOf(recomputed);

  if (root !== standard.merkle_root) {
    violations.push({
      kind: "standard_root",
      location,
      message: "Standard root does not match its rules",
      expected: root,
      actual: standard.merkle_root,
    });
  }
  const score = slotRatio(standard.rules);
  if (score !== standard.compliance_score) {
    violations.push({
      kind: "compliance_score",
      location,
      message: "Standard compliance_score does not match slot existence",
      expected: score,
      actual: standard.compliance_score,
    });
  }

  const mapped = registry.standard_merkle_roots[standard.standard_id];
  if (mapped !== root) {
    violations.push({
      kind: "standard_root",
      location,
      message: "standard_merkle_roots entry does not match the recomputed root",
      expected: root,
      actual: mapped ?? "(absent)",
    });
  }

  return root;
}

/**
 * Recompute and compare every root, count and score of a registry.
 */
export function verifyRegistry(
  registry: GlobalRegistry,
  layout: SlotLayout = DEFAULT_SLOT_LAYOUT,
): RegistryReport {
  const violations: RegistryViolation[] = [];

  checkOrder(registry.standards.map((s) => s.standard_id), null, violations);

  const known = new Set(registry.standards.map((s) => s.standard_id));
  for (const id of Object.keys(registry.standard_merkle_roots)) {
    if (!known.has(id)) {
      violations.push({
        kind: "standard_root",
        location: id,
        message: "standard_merkle_roots names a standard the registry does not contain",
      });
    }
  }

  const standardRoots = [...registry.standards]
    .sort((a, b) => compareIds(a.standard_id, b.standard_id))
    .map((s) => verifyStandard(registry, s, layout, violations));
  const globalRoot = rootOf(standardRoots);

  if (globalRoot !== registry.global_merkle_root) {
    violations.push({
      kind: "global_root",
      location: null,
      message: "Global root does not match the standards",
      expected: globalRoot,
      actual: registry.global_merkle_root,
    });
  }

  let rules = 0;
  let slots = 0;
  let existing = 0;
  for (const s of registry.standards) {
    rules += s.rules.length;
    for (const r of s.rules) {
      slots += r.slots.length;
      existing += r.slots.filter((slot) => slot.exists).length;
    }
  }

  if (rules !== registry.total_rules) {
    violations.push({
      kind: "counts",
      location: null,
      message: "total_rules does not match the rules present",
      expected: rules,
      actual: registry.total_rules,
    });
  }
  if (slots !== registry.total_manifestations) {
    violations.push({
      kind: "counts",
      location: null,
      message: "total_manifestations does not match the slots present",
      expected: slots,
      actual: registry.total_manifestations,
    });
  }

  const score = slots === 0 ? 0 : existing / slots;
  if (score !== registry.compliance_score) {
    violations.push({
      kind: "compliance_score",
      location: null,
      message: "compliance_score does not match slot existence",
      expected: score,
      actual: registry.compliance_score,
    });
  }

  return {
    valid: violations.length === 0,
    global_merkle_root: globalRoot,
    violations,
  };
}
