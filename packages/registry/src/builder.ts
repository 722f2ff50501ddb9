/**
 * Merkle Registry Builder.
 *
 * Turns scanner output into a GlobalRegistry:
 *
 *   slot hashes ──▶ rule root ──▶ standard root ──▶ global root
 *
 * Design:
 * - Every rule declares exactly the slots of the SlotLayout, in layout order
 * - Absent slots contribute MISSING_SLOT_HASH, whatever the scanner reported
 * - Rules are aggregated in ascending rule_id order, standards in ascending
 *   standard_id order (UTF-16 code unit comparison, locale independent)
 * - Aggregation refuses input that is not strictly ascending; duplicate
 *   ids cannot be ordered canonically
 * - Nothing here reads the clock except the default generated_at
 */

import {
  DeterminismError,
  EvidenceMissingError,
  isHexHash,
} from "@compliance-ledger/types";
import type {
  GlobalRegistry,
  ManifestationSlot,
  Rule,
  RuleInput,
  RuleStatus,
  Standard,
  StandardInput,
} from "@compliance-ledger/types";
import { MISSING_SLOT_HASH } from "./hashing.js";
import { MerkleTree } from "./merkle-tree.js";
import { DEFAULT_SLOT_LAYOUT } from "./types.js";
import type { SlotLayout } from "./types.js";

export interface BuildOptions {
  readonly version: string;
  readonly layout?: SlotLayout;

  /** ISO-8601 generation time; defaults to now */
  readonly generatedAt?: string;
}

// =============================================================================
// Ordering
// =============================================================================

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Merkle root over (id, root) pairs that must already be in strictly
 * ascending id order.
 *
 * @throws DeterminismError on out-of-order or duplicate ids, or no input
 */
export function aggregateRoots(
  scope: string,
  items: readonly { readonly id: string; readonly root: string }[],
): string {
  for (let i = 1; i < items.length; i++) {
    const prev = items[i - 1]!.id;
    const curr = items[i]!.id;
    if (compareIds(prev, curr) >= 0) {
      throw new DeterminismError(
        prev === curr
          ? `Duplicate id "${curr}" in ${scope}`
          : `Ids in ${scope} are not in ascending order: "${prev}" before "${curr}"`,
        { scope, id: curr },
      );
    }
  }

  const root = MerkleTree.build(items.map((i) => i.root)).getRoot();
  if (root === null) {
    throw new DeterminismError(`Nothing to aggregate in ${scope}`, { scope });
  }
  return root;
}

// =============================================================================
// Rules
// =============================================================================

export function leafHash(slot: Pick<ManifestationSlot, "exists" | "hash">): string {
  return slot.exists ? slot.hash : MISSING_SLOT_HASH;
}

export function ruleStatus(slots: readonly Pick<ManifestationSlot, "exists">[]): RuleStatus {
  const existing = slots.filter((s) => s.exists).length;
  if (existing === slots.length) return "compliant";
  if (existing === 0) return "missing";
  return "partial";
}

/**
 * Compute one rule's tree.
 *
 * @throws EvidenceMissingError when the slots do not match the layout
 */
export function buildRule(
  standardId: string,
  input: RuleInput,
  layout: SlotLayout = DEFAULT_SLOT_LAYOUT,
): Rule {
  const where = `${standardId}/${input.rule_id}`;

  if (input.slots.length !== layout.roles.length) {
    throw new EvidenceMissingError(
      `Rule ${where} declares ${input.slots.length} slots, expected ${layout.roles.length}`,
      { rule: where, declared: input.slots.length, expected: layout.roles.length },
    );
  }

  const slots = input.slots.map((slot, i): ManifestationSlot => {
    const role = layout.roles[i]!;
    if (slot.role !== role) {
      throw new EvidenceMissingError(
        `Rule ${where} slot ${i} is "${slot.role}", expected "${role}"`,
        { rule: where, slot: i },
      );
    }
    if (slot.exists && !isHexHash(slot.hash)) {
      throw new EvidenceMissingError(
        `Rule ${where} slot "${role}" exists but has no valid content hash`,
        { rule: where, role },
      );
    }
    return slot.exists
      ? { ...slot }
      : { role: slot.role, path: slot.path, hash: MISSING_SLOT_HASH, exists: false, size: 0 };
  });

  const leaves = slots.map(leafHash);
  const tree = MerkleTree.build(leaves);
  const root = tree.getRoot();
  if (root === null) {
    throw new EvidenceMissingError(`Rule ${where} has no slots`, { rule: where });
  }

  return {
    rule_id: input.rule_id,
    standard_id: standardId,
    name: input.name,
    slots,
    leaf_hashes: leaves,
    intermediate_hashes: tree.getLevel(1),
    root_hash: root,
    status: ruleStatus(slots),
  };
}

// =============================================================================
// Standards and registry
// =============================================================================

function ratio(existing: number, total: number): number {
  return total === 0 ? 0 : existing / total;
}

function countSlots(rules: readonly Rule[]): { existing: number; total: number } {
  let existing = 0;
  let total = 0;
  for (const rule of rules) {
    for (const slot of rule.slots) {
      total++;
      if (slot.exists) existing++;
    }
  }
  return { existing, total };
}

export function buildStandard(
  input: StandardInput,
  layout: SlotLayout = DEFAULT_SLOT_LAYOUT,
): Standard {
  if (input.rules.length === 0) {
    throw new EvidenceMissingError(`Standard ${input.standard_id} has no rules`, {
      standard: input.standard_id,
    });
  }

  const rules = [...input.rules]
    .sort((a, b) => compareIds(a.rule_id, b.rule_id))
    .map((r) => buildRule(input.standard_id, r, layout));

  const merkleRoot = aggregateRoots(
    `standard ${input.standard_id}`,
    rules.map((r) => ({ id: r.rule_id, root: r.root_hash })),
  );
  const { existing, total } = countSlots(rules);

  return {
    standard_id: input.standard_id,
    name: input.name,
    rules,
    merkle_root: merkleRoot,
    compliance_score: ratio(existing, total),
  };
}

/**
 * Build a full registry snapshot from scanner output.
 *
 * @throws EvidenceMissingError on missing or mis-shaped slots
 * @throws DeterminismError on duplicate rule or standard ids
 */
export function buildRegistry(
  inputs: readonly StandardInput[],
  options: BuildOptions,
): GlobalRegistry {
  const layout = options.layout ?? DEFAULT_SLOT_LAYOUT;

  if (inputs.length === 0) {
    throw new EvidenceMissingError("Registry has no standards");
  }

  const standards = [...inputs]
    .sort((a, b) => compareIds(a.standard_id, b.standard_id))
    .map((s) => buildStandard(s, layout));

  const globalRoot = aggregateRoots(
    "registry",
    standards.map((s) => ({ id: s.standard_id, root: s.merkle_root })),
  );

  const standardRoots: Record<string, string> = {};
  let totalRules = 0;
  let existing = 0;
  let total = 0;
  for (const s of standards) {
    standardRoots[s.standard_id] = s.merkle_root;
    totalRules += s.rules.length;
    const counts = countSlots(s.rules);
    existing += counts.existing;
    total += counts.total;
  }

  return {
    version: options.version,
    generated_at: options.generatedAt ?? new Date().toISOString(),
    standards,
    standard_merkle_roots: standardRoots,
    global_merkle_root: globalRoot,
    compliance_score: ratio(existing, total),
    total_rules: totalRules,
    total_manifestations: total,
  };
}
