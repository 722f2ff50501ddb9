/**
 * Manifestation inclusion proofs.
 *
 * Chains three binary Merkle proofs so a single slot hash can be shown
 * to be part of the global root without the rest of the registry:
 *
 *   slot ──▶ rule root ──▶ standard root ──▶ global root
 */

import { EvidenceMissingError, IntegrityError } from "@compliance-ledger/types";
import type { GlobalRegistry } from "@compliance-ledger/types";
import { leafHash } from "./builder.js";
import { MerkleTree } from "./merkle-tree.js";
import type { ManifestationProof, MerkleProof } from "./types.js";

function proofAt(
  leaves: readonly string[],
  index: number,
  expectedRoot: string,
  where: string,
): MerkleProof {
  const proof = MerkleTree.build(leaves).getProof(index);
  if (proof === null || proof.root !== expectedRoot) {
    throw new IntegrityError(`Stored root of ${where} does not match its children`, {
      location: where,
    });
  }
  return proof;
}

/**
 * Build the proof for one slot of one rule.
 *
 * @throws EvidenceMissingError if the standard, rule or role is unknown
 * @throws IntegrityError if a stored root disagrees with its children
 */
export function proveManifestation(
  registry: GlobalRegistry,
  standardId: string,
  ruleId: string,
  role: string,
): ManifestationProof {
  const standardIndex = registry.standards.findIndex((s) => s.standard_id === standardId);
  const standard = registry.standards[standardIndex];
  if (standard === undefined) {
    throw new EvidenceMissingError(`Unknown standard: ${standardId}`, { standard: standardId });
  }

  const ruleIndex = standard.rules.findIndex((r) => r.rule_id === ruleId);
  const rule = standard.rules[ruleIndex];
  if (rule === undefined) {
    throw new EvidenceMissingError(`Unknown rule: ${standardId}/${ruleId}`, {
      standard: standardId,
      rule: ruleId,
    });
  }

  const slotIndex = rule.slots.findIndex((s) => s.role === role);
  if (slotIndex < 0) {
    throw new EvidenceMissingError(`Rule ${standardId}/${ruleId} has no "${role}" slot`, {
      standard: standardId,
      rule: ruleId,
      role,
    });
  }

  return {
    standard_id: standardId,
    rule_id: ruleId,
    role,
    slot: proofAt(rule.slots.map(leafHash), slotIndex, rule.root_hash, `${standardId}/${ruleId}`),
    rule: proofAt(
      standard.rules.map((r) => r.root_hash),
      ruleIndex,
      standard.merkle_root,
      standardId,
    ),
    standard: proofAt(
      registry.standards.map((s) => s.merkle_root),
      standardIndex,
      registry.global_merkle_root,
      "registry",
    ),
    global_merkle_root: registry.global_merkle_root,
  };
}

/**
 * Check a manifestation proof without the registry.
 */
export function verifyManifestationProof(proof: ManifestationProof): boolean {
  return (
    MerkleTree.verifyProof(proof.slot) &&
    MerkleTree.verifyProof(proof.rule) &&
    MerkleTree.verifyProof(proof.standard) &&
    proof.slot.root === proof.rule.leafHash &&
    proof.rule.root === proof.standard.leafHash &&
    proof.standard.root === proof.global_merkle_root
  );
}
