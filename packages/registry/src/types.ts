/**
 * Registry package types: tree proofs, slot layout, verification output.
 */

import type { HexHash } from "@compliance-ledger/types";

// =============================================================================
// Merkle
// =============================================================================

export interface MerkleProofStep {
  readonly hash: HexHash;

  /** Side of the sibling relative to the running hash */
  readonly direction: "left" | "right";
}

/**
 * Self-contained inclusion proof for one leaf.
 */
export interface MerkleProof {
  readonly leafHash: HexHash;
  readonly leafIndex: number;
  readonly siblings: readonly MerkleProofStep[];
  readonly root: HexHash;
}

// =============================================================================
// Slot layout
// =============================================================================

/**
 * The fixed, ordered slot roles every rule must declare.
 * The slot count is `roles.length`.
 */
export interface SlotLayout {
  readonly roles: readonly string[];
}

export const DEFAULT_SLOT_ROLES: readonly string[] = [
  "implementation",
  "policy",
  "contract",
  "interface",
];

export const DEFAULT_SLOT_LAYOUT: SlotLayout = { roles: DEFAULT_SLOT_ROLES };

// =============================================================================
// Verification
// =============================================================================

export type RegistryViolationKind =
  | "slot_hash"
  | "slot_count"
  | "slot_role"
  | "leaf_hashes"
  | "intermediate_hashes"
  | "rule_root"
  | "rule_status"
  | "standard_root"
  | "ordering"
  | "global_root"
  | "counts"
  | "compliance_score";

export interface RegistryViolation {
  readonly kind: RegistryViolationKind;

  /** "<standard>" or "<standard>/<rule>", null for registry-level problems */
  readonly location: string | null;

  readonly message: string;
  readonly expected?: string | number;
  readonly actual?: string | number;
}

export interface RegistryReport {
  readonly valid: boolean;
  readonly global_merkle_root: HexHash;
  readonly violations: readonly RegistryViolation[];
}

// =============================================================================
// Manifestation proof
// =============================================================================

/**
 * Proof that one slot hash is included in the global root:
 * slot → rule root → standard root → global root.
 */
export interface ManifestationProof {
  readonly standard_id: string;
  readonly rule_id: string;
  readonly role: string;
  readonly slot: MerkleProof;
  readonly rule: MerkleProof;
  readonly standard: MerkleProof;
  readonly global_merkle_root: HexHash;
}
