/**
 * Registry Types
 *
 * A registry is a point-in-time snapshot of every compliance rule's
 * manifestation artifacts, aggregated into Merkle roots:
 *
 *   slot hashes → rule root → standard root → global root
 *
 * Field names are snake_case because these shapes are persisted as
 * documents and hashed; the serialized form is the contract.
 */

/**
 * Lowercase hex SHA-256 digest (64 characters).
 */
export type HexHash = string;

/**
 * Coverage status of a rule, derived from its slots.
 * - compliant: every slot exists
 * - partial: some slots exist
 * - missing: no slot exists
 */
export type RuleStatus = "compliant" | "partial" | "missing";

/**
 * One manifestation artifact of a rule, as reported by a scanner.
 */
export interface ManifestationSlot {
  /** Slot role, e.g. "implementation", "policy", "contract", "interface" */
  readonly role: string;

  /** Path of the artifact, relative to the scanned root */
  readonly path: string;

  /** Content hash, or the missing-slot sentinel when the artifact is absent */
  readonly hash: HexHash;

  /** Whether the artifact was found */
  readonly exists: boolean;

  /** Artifact size in bytes (0 when absent) */
  readonly size?: number;
}

/**
 * Scanner output for one rule, before any hashing of the tree.
 */
export interface RuleInput {
  readonly rule_id: string;
  readonly name: string;
  readonly slots: readonly ManifestationSlot[];
}

/**
 * Scanner output for one standard.
 */
export interface StandardInput {
  readonly standard_id: string;
  readonly name: string;
  readonly rules: readonly RuleInput[];
}

/**
 * A rule with its Merkle tree computed.
 */
export interface Rule {
  readonly rule_id: string;
  readonly standard_id: string;
  readonly name: string;
  readonly slots: readonly ManifestationSlot[];

  /** Leaf values actually hashed (sentinel substituted for absent slots) */
  readonly leaf_hashes: readonly HexHash[];

  /** The level directly above the leaves */
  readonly intermediate_hashes: readonly HexHash[];

  readonly root_hash: HexHash;
  readonly status: RuleStatus;
}

/**
 * A standard with its rules in canonical (ascending rule_id) order.
 */
export interface Standard {
  readonly standard_id: string;
  readonly name: string;
  readonly rules: readonly Rule[];
  readonly merkle_root: HexHash;

  /** Existing slots / total slots within this standard */
  readonly compliance_score: number;
}

/**
 * A complete registry snapshot.
 */
export interface GlobalRegistry {
  readonly version: string;
  readonly generated_at: string;

  /** Standards in canonical (ascending standard_id) order */
  readonly standards: readonly Standard[];

  readonly standard_merkle_roots: Readonly<Record<string, HexHash>>;
  readonly global_merkle_root: HexHash;

  /** Existing slots / total slots across the registry */
  readonly compliance_score: number;

  readonly total_rules: number;
  readonly total_manifestations: number;
}

/**
 * The fixed field set that an attestation signs.
 */
export interface RegistrySummary {
  readonly global_merkle_root: HexHash;
  readonly standard_merkle_roots: Readonly<Record<string, HexHash>>;
  readonly total_rules: number;
  readonly total_manifestations: number;
  readonly compliance_score: number;
  readonly version: string;
  readonly generated_at: string;
}
