/**
 * Lineage Types
 *
 * The lineage is an append-only ledger of registry snapshots. Each entry
 * links to its predecessor by id and by global Merkle root, and carries
 * a hash over its own canonical content.
 */

import type { HexHash } from "./registry.js";

/**
 * How a snapshot differs from the previous entry.
 *
 * "mixed" covers snapshots that both add and remove rules.
 */
export type ChangeType =
  | "initial"
  | "expansion"
  | "reduction"
  | "modification"
  | "mixed"
  | "no_change";

export interface ChangeSummary {
  readonly type: ChangeType;
  readonly description: string;
  readonly rules_added: number;
  readonly rules_removed: number;
  readonly rules_modified: number;
  readonly files_added: number;
  readonly files_removed: number;
  readonly files_modified: number;
}

export interface Attribution {
  readonly actor: string;
  readonly event: string;

  /** External revision identifier (e.g. a commit id), when one is known */
  readonly commit_ref: string | null;
}

/**
 * Reference from an entry to the attestation of its registry snapshot.
 */
export interface AttestationRef {
  readonly algorithm: string;
  readonly backend: string;
  readonly message_hash: HexHash;
  readonly signed_at: string;

  /** Where the attestation document lives */
  readonly attestation_path: string | null;

  /** Archived copy, when the attestation was mirrored */
  readonly snapshot_ref: string | null;
}

export interface ChainLink {
  readonly previous_entry_id: number | null;
  readonly previous_merkle_root: HexHash | null;
  readonly entry_hash: HexHash;
}

/**
 * Stamped onto entries appended through governance.
 */
export interface DaoApproval {
  readonly proposal_id: string;
  readonly approved_at: string;
  readonly approval_ratio: number;

  /** Number of validators that cast a vote */
  readonly quorum: number;

  readonly governance_locked: true;
}

export interface LineageEntry {
  readonly entry_id: number;
  readonly timestamp: string;

  readonly registry_version: string;
  readonly registry_generated_at: string;
  readonly global_merkle_root: HexHash;
  readonly compliance_score: number;
  readonly total_rules: number;
  readonly total_manifestations: number;
  readonly standard_merkle_roots: Readonly<Record<string, HexHash>>;

  /** "<standard_id>/<rule_id>" → rule root */
  readonly rule_roots?: Readonly<Record<string, HexHash>>;

  readonly attestation: AttestationRef | null;
  readonly changes: ChangeSummary;
  readonly attribution: Attribution;
  readonly chain: ChainLink;
  readonly dao_approval?: DaoApproval;
}

export interface LineageMetadata {
  readonly version: string;
  readonly created_at: string;
  readonly chain_hash_algorithm: "SHA-256";
  readonly total_entries: number;
  readonly first_entry: string | null;
  readonly last_entry: string | null;
}

/**
 * The lineage ledger document.
 */
export interface LineageChain {
  readonly metadata: LineageMetadata;
  readonly entries: readonly LineageEntry[];
}

/**
 * Kinds of problems lineage verification reports.
 *
 * - hash_mismatch: stored entry_hash differs from the recomputed one
 * - linkage_broken: previous_entry_id / previous_merkle_root do not match the predecessor
 * - linkage_untrusted: links to a predecessor that is itself compromised
 * - sequence: entry_id is not its 1-based position
 * - chronology: timestamp is not strictly after the predecessor's
 * - metadata: chain metadata disagrees with the entries
 * - signature_invalid: the referenced attestation does not verify
 * - signature_unavailable: the referenced attestation could not be loaded
 */
export type LineageViolationKind =
  | "hash_mismatch"
  | "linkage_broken"
  | "linkage_untrusted"
  | "sequence"
  | "chronology"
  | "metadata"
  | "signature_invalid"
  | "signature_unavailable";

export interface LineageViolation {
  /** entry_id of the offending entry, null for chain-level problems */
  readonly entry_id: number | null;
  readonly kind: LineageViolationKind;
  readonly message: string;
}

export interface LineageReport {
  readonly valid: boolean;
  readonly total_entries: number;
  readonly violations: readonly LineageViolation[];
  readonly signatures: {
    readonly checked: number;
    readonly valid: number;
  };
  readonly verified_at: string;
}
