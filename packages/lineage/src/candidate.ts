/**
 * Candidate entries.
 *
 * A candidate is a complete LineageEntry built against the current chain
 * tip but not yet appended. Governance proposals carry one; the chain
 * manager re-stamps its id, timestamp, changes and hash when it appends.
 */

import type {
  Attestation,
  AttestationRef,
  Attribution,
  DaoApproval,
  HexHash,
  LineageChain,
  LineageEntry,
  RegistrySummary,
} from "@compliance-ledger/types";
import { classifyChanges } from "./changes.js";
import { computeEntryHash, lastEntry } from "./hash-chain.js";

export interface CandidateSource {
  readonly summary: RegistrySummary;

  /** "<standard>/<rule>" → rule root */
  readonly ruleRoots?: Readonly<Record<string, HexHash>>;

  readonly attestation: AttestationRef | null;
  readonly attribution: Attribution;
}

export function attestationRef(
  attestation: Attestation,
  attestationPath: string | null,
  snapshotRef: string | null,
): AttestationRef {
  return {
    algorithm: attestation.signature.algorithm,
    backend: attestation.signature.backend,
    message_hash: attestation.message_hash,
    signed_at: attestation.signed_at,
    attestation_path: attestationPath,
    snapshot_ref: snapshotRef,
  };
}

/**
 * Timestamp for an entry following `previous`: `now`, raised to 1 ms
 * after the predecessor when the clock has not moved past it.
 */
export function nextTimestamp(previous: LineageEntry | null, now: Date): string {
  if (previous !== null) {
    const prev = Date.parse(previous.timestamp);
    if (!Number.isNaN(prev) && now.getTime() <= prev) {
      return new Date(prev + 1).toISOString();
    }
  }
  return now.toISOString();
}

/**
 * Fill in position-dependent fields and the hash for an entry that
 * follows `previous`.
 */
export function sealEntry(
  base: LineageEntry,
  previous: LineageEntry | null,
  now: Date,
  daoApproval?: DaoApproval,
): LineageEntry {
  const { dao_approval: _dropped, ...rest } = base;
  const unsealed: LineageEntry = {
    ...rest,
    entry_id: (previous?.entry_id ?? 0) + 1,
    timestamp: nextTimestamp(previous, now),
    changes: classifyChanges(previous, base),
    chain: {
      previous_entry_id: previous?.entry_id ?? null,
      previous_merkle_root: previous?.global_merkle_root ?? null,
      entry_hash: "",
    },
    ...(daoApproval !== undefined ? { dao_approval: daoApproval } : {}),
  };

  return {
    ...unsealed,
    chain: { ...unsealed.chain, entry_hash: computeEntryHash(unsealed) },
  };
}

/**
 * Build the candidate that would follow the current tip of `chain`.
 */
export function buildCandidateEntry(
  chain: LineageChain,
  source: CandidateSource,
  now: Date = new Date(),
): LineageEntry {
  const { summary } = source;
  const base: LineageEntry = {
    entry_id: 0,
    timestamp: now.toISOString(),
    registry_version: summary.version,
    registry_generated_at: summary.generated_at,
    global_merkle_root: summary.global_merkle_root,
    compliance_score: summary.compliance_score,
    total_rules: summary.total_rules,
    total_manifestations: summary.total_manifestations,
    standard_merkle_roots: { ...summary.standard_merkle_roots },
    ...(source.ruleRoots !== undefined ? { rule_roots: { ...source.ruleRoots } } : {}),
    attestation: source.attestation,
    changes: classifyChanges(null, summary),
    attribution: source.attribution,
    chain: { previous_entry_id: null, previous_merkle_root: null, entry_hash: "" },
  };

  return sealEntry(base, lastEntry(chain), now);
}
