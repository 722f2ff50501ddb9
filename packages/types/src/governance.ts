/**
 * Governance Types
 *
 * Every governed lineage append is wrapped in a Proposal. Validators with
 * weighted voting power vote on it; the tally decides whether the
 * proposed entry is appended.
 *
 * Lifecycle:
 *   CREATED → VOTING → CLOSED → APPROVED | REJECTED
 *   APPROVED → EXECUTED | EXECUTION_FAILED
 */

import type { HexHash } from "./registry.js";
import type { ChangeType, LineageEntry } from "./lineage.js";

// =============================================================================
// Validators
// =============================================================================

export interface Validator {
  readonly id: string;
  readonly name: string;

  /** Non-negative voting weight */
  readonly voting_power: number;

  readonly active: boolean;
}

/**
 * The validator roster document.
 */
export interface ValidatorRosterDocument {
  readonly version: string;
  readonly validators: readonly Validator[];
}

// =============================================================================
// Proposal
// =============================================================================

export type VoteChoice = "yes" | "no" | "abstain";

export type ProposalStatus =
  | "CREATED"
  | "VOTING"
  | "CLOSED"
  | "APPROVED"
  | "REJECTED"
  | "EXECUTED"
  | "EXECUTION_FAILED";

export interface GovernanceParams {
  /** Fraction of total voting power that must participate, in (0, 1] */
  readonly quorum_ratio: number;

  /** Fraction of decisive (yes + no) weight that must vote yes, in (0, 1] */
  readonly approval_threshold_ratio: number;

  readonly voting_period_hours: number;
  readonly execution_delay_hours: number;

  /** Allow the proposed entry to repeat the tip's global root */
  readonly allow_duplicate: boolean;
}

/**
 * A referenced evidence document: where it lives and what it hashed to.
 */
export interface EvidenceRef {
  readonly path: string;
  readonly sha256: HexHash;
}

export interface ProposalEvidence {
  readonly registry: EvidenceRef;
  readonly attestation: EvidenceRef;

  /** Archived attestation snapshot, when archival is enabled */
  readonly snapshot: string | null;

  readonly lineage: {
    readonly path: string;
    readonly tip_entry_id: number | null;
    readonly tip_merkle_root: HexHash | null;
  };
}

export interface ProposalChangeSummary {
  readonly type: ChangeType;
  readonly description: string;
  readonly global_merkle_root: HexHash;
  readonly previous_merkle_root: HexHash | null;
  readonly compliance_score_delta: number;
  readonly rules_delta: number;
}

export type TallyRejectionReason = "quorum_not_reached" | "threshold_not_met";

export interface VoteTallies {
  readonly yes: number;
  readonly no: number;
  readonly abstain: number;
}

export interface TallyResult {
  readonly tallied_at: string;

  /** Weighted vote totals */
  readonly weights: VoteTallies;

  readonly total_voting_power: number;
  readonly participating_power: number;
  readonly participating_validators: number;
  readonly participation: number;
  readonly quorum_reached: boolean;
  readonly approval_ratio: number;
  readonly approved: boolean;
  readonly reason: TallyRejectionReason | null;
}

export interface ProposalVoting {
  readonly status: "pending" | "open" | "closed";
  readonly voting_start: string | null;
  readonly voting_end: string | null;
  readonly votes: Readonly<Record<string, VoteChoice>>;

  /** Vote counts (not weights) per choice */
  readonly tallies: VoteTallies;

  readonly result: TallyResult | null;
}

export interface ProposalExecution {
  readonly status: "pending" | "executed" | "failed";
  readonly executed_at: string | null;
  readonly result: string | null;

  /** entry_id of the appended entry */
  readonly entry_id: number | null;
}

export interface ProposalTransition {
  readonly from: ProposalStatus | null;
  readonly to: ProposalStatus;
  readonly at: string;
  readonly note?: string;
}

/**
 * The proposal document.
 */
export interface Proposal {
  readonly proposal_id: string;
  readonly title: string;
  readonly type: "lineage_update";
  readonly created_at: string;
  readonly status: ProposalStatus;
  readonly governance: GovernanceParams;
  readonly proposed_entry: LineageEntry;
  readonly evidence: ProposalEvidence;
  readonly change_summary: ProposalChangeSummary;
  readonly voting: ProposalVoting;
  readonly execution: ProposalExecution;
  readonly history: readonly ProposalTransition[];
}
