/**
 * Governance package types: inputs and reports of the proposal lifecycle
 * and the voting engine. Document types live in @compliance-ledger/types.
 */

import type {
  Attestation,
  GovernanceParams,
  HexHash,
  LineageChain,
  LineageEntry,
  Proposal,
  ProposalEvidence,
  ProposalStatus,
  RegistrySummary,
  TallyResult,
} from "@compliance-ledger/types";
import type { AppendResult } from "@compliance-ledger/lineage";

export interface CreateProposalInput {
  /** Candidate entry built against the current tip */
  readonly entry: LineageEntry;

  readonly params: GovernanceParams;
  readonly evidence: ProposalEvidence;

  /** The attestation the evidence points at, as loaded */
  readonly attestation: Attestation | null;

  /** The lineage as it is now */
  readonly chain: LineageChain;

  readonly title?: string;
}

/**
 * What a proposal is re-checked against by validateProposal.
 */
export interface ValidationContext {
  readonly chain: LineageChain;
  readonly attestation: Attestation | null;

  /** Current registry summary, when a registry document exists */
  readonly registry: RegistrySummary | null;

  /** Current SHA-256 of each evidence file; null when the file is gone */
  readonly digests: {
    readonly registry: HexHash | null;
    readonly attestation: HexHash | null;
  };
}

export interface ValidationCheck {
  readonly name: string;
  readonly ok: boolean;
  readonly message: string;
}

export interface ProposalValidation {
  readonly proposal_id: string;
  readonly status: ProposalStatus;
  readonly valid: boolean;
  readonly checks: readonly ValidationCheck[];
}

export interface TallyOptions {
  /** Tally before voting_end */
  readonly force?: boolean;

  /** Compute the outcome without recording it */
  readonly dryRun?: boolean;
}

export interface TallyOutcome {
  readonly proposal: Proposal;
  readonly result: TallyResult;
  readonly persisted: boolean;
}

export interface ExecuteOptions {
  /** Execute before the execution delay has elapsed */
  readonly force?: boolean;
}

export interface ExecutionOutcome {
  readonly proposal: Proposal;
  readonly append: AppendResult;
}
