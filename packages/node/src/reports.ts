/**
 * @compliance-ledger/node — Operation reports.
 *
 * Every operation yields one machine-readable report and an exit code:
 * 0 success or valid, 1 failure or violations, 2 configuration error.
 */

import type {
  ArchiveReceipt,
  AttestationVerification,
  HexHash,
  LineageEntry,
  LineageReport,
  Proposal,
  ProposalExecution,
  ProposalStatus,
  RuleStatus,
  TallyResult,
  VoteChoice,
  VoteTallies,
} from "@compliance-ledger/types";
import type { RegistryReport } from "@compliance-ledger/registry";
import type { ProposalValidation } from "@compliance-ledger/governance";

export type ExitCode = 0 | 1 | 2;

export interface BuildRegistryReport {
  readonly registry_path: string;
  readonly version: string;
  readonly generated_at: string;
  readonly global_merkle_root: HexHash;
  readonly compliance_score: number;
  readonly total_rules: number;
  readonly total_manifestations: number;
  readonly standards: readonly {
    readonly standard_id: string;
    readonly merkle_root: HexHash;
    readonly compliance_score: number;
    readonly rules: number;
  }[];
  readonly rule_status: Readonly<Record<RuleStatus, number>>;
}

export interface VerifyRegistryReport {
  readonly registry_path: string;
  readonly registry: RegistryReport;

  /** Present when signatures were checked */
  readonly attestation: AttestationVerification | null;
}

export interface SignRegistryReport {
  readonly attestation_path: string;
  readonly message_hash: HexHash;
  readonly algorithm: string;
  readonly backend: string;
  readonly signed_at: string;
  readonly snapshot: ArchiveReceipt | null;
}

export interface VerifySignatureReport {
  readonly attestation_path: string;
  readonly verification: AttestationVerification;
}

export interface ProposeUpdateReport {
  readonly proposal_id: string;
  readonly location: string;
  readonly proposal: Proposal;
}

export interface StartVotingReport {
  readonly proposal_id: string;
  readonly status: ProposalStatus;
  readonly voting_start: string | null;
  readonly voting_end: string | null;
}

export interface CastVoteReport {
  readonly proposal_id: string;
  readonly validator_id: string;
  readonly choice: VoteChoice;
  readonly tallies: VoteTallies;
}

export interface TallyReport {
  readonly proposal_id: string;
  readonly status: ProposalStatus;
  readonly dry_run: boolean;
  readonly result: TallyResult | null;

  /** When an approved proposal may execute; null unless approved */
  readonly executable_at: string | null;

  readonly execution: ProposalExecution;
}

export interface UpdateLineageReport {
  readonly dry_run: boolean;
  readonly entry: LineageEntry;
  readonly backup: string | null;
  readonly snapshot: ArchiveReceipt | null;
  readonly warnings: readonly string[];
}

export interface OperationReports {
  "build-registry": BuildRegistryReport;
  "verify-registry": VerifyRegistryReport;
  "sign-registry": SignRegistryReport;
  "verify-signature": VerifySignatureReport;
  "propose-update": ProposeUpdateReport;
  "validate-proposal": ProposalValidation;
  "start-voting": StartVotingReport;
  "cast-vote": CastVoteReport;
  tally: TallyReport;
  "verify-lineage": LineageReport;
  "update-lineage": UpdateLineageReport;
}

export type OperationName = keyof OperationReports;

export interface ErrorInfo {
  readonly name: string;
  readonly code: string;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>> | null;
}

export interface OperationResult<K extends OperationName = OperationName> {
  readonly operation: K;
  readonly ok: boolean;
  readonly exitCode: ExitCode;

  /** null when the operation failed with an error */
  readonly report: OperationReports[K] | null;
  readonly error: ErrorInfo | null;
}

/** Union of every operation's result, discriminated by `operation` */
export type AnyOperationResult = {
  [K in OperationName]: OperationResult<K>;
}[OperationName];
