/**
 * @compliance-ledger/types — Shared document types for the compliance ledger.
 *
 * - Registry snapshots (slots, rules, standards, global roots)
 * - Attestations over registry summaries
 * - Lineage entries and verification reports
 * - Governance proposals, validators and tallies
 * - The error taxonomy and the logger seam
 *
 * Design rules:
 * - All document types are immutable (readonly)
 * - No runtime dependencies
 * - Persisted field names are snake_case; the serialized form is the contract
 */

// Registry types
export type {
  HexHash,
  RuleStatus,
  ManifestationSlot,
  RuleInput,
  StandardInput,
  Rule,
  Standard,
  GlobalRegistry,
  RegistrySummary,
} from "./registry.js";

// Attestation types
export type {
  Attestation,
  AttestationSignature,
  AttestationPublicKey,
  AttestationFailureReason,
  AttestationVerification,
  ArchiveReceipt,
} from "./attestation.js";

// Lineage types
export type {
  ChangeType,
  ChangeSummary,
  Attribution,
  AttestationRef,
  ChainLink,
  DaoApproval,
  LineageEntry,
  LineageMetadata,
  LineageChain,
  LineageViolationKind,
  LineageViolation,
  LineageReport,
} from "./lineage.js";

// Governance types
export type {
  Validator,
  ValidatorRosterDocument,
  VoteChoice,
  ProposalStatus,
  GovernanceParams,
  EvidenceRef,
  ProposalEvidence,
  ProposalChangeSummary,
  TallyRejectionReason,
  VoteTallies,
  TallyResult,
  ProposalVoting,
  ProposalExecution,
  ProposalTransition,
  Proposal,
} from "./governance.js";

// Errors
export {
  LedgerError,
  EvidenceMissingError,
  DeterminismError,
  IntegrityError,
  DuplicateStateError,
  GovernanceError,
  ExecutionError,
  isLedgerError,
  errorMessage,
} from "./errors.js";
export type { LedgerErrorCode } from "./errors.js";

// Logging
export { silentLogger } from "./logger.js";
export type { LedgerLogger } from "./logger.js";

// Runtime type guards
export {
  isHexHash,
  isRuleStatus,
  isChangeType,
  isVoteChoice,
  isProposalStatus,
  isTerminalStatus,
} from "./guards.js";
