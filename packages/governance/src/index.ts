/**
 * @compliance-ledger/governance — Proposal Lifecycle and Voting & Tally Engine.
 *
 * Governed lineage appends: proposals backed by attestation evidence,
 * weighted validator votes, quorum and threshold tally, and execution
 * through the lineage chain manager.
 */

export {
  VALID_TRANSITIONS,
  canTransition,
  transition,
  validateParams,
  proposalId,
  createProposal,
  startVoting,
  executableAt,
  validateProposal,
} from "./lifecycle.js";
export { computeTally, countVotes, roundRatio } from "./tally.js";
export { VotingEngine } from "./voting-engine.js";
export type { VotingEngineOptions } from "./voting-engine.js";
export { ValidatorRoster, ValidatorRosterSchema, ValidatorSchema } from "./validators.js";
export { InMemoryProposalStore, FileProposalStore } from "./proposal-store.js";
export type { ProposalStore, ProposalUpdate, FileProposalStoreOptions } from "./proposal-store.js";
export { ProposalSchema } from "./schema.js";
export type {
  CreateProposalInput,
  ValidationContext,
  ValidationCheck,
  ProposalValidation,
  TallyOptions,
  TallyOutcome,
  ExecuteOptions,
  ExecutionOutcome,
} from "./types.js";
