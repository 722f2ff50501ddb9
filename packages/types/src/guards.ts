/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger primitives. Whole documents are
 * validated with schemas at the I/O boundary; these cover the small
 * values that arrive from arguments and scanners.
 */

import type { HexHash, RuleStatus } from "./registry.js";
import type { ChangeType } from "./lineage.js";
import type { ProposalStatus, VoteChoice } from "./governance.js";

const HEX_HASH = /^[0-9a-f]{64}$/;

export function isHexHash(value: unknown): value is HexHash {
  return typeof value === "string" && HEX_HASH.test(value);
}

const RULE_STATUSES = new Set<string>(["compliant", "partial", "missing"]);

export function isRuleStatus(value: unknown): value is RuleStatus {
  return typeof value === "string" && RULE_STATUSES.has(value);
}

const CHANGE_TYPES = new Set<string>([
  "initial", "expansion", "reduction", "modification", "mixed", "no_change",
]);

export function isChangeType(value: unknown): value is ChangeType {
  return typeof value === "string" && CHANGE_TYPES.has(value);
}

const VOTE_CHOICES = new Set<string>(["yes", "no", "abstain"]);

export function isVoteChoice(value: unknown): value is VoteChoice {
  return typeof value === "string" && VOTE_CHOICES.has(value);
}

const PROPOSAL_STATUSES = new Set<string>([
  "CREATED", "VOTING", "CLOSED", "APPROVED", "REJECTED", "EXECUTED", "EXECUTION_FAILED",
]);

export function isProposalStatus(value: unknown): value is ProposalStatus {
  return typeof value === "string" && PROPOSAL_STATUSES.has(value);
}

const TERMINAL_STATUSES = new Set<string>(["REJECTED", "EXECUTED", "EXECUTION_FAILED"]);

export function isTerminalStatus(status: ProposalStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
