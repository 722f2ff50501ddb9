/**
 * Governance Proposal Lifecycle.
 *
 *   CREATED ─▶ VOTING ─▶ CLOSED ─▶ APPROVED ─▶ EXECUTED
 *                                │           └▶ EXECUTION_FAILED
 *                                └▶ REJECTED
 *
 * Design:
 * - Pure functions from proposal to proposal; persistence is the store's job
 * - Every transition is checked against VALID_TRANSITIONS and recorded in history
 * - A proposal is only created from evidence that matches the chain tip
 */

import {
  DuplicateStateError,
  EvidenceMissingError,
  GovernanceError,
  IntegrityError,
  errorMessage,
  isTerminalStatus,
} from "@compliance-ledger/types";
import type {
  GovernanceParams,
  LineageEntry,
  Proposal,
  ProposalStatus,
} from "@compliance-ledger/types";
import { computeEntryHash, lastEntry, verifyLineageChain } from "@compliance-ledger/lineage";
import type {
  CreateProposalInput,
  ProposalValidation,
  ValidationCheck,
  ValidationContext,
} from "./types.js";

const HOUR_MS = 3_600_000;

export const VALID_TRANSITIONS: Readonly<Record<ProposalStatus, readonly ProposalStatus[]>> = {
  CREATED: ["VOTING"],
  VOTING: ["CLOSED"],
  CLOSED: ["APPROVED", "REJECTED"],
  APPROVED: ["EXECUTED", "EXECUTION_FAILED"],
  REJECTED: [],
  EXECUTED: [],
  EXECUTION_FAILED: [],
};

export function canTransition(from: ProposalStatus, to: ProposalStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Move a proposal to `to`, recording the transition.
 *
 * @throws GovernanceError if the transition is not allowed
 */
export function transition(
  proposal: Proposal,
  to: ProposalStatus,
  at: string,
  note?: string,
): Proposal {
  if (!canTransition(proposal.status, to)) {
    throw new GovernanceError(
      `Proposal ${proposal.proposal_id} cannot move from ${proposal.status} to ${to}`,
      { proposal_id: proposal.proposal_id, from: proposal.status, to },
    );
  }
  return {
    ...proposal,
    status: to,
    history: [
      ...proposal.history,
      { from: proposal.status, to, at, ...(note !== undefined ? { note } : {}) },
    ],
  };
}

function isRatio(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value <= 1;
}

/**
 * @throws GovernanceError for any parameter out of range
 */
export function validateParams(params: GovernanceParams): void {
  if (!isRatio(params.quorum_ratio)) {
    throw new GovernanceError(`quorum_ratio must be in (0, 1], got ${params.quorum_ratio}`, {
      quorum_ratio: params.quorum_ratio,
    });
  }
  if (!isRatio(params.approval_threshold_ratio)) {
    throw new GovernanceError(
      `approval_threshold_ratio must be in (0, 1], got ${params.approval_threshold_ratio}`,
      { approval_threshold_ratio: params.approval_threshold_ratio },
    );
  }
  if (!Number.isFinite(params.voting_period_hours) || params.voting_period_hours <= 0) {
    throw new GovernanceError(
      `voting_period_hours must be positive, got ${params.voting_period_hours}`,
      { voting_period_hours: params.voting_period_hours },
    );
  }
  if (!Number.isFinite(params.execution_delay_hours) || params.execution_delay_hours < 0) {
    throw new GovernanceError(
      `execution_delay_hours must not be negative, got ${params.execution_delay_hours}`,
      { execution_delay_hours: params.execution_delay_hours },
    );
  }
}

/**
 * LINEAGE-UPDATE-<yyyymmdd>-<hhmmss>-<first 8 hex of the entry hash>
 */
export function proposalId(entry: LineageEntry, at: Date): string {
  const iso = at.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `LINEAGE-UPDATE-${date}-${time}-${entry.chain.entry_hash.slice(0, 8)}`;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Create a proposal for appending `input.entry`.
 *
 * @throws GovernanceError if a parameter is out of range
 * @throws EvidenceMissingError if the attestation or chain tip does not back the candidate
 * @throws IntegrityError if the candidate's hash does not recompute
 * @throws DuplicateStateError if the candidate repeats the tip's root without allow_duplicate
 */
export function createProposal(input: CreateProposalInput, now: Date = new Date()): Proposal {
  const { entry, params, evidence, attestation, chain } = input;
  validateParams(params);

  if (attestation === null) {
    throw new EvidenceMissingError(`Attestation ${evidence.attestation.path} not found`, {
      path: evidence.attestation.path,
    });
  }
  if (entry.attestation === null || entry.attestation.message_hash !== attestation.message_hash) {
    throw new EvidenceMissingError("Candidate entry does not reference the supplied attestation", {
      attestation_message_hash: attestation.message_hash,
      entry_message_hash: entry.attestation?.message_hash ?? null,
    });
  }
  if (attestation.payload.global_merkle_root !== entry.global_merkle_root) {
    throw new EvidenceMissingError(
      "Attestation global Merkle root does not match the candidate entry",
      {
        attestation_root: attestation.payload.global_merkle_root,
        entry_root: entry.global_merkle_root,
      },
    );
  }
  if (computeEntryHash(entry) !== entry.chain.entry_hash) {
    throw new IntegrityError("Candidate entry hash does not recompute", {
      entry_hash: entry.chain.entry_hash,
    });
  }

  const tip = lastEntry(chain);
  const tipId = tip?.entry_id ?? null;
  const tipRoot = tip?.global_merkle_root ?? null;
  if (
    entry.chain.previous_entry_id !== tipId ||
    entry.chain.previous_merkle_root !== tipRoot ||
    evidence.lineage.tip_entry_id !== tipId ||
    evidence.lineage.tip_merkle_root !== tipRoot
  ) {
    throw new EvidenceMissingError("Candidate entry does not reference the current chain tip", {
      tip_entry_id: tipId,
      candidate_previous_entry_id: entry.chain.previous_entry_id,
    });
  }
  if (tip !== null && tip.global_merkle_root === entry.global_merkle_root && !params.allow_duplicate) {
    throw new DuplicateStateError(
      `Global Merkle root ${entry.global_merkle_root} is already the lineage tip (entry ${tip.entry_id})`,
      { entry_id: tip.entry_id },
    );
  }

  const createdAt = now.toISOString();
  return {
    proposal_id: proposalId(entry, now),
    title: input.title ?? `Lineage update: ${entry.changes.description}`,
    type: "lineage_update",
    created_at: createdAt,
    status: "CREATED",
    governance: { ...params },
    proposed_entry: entry,
    evidence,
    change_summary: {
      type: entry.changes.type,
      description: entry.changes.description,
      global_merkle_root: entry.global_merkle_root,
      previous_merkle_root: tipRoot,
      compliance_score_delta: round4(entry.compliance_score - (tip?.compliance_score ?? 0)),
      rules_delta: entry.total_rules - (tip?.total_rules ?? 0),
    },
    voting: {
      status: "pending",
      voting_start: null,
      voting_end: null,
      votes: {},
      tallies: { yes: 0, no: 0, abstain: 0 },
      result: null,
    },
    execution: { status: "pending", executed_at: null, result: null, entry_id: null },
    history: [{ from: null, to: "CREATED", at: createdAt }],
  };
}

/**
 * CREATED → VOTING, opening the voting window at `now`.
 */
export function startVoting(proposal: Proposal, now: Date = new Date()): Proposal {
  const start = now.toISOString();
  const end = new Date(now.getTime() + proposal.governance.voting_period_hours * HOUR_MS);
  return {
    ...transition(proposal, "VOTING", start),
    voting: {
      ...proposal.voting,
      status: "open",
      voting_start: start,
      voting_end: end.toISOString(),
    },
  };
}

/**
 * Earliest time an approved proposal may execute, or null if not approved.
 */
export function executableAt(proposal: Proposal): Date | null {
  const result = proposal.voting.result;
  if (result === null || !result.approved) return null;
  const approvedAt = Date.parse(result.tallied_at);
  return new Date(approvedAt + proposal.governance.execution_delay_hours * HOUR_MS);
}

// =============================================================================
// Validation
// =============================================================================

function check(name: string, ok: boolean, pass: string, fail: string): ValidationCheck {
  return { name, ok, message: ok ? pass : fail };
}

/**
 * Re-check a proposal's evidence against the current state.
 */
export function validateProposal(
  proposal: Proposal,
  context: ValidationContext,
): ProposalValidation {
  const entry = proposal.proposed_entry;
  const checks: ValidationCheck[] = [];

  let paramsError: string | null = null;
  try {
    validateParams(proposal.governance);
  } catch (err) {
    paramsError = errorMessage(err);
  }
  checks.push(check("parameters", paramsError === null, "Governance parameters in range", paramsError ?? ""));

  checks.push(
    check(
      "entry_hash",
      computeEntryHash(entry) === entry.chain.entry_hash,
      "Proposed entry hash recomputes",
      "Proposed entry hash does not recompute",
    ),
  );

  const integrity = verifyLineageChain(context.chain);
  checks.push(
    check(
      "lineage",
      integrity.valid,
      `Lineage verifies (${integrity.total_entries} entries)`,
      `Lineage has ${integrity.violations.length} violation(s)`,
    ),
  );

  const tip = lastEntry(context.chain);
  if (isTerminalStatus(proposal.status)) {
    checks.push(check("chain_tip", true, `Proposal is ${proposal.status}; tip not rechecked`, ""));
  } else {
    checks.push(
      check(
        "chain_tip",
        entry.chain.previous_entry_id === (tip?.entry_id ?? null) &&
          entry.chain.previous_merkle_root === (tip?.global_merkle_root ?? null),
        "Proposed entry extends the current tip",
        `Chain tip is now entry ${String(tip?.entry_id ?? null)}; proposal was built on entry ${String(entry.chain.previous_entry_id)}`,
      ),
    );
  }

  const attestation = context.attestation;
  checks.push(
    check(
      "attestation",
      attestation !== null && attestation.message_hash === entry.attestation?.message_hash,
      "Attestation matches the proposed entry's reference",
      attestation === null
        ? `Attestation ${proposal.evidence.attestation.path} not found`
        : "Attestation is not the one the proposed entry references",
    ),
  );
  checks.push(
    check(
      "attestation_root",
      attestation !== null && attestation.payload.global_merkle_root === entry.global_merkle_root,
      "Attestation root matches the proposed root",
      "Attestation root does not match the proposed root",
    ),
  );
  checks.push(
    check(
      "registry_root",
      context.registry !== null && context.registry.global_merkle_root === entry.global_merkle_root,
      "Registry root matches the proposed root",
      context.registry === null
        ? `Registry ${proposal.evidence.registry.path} not found`
        : "Registry has changed since the proposal was created",
    ),
  );
  checks.push(
    check(
      "registry_digest",
      context.digests.registry === proposal.evidence.registry.sha256,
      "Registry file digest matches the evidence",
      "Registry file digest differs from the evidence",
    ),
  );
  checks.push(
    check(
      "attestation_digest",
      context.digests.attestation === proposal.evidence.attestation.sha256,
      "Attestation file digest matches the evidence",
      "Attestation file digest differs from the evidence",
    ),
  );

  return {
    proposal_id: proposal.proposal_id,
    status: proposal.status,
    valid: checks.every((c) => c.ok),
    checks,
  };
}
