/**
 * Voting & Tally Engine.
 *
 * Drives proposals through the store: creation, opening the vote,
 * casting votes, tallying and execution. Every mutation of a proposal
 * happens inside ProposalStore.update, which serializes work on one
 * proposal while leaving others independent.
 *
 * Execution appends through the LineageChainManager, which takes the
 * lineage lock and refuses a stale candidate; a refused append marks the
 * proposal EXECUTION_FAILED and leaves the chain untouched.
 */

import {
  EvidenceMissingError,
  ExecutionError,
  GovernanceError,
  errorMessage,
  isVoteChoice,
  silentLogger,
} from "@compliance-ledger/types";
import type {
  DaoApproval,
  LedgerLogger,
  Proposal,
  TallyResult,
  VoteChoice,
} from "@compliance-ledger/types";
import type { AppendResult, LineageChainManager } from "@compliance-ledger/lineage";
import { createProposal, executableAt, startVoting, transition } from "./lifecycle.js";
import type { ProposalStore } from "./proposal-store.js";
import { computeTally, countVotes } from "./tally.js";
import type {
  CreateProposalInput,
  ExecuteOptions,
  ExecutionOutcome,
  TallyOptions,
  TallyOutcome,
} from "./types.js";
import type { ValidatorRoster } from "./validators.js";

export interface VotingEngineOptions {
  readonly logger?: LedgerLogger;
  readonly clock?: () => Date;
}

export class VotingEngine {
  private readonly store: ProposalStore;
  private readonly roster: ValidatorRoster;
  private readonly lineage: LineageChainManager;
  private readonly logger: LedgerLogger;
  private readonly clock: () => Date;

  constructor(
    store: ProposalStore,
    roster: ValidatorRoster,
    lineage: LineageChainManager,
    options: VotingEngineOptions = {},
  ) {
    this.store = store;
    this.roster = roster;
    this.lineage = lineage;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async get(proposalId: string): Promise<Proposal> {
    const proposal = await this.store.get(proposalId);
    if (proposal === null) {
      throw new EvidenceMissingError(`Proposal ${proposalId} not found`, { proposal_id: proposalId });
    }
    return proposal;
  }

  list(): Promise<Proposal[]> {
    return this.store.list();
  }

  async create(input: CreateProposalInput): Promise<Proposal> {
    const proposal = createProposal(input, this.clock());
    await this.store.create(proposal);
    this.logger.info(
      {
        proposal_id: proposal.proposal_id,
        change_type: proposal.change_summary.type,
        global_merkle_root: proposal.change_summary.global_merkle_root,
      },
      "proposal created",
    );
    return proposal;
  }

  async startVoting(proposalId: string): Promise<Proposal> {
    const proposal = await this.store.update(proposalId, async (current) =>
      startVoting(current, this.clock()),
    );
    this.logger.info(
      { proposal_id: proposalId, voting_end: proposal.voting.voting_end },
      "proposal voting started",
    );
    return proposal;
  }

  /**
   * Record a validator's vote; a later vote replaces an earlier one.
   *
   * @throws GovernanceError if voting is not open, the validator is unknown
   *   or inactive, or the choice is not yes/no/abstain
   */
  async castVote(proposalId: string, validatorId: string, choice: string): Promise<Proposal> {
    if (!isVoteChoice(choice)) {
      throw new GovernanceError(`Invalid vote choice "${choice}"`, { choice });
    }
    const vote: VoteChoice = choice;
    const validator = this.roster.get(validatorId);
    if (validator === undefined) {
      throw new GovernanceError(`Unknown validator "${validatorId}"`, { validator_id: validatorId });
    }
    if (!validator.active) {
      throw new GovernanceError(`Validator "${validatorId}" is inactive`, {
        validator_id: validatorId,
      });
    }

    const replaced: { choice: VoteChoice | null } = { choice: null };
    const proposal = await this.store.update(proposalId, async (current) => {
      const now = this.clock();
      if (current.status !== "VOTING") {
        throw new GovernanceError(`Proposal ${proposalId} is ${current.status}, not VOTING`, {
          proposal_id: proposalId,
          status: current.status,
        });
      }
      const end = current.voting.voting_end;
      if (end === null || now.getTime() >= Date.parse(end)) {
        throw new GovernanceError(`Voting on ${proposalId} closed at ${String(end)}`, {
          proposal_id: proposalId,
          voting_end: end,
        });
      }

      replaced.choice = current.voting.votes[validatorId] ?? null;
      const votes = { ...current.voting.votes, [validatorId]: vote };
      return {
        ...current,
        voting: { ...current.voting, votes, tallies: countVotes(votes) },
      };
    });

    this.logger.info(
      { proposal_id: proposalId, validator_id: validatorId, choice: vote, replaced: replaced.choice },
      "vote cast",
    );
    return proposal;
  }

  /**
   * Close voting and decide: VOTING → CLOSED → APPROVED | REJECTED.
   *
   * @throws GovernanceError if the proposal is not VOTING, or voting is
   *   still open and `force` is not set
   */
  async tally(proposalId: string, options: TallyOptions = {}): Promise<TallyOutcome> {
    const decide = (current: Proposal): { proposal: Proposal; outcome: TallyResult } => {
      const now = this.clock();
      if (current.status !== "VOTING") {
        throw new GovernanceError(`Proposal ${proposalId} is ${current.status}, not VOTING`, {
          proposal_id: proposalId,
          status: current.status,
        });
      }
      const end = current.voting.voting_end;
      if (options.force !== true && end !== null && now.getTime() < Date.parse(end)) {
        throw new GovernanceError(`Voting on ${proposalId} is open until ${end}`, {
          proposal_id: proposalId,
          voting_end: end,
        });
      }

      const at = now.toISOString();
      const result = computeTally(current, this.roster, at);
      const closed = transition(current, "CLOSED", at, options.force === true ? "forced" : undefined);
      const decided = transition(
        closed,
        result.approved ? "APPROVED" : "REJECTED",
        at,
        result.reason ?? undefined,
      );
      return {
        proposal: { ...decided, voting: { ...decided.voting, status: "closed", result } },
        outcome: result,
      };
    };

    if (options.dryRun === true) {
      const { proposal, outcome } = decide(await this.get(proposalId));
      return { proposal, result: outcome, persisted: false };
    }

    const proposal = await this.store.update(proposalId, async (current) => decide(current).proposal);
    const result = proposal.voting.result;
    if (result === null) {
      throw new GovernanceError(`Proposal ${proposalId} has no tally result`, { proposal_id: proposalId });
    }

    this.logger.info(
      {
        proposal_id: proposalId,
        status: proposal.status,
        participation: result.participation,
        approval_ratio: result.approval_ratio,
        reason: result.reason,
      },
      "proposal tallied",
    );
    return { proposal, result, persisted: true };
  }

  /**
   * Append the approved entry to the lineage.
   *
   * @throws GovernanceError if the proposal is not APPROVED or the
   *   execution delay has not elapsed (unless `force`)
   * @throws ExecutionError if the append was refused; the proposal is
   *   then EXECUTION_FAILED
   */
  async execute(proposalId: string, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const attempt: { appended: AppendResult | null; failure: unknown } = {
      appended: null,
      failure: null,
    };

    const proposal = await this.store.update(proposalId, async (current) => {
      const now = this.clock();
      if (current.status !== "APPROVED") {
        throw new GovernanceError(`Proposal ${proposalId} is ${current.status}, not APPROVED`, {
          proposal_id: proposalId,
          status: current.status,
        });
      }
      const result = current.voting.result;
      const eligible = executableAt(current);
      if (result === null || eligible === null) {
        throw new GovernanceError(`Proposal ${proposalId} has no approving tally`, {
          proposal_id: proposalId,
        });
      }
      if (options.force !== true && now.getTime() < eligible.getTime()) {
        throw new GovernanceError(
          `Proposal ${proposalId} may execute from ${eligible.toISOString()}`,
          { proposal_id: proposalId, executable_at: eligible.toISOString() },
        );
      }

      const daoApproval: DaoApproval = {
        proposal_id: current.proposal_id,
        approved_at: result.tallied_at,
        approval_ratio: result.approval_ratio,
        quorum: result.participating_validators,
        governance_locked: true,
      };

      const at = now.toISOString();
      let appended: AppendResult;
      try {
        appended = await this.lineage.append(current.proposed_entry, {
          force: current.governance.allow_duplicate,
          daoApproval,
        });
      } catch (err) {
        attempt.failure = err;
        return {
          ...transition(current, "EXECUTION_FAILED", at, errorMessage(err)),
          execution: { status: "failed", executed_at: at, result: errorMessage(err), entry_id: null },
        };
      }

      attempt.appended = appended;
      return {
        ...transition(current, "EXECUTED", at),
        execution: {
          status: "executed",
          executed_at: at,
          result: `Appended lineage entry ${appended.entry.entry_id}`,
          entry_id: appended.entry.entry_id,
        },
      };
    });

    const { appended, failure } = attempt;
    if (appended === null) {
      this.logger.error(
        { proposal_id: proposalId, err: errorMessage(failure) },
        "proposal execution failed",
      );
      throw new ExecutionError(`Execution of ${proposalId} failed: ${errorMessage(failure)}`, {
        proposal_id: proposalId,
        status: proposal.status,
      });
    }

    this.logger.info(
      { proposal_id: proposalId, entry_id: proposal.execution.entry_id },
      "proposal executed",
    );
    return { proposal, append: appended };
  }
}
