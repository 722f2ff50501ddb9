/**
 * Weighted tally.
 *
 *   participation  = Σ weight of validators who voted / total voting power
 *   approval_ratio = yes weight / (yes + no weight), 0 when nobody decided
 *   approved       = participation ≥ quorum AND approval_ratio ≥ threshold
 *
 * Measured ratios are rounded to two decimals before comparison, so 2/3
 * meets a 0.67 threshold. Configured ratios are compared as given, and
 * stored ratios are unrounded.
 */

import type { Proposal, TallyResult, VoteTallies } from "@compliance-ledger/types";
import type { ValidatorRoster } from "./validators.js";

export function roundRatio(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Vote counts per choice */
export function countVotes(votes: Proposal["voting"]["votes"]): VoteTallies {
  const counts = { yes: 0, no: 0, abstain: 0 };
  for (const choice of Object.values(votes)) counts[choice]++;
  return counts;
}

export function computeTally(proposal: Proposal, roster: ValidatorRoster, at: string): TallyResult {
  const weights = { yes: 0, no: 0, abstain: 0 };
  let participatingPower = 0;
  let participatingValidators = 0;

  for (const [validatorId, choice] of Object.entries(proposal.voting.votes)) {
    const weight = roster.weightOf(validatorId);
    if (roster.get(validatorId)?.active !== true) continue;
    weights[choice] += weight;
    participatingPower += weight;
    participatingValidators++;
  }

  const total = roster.totalVotingPower();
  const participation = total > 0 ? participatingPower / total : 0;
  const decisive = weights.yes + weights.no;
  const approvalRatio = decisive > 0 ? weights.yes / decisive : 0;

  const { quorum_ratio, approval_threshold_ratio } = proposal.governance;
  const quorumReached = roundRatio(participation) >= quorum_ratio;
  const thresholdMet = roundRatio(approvalRatio) >= approval_threshold_ratio;
  const approved = quorumReached && thresholdMet;

  return {
    tallied_at: at,
    weights,
    total_voting_power: total,
    participating_power: participatingPower,
    participating_validators: participatingValidators,
    participation,
    quorum_reached: quorumReached,
    approval_ratio: approvalRatio,
    approved,
    reason: !quorumReached ? "quorum_not_reached" : approved ? null : "threshold_not_met",
  };
}
