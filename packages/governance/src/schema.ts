/**
 * Schema for the proposal document.
 */

import { z } from "zod";
import type { Proposal } from "@compliance-ledger/types";
import { LineageEntrySchema } from "@compliance-ledger/lineage";

const hexHash = z.string().regex(/^[0-9a-f]{64}$/, "expected a lowercase hex SHA-256");

const status = z.enum([
  "CREATED",
  "VOTING",
  "CLOSED",
  "APPROVED",
  "REJECTED",
  "EXECUTED",
  "EXECUTION_FAILED",
]);

const counts = z
  .object({
    yes: z.number().nonnegative(),
    no: z.number().nonnegative(),
    abstain: z.number().nonnegative(),
  })
  .strict();

const evidenceRef = z.object({ path: z.string(), sha256: hexHash }).strict();

const tallyResult = z
  .object({
    tallied_at: z.string(),
    weights: counts,
    total_voting_power: z.number().nonnegative(),
    participating_power: z.number().nonnegative(),
    participating_validators: z.number().int().nonnegative(),
    participation: z.number().nonnegative(),
    quorum_reached: z.boolean(),
    approval_ratio: z.number().min(0).max(1),
    approved: z.boolean(),
    reason: z.enum(["quorum_not_reached", "threshold_not_met"]).nullable(),
  })
  .strict();

export const ProposalSchema: z.ZodType<Proposal> = z
  .object({
    proposal_id: z.string().min(1),
    title: z.string(),
    type: z.literal("lineage_update"),
    created_at: z.string(),
    status,
    governance: z
      .object({
        quorum_ratio: z.number(),
        approval_threshold_ratio: z.number(),
        voting_period_hours: z.number(),
        execution_delay_hours: z.number(),
        allow_duplicate: z.boolean(),
      })
      .strict(),
    proposed_entry: LineageEntrySchema,
    evidence: z
      .object({
        registry: evidenceRef,
        attestation: evidenceRef,
        snapshot: z.string().nullable(),
        lineage: z
          .object({
            path: z.string(),
            tip_entry_id: z.number().int().positive().nullable(),
            tip_merkle_root: hexHash.nullable(),
          })
          .strict(),
      })
      .strict(),
    change_summary: z
      .object({
        type: z.enum(["initial", "expansion", "reduction", "modification", "mixed", "no_change"]),
        description: z.string(),
        global_merkle_root: hexHash,
        previous_merkle_root: hexHash.nullable(),
        compliance_score_delta: z.number(),
        rules_delta: z.number().int(),
      })
      .strict(),
    voting: z
      .object({
        status: z.enum(["pending", "open", "closed"]),
        voting_start: z.string().nullable(),
        voting_end: z.string().nullable(),
        votes: z.record(z.enum(["yes", "no", "abstain"])),
        tallies: counts,
        result: tallyResult.nullable(),
      })
      .strict(),
    execution: z
      .object({
        status: z.enum(["pending", "executed", "failed"]),
        executed_at: z.string().nullable(),
        result: z.string().nullable(),
        entry_id: z.number().int().positive().nullable(),
      })
      .strict(),
    history: z.array(
      z
        .object({
          from: status.nullable(),
          to: status,
          at: z.string(),
          note: z.string().optional(),
        })
        .strict(),
    ),
  })
  .strict();
