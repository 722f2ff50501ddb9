/**
 * Schemas for the lineage ledger document.
 *
 * Objects are strict: an unknown field is a malformed document rather
 * than something silently dropped before hashing.
 */

import { z } from "zod";
import type { LineageChain, LineageEntry } from "@compliance-ledger/types";

const hexHash = z.string().regex(/^[0-9a-f]{64}$/, "expected a lowercase hex SHA-256");

const changeSummary = z
  .object({
    type: z.enum(["initial", "expansion", "reduction", "modification", "mixed", "no_change"]),
    description: z.string(),
    rules_added: z.number().int().nonnegative(),
    rules_removed: z.number().int().nonnegative(),
    rules_modified: z.number().int().nonnegative(),
    files_added: z.number().int().nonnegative(),
    files_removed: z.number().int().nonnegative(),
    files_modified: z.number().int().nonnegative(),
  })
  .strict();

const attestationRef = z
  .object({
    algorithm: z.string(),
    backend: z.string(),
    message_hash: hexHash,
    signed_at: z.string(),
    attestation_path: z.string().nullable(),
    snapshot_ref: z.string().nullable(),
  })
  .strict();

const daoApproval = z
  .object({
    proposal_id: z.string(),
    approved_at: z.string(),
    approval_ratio: z.number(),
    quorum: z.number().int().nonnegative(),
    governance_locked: z.literal(true),
  })
  .strict();

export const LineageEntrySchema: z.ZodType<LineageEntry> = z
  .object({
    entry_id: z.number().int().positive(),
    timestamp: z.string(),
    registry_version: z.string(),
    registry_generated_at: z.string(),
    global_merkle_root: hexHash,
    compliance_score: z.number().min(0).max(1),
    total_rules: z.number().int().nonnegative(),
    total_manifestations: z.number().int().nonnegative(),
    standard_merkle_roots: z.record(hexHash),
    rule_roots: z.record(hexHash).optional(),
    attestation: attestationRef.nullable(),
    changes: changeSummary,
    attribution: z
      .object({
        actor: z.string(),
        event: z.string(),
        commit_ref: z.string().nullable(),
      })
      .strict(),
    chain: z
      .object({
        previous_entry_id: z.number().int().positive().nullable(),
        previous_merkle_root: hexHash.nullable(),
        entry_hash: hexHash,
      })
      .strict(),
    dao_approval: daoApproval.optional(),
  })
  .strict();

export const LineageChainSchema: z.ZodType<LineageChain> = z
  .object({
    metadata: z
      .object({
        version: z.string(),
        created_at: z.string(),
        chain_hash_algorithm: z.literal("SHA-256"),
        total_entries: z.number().int().nonnegative(),
        first_entry: z.string().nullable(),
        last_entry: z.string().nullable(),
      })
      .strict(),
    entries: z.array(LineageEntrySchema),
  })
  .strict();

/**
 * Up to three issues of a failed parse, as "path: message".
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}
