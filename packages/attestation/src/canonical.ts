/**
 * Canonical registry message.
 *
 * The signed message is the RFC 8785 (JCS) serialization of exactly the
 * RegistrySummary field set. Canonicalization lives here, not in signer
 * backends, so every backend signs byte-identical messages.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { HexHash, RegistrySummary } from "@compliance-ledger/types";

/**
 * Project any summary-shaped value onto the fixed field set and
 * serialize it canonically. Extra fields never reach the message.
 */
export function canonicalSummary(summary: RegistrySummary): string {
  const fixed: RegistrySummary = {
    global_merkle_root: summary.global_merkle_root,
    standard_merkle_roots: summary.standard_merkle_roots,
    total_rules: summary.total_rules,
    total_manifestations: summary.total_manifestations,
    compliance_score: summary.compliance_score,
    version: summary.version,
    generated_at: summary.generated_at,
  };
  return canonicalize(fixed);
}

export function messageBytes(summary: RegistrySummary): Uint8Array {
  return new TextEncoder().encode(canonicalSummary(summary));
}

/**
 * H(canonical message bytes), lowercase hex.
 */
export function messageHash(summary: RegistrySummary): HexHash {
  return createHash("sha256").update(messageBytes(summary)).digest("hex");
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

/**
 * Decode lowercase or uppercase hex; null when the text is not hex.
 */
export function fromHex(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) return null;
  return new Uint8Array(Buffer.from(hex, "hex"));
}
