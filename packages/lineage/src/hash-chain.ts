/**
 * Lineage hash chain.
 *
 * Each entry is hashed over its RFC 8785 (JCS) canonical form with
 * `chain.entry_hash` removed:
 *
 *   entry_hash = sha256(canonicalize(entry without chain.entry_hash))
 *
 * Entries link to their predecessor by entry_id and global Merkle root,
 * both inside the hashed content, so any edit to an entry breaks its own
 * hash and the link from its successor.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  HexHash,
  LineageChain,
  LineageEntry,
  LineageMetadata,
  LineageReport,
  LineageViolation,
  RegistrySummary,
} from "@compliance-ledger/types";

export const CHAIN_VERSION = "1.0";

export function computeEntryHash(entry: LineageEntry): HexHash {
  const { entry_hash: _omitted, ...link } = entry.chain;
  const content = canonicalize({ ...entry, chain: link });
  return createHash("sha256").update(content).digest("hex");
}

export function lastEntry(chain: LineageChain): LineageEntry | null {
  return chain.entries[chain.entries.length - 1] ?? null;
}

export function emptyChain(createdAt: string): LineageChain {
  return { metadata: buildMetadata([], createdAt), entries: [] };
}

export function buildMetadata(
  entries: readonly LineageEntry[],
  createdAt: string,
): LineageMetadata {
  return {
    version: CHAIN_VERSION,
    created_at: createdAt,
    chain_hash_algorithm: "SHA-256",
    total_entries: entries.length,
    first_entry: entries[0]?.timestamp ?? null,
    last_entry: entries[entries.length - 1]?.timestamp ?? null,
  };
}

/**
 * The registry summary an entry records; what its attestation signed.
 */
export function entrySummary(entry: LineageEntry): RegistrySummary {
  return {
    global_merkle_root: entry.global_merkle_root,
    standard_merkle_roots: entry.standard_merkle_roots,
    total_rules: entry.total_rules,
    total_manifestations: entry.total_manifestations,
    compliance_score: entry.compliance_score,
    version: entry.registry_version,
    generated_at: entry.registry_generated_at,
  };
}

// =============================================================================
// Verification
// =============================================================================

function checkMetadata(chain: LineageChain, violations: LineageViolation[]): void {
  const { metadata, entries } = chain;
  const expected = buildMetadata(entries, metadata.created_at);

  if (metadata.total_entries !== expected.total_entries) {
    violations.push({
      entry_id: null,
      kind: "metadata",
      message: `metadata.total_entries is ${metadata.total_entries}, chain has ${expected.total_entries}`,
    });
  }
  if (metadata.first_entry !== expected.first_entry) {
    violations.push({
      entry_id: null,
      kind: "metadata",
      message: "metadata.first_entry does not match the first entry's timestamp",
    });
  }
  if (metadata.last_entry !== expected.last_entry) {
    violations.push({
      entry_id: null,
      kind: "metadata",
      message: "metadata.last_entry does not match the last entry's timestamp",
    });
  }
}

/**
 * Verify hashes, linkage, sequence, chronology and metadata.
 *
 * Pure and read-only. Never stops at the first violation. An entry whose
 * predecessor is compromised (bad hash or broken link) is reported as
 * linkage_untrusted even if its own stored link looks right, so one
 * corrupted entry shows its full downstream blast radius.
 */
export function verifyLineageChain(
  chain: LineageChain,
  verifiedAt: string = new Date().toISOString(),
): LineageReport {
  const violations: LineageViolation[] = [];
  let previous: LineageEntry | null = null;
  let previousCompromised = false;

  for (const [index, entry] of chain.entries.entries()) {
    const id = entry.entry_id;
    let compromised = false;

    if (id !== index + 1) {
      violations.push({
        entry_id: id,
        kind: "sequence",
        message: `Entry at position ${index + 1} has entry_id ${id}`,
      });
    }

    const expectedHash = computeEntryHash(entry);
    if (expectedHash !== entry.chain.entry_hash) {
      compromised = true;
      violations.push({
        entry_id: id,
        kind: "hash_mismatch",
        message: `Hash mismatch: expected "${expectedHash}", got "${entry.chain.entry_hash}"`,
      });
    }

    const link = entry.chain;
    if (previous === null) {
      if (link.previous_entry_id !== null || link.previous_merkle_root !== null) {
        compromised = true;
        violations.push({
          entry_id: id,
          kind: "linkage_broken",
          message: "First entry must not reference a predecessor",
        });
      }
    } else if (
      link.previous_entry_id !== previous.entry_id ||
      link.previous_merkle_root !== previous.global_merkle_root
    ) {
      compromised = true;
      violations.push({
        entry_id: id,
        kind: "linkage_broken",
        message:
          `Links to entry ${String(link.previous_entry_id)} with root "${String(link.previous_merkle_root)}", ` +
          `predecessor is entry ${previous.entry_id} with root "${previous.global_merkle_root}"`,
      });
    } else if (previousCompromised) {
      compromised = true;
      violations.push({
        entry_id: id,
        kind: "linkage_untrusted",
        message: `Links to entry ${previous.entry_id}, which failed verification`,
      });
    }

    if (previous !== null) {
      const prevTime = Date.parse(previous.timestamp);
      const time = Date.parse(entry.timestamp);
      if (Number.isNaN(time) || Number.isNaN(prevTime) || time <= prevTime) {
        violations.push({
          entry_id: id,
          kind: "chronology",
          message: `Timestamp ${entry.timestamp} is not after ${previous.timestamp}`,
        });
      }
    }

    previous = entry;
    previousCompromised = compromised;
  }

  checkMetadata(chain, violations);

  return {
    valid: violations.length === 0,
    total_entries: chain.entries.length,
    violations,
    signatures: { checked: 0, valid: 0 },
    verified_at: verifiedAt,
  };
}
