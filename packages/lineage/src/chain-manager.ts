/**
 * Lineage Chain Manager.
 *
 * The single entry point that mutates the lineage. Every append:
 *
 *   lock ─▶ load ─▶ verify ─▶ tip check ─▶ duplicate check ─▶ seal ─▶ commit ─▶ unlock
 *
 * - The chain is loaded fresh under the lock for every append
 * - A candidate built against an older tip is refused, never rebased
 * - A chain that fails verification is never extended
 * - Commit is backup-then-atomic-write, checked by read-back
 * - Verification reads only persisted state and takes no lock
 */

import {
  DuplicateStateError,
  IntegrityError,
  errorMessage,
  silentLogger,
} from "@compliance-ledger/types";
import type {
  ArchiveReceipt,
  Attestation,
  AttestationRef,
  DaoApproval,
  LedgerLogger,
  LineageChain,
  LineageEntry,
  LineageReport,
  LineageViolation,
} from "@compliance-ledger/types";
import type { ArchivalSink } from "@compliance-ledger/attestation";
import { verifyAttestation } from "@compliance-ledger/attestation";
import { sealEntry } from "./candidate.js";
import {
  buildMetadata,
  emptyChain,
  entrySummary,
  lastEntry,
  verifyLineageChain,
} from "./hash-chain.js";
import type { LineageStore } from "./lineage-store.js";

export interface AppendOptions {
  /** Append even if the candidate repeats the tip's global root */
  readonly force?: boolean;

  /** Stamped on entries appended through governance */
  readonly daoApproval?: DaoApproval;
}

export interface AppendResult {
  readonly entry: LineageEntry;
  readonly chain: LineageChain;
  readonly backup: string | null;
  readonly snapshot: ArchiveReceipt | null;
  readonly warnings: readonly string[];
}

/**
 * Loads the attestation an entry references; null when it cannot be found.
 */
export type AttestationResolver = (
  ref: AttestationRef,
  entry: LineageEntry,
) => Promise<Attestation | null>;

export interface VerifyOptions {
  readonly verifySignatures?: boolean;
  readonly resolveAttestation?: AttestationResolver;
}

export interface LineageChainManagerOptions {
  readonly logger?: LedgerLogger;
  readonly archive?: ArchivalSink | null;
  readonly clock?: () => Date;
}

export class LineageChainManager {
  private readonly store: LineageStore;
  private readonly logger: LedgerLogger;
  private readonly archive: ArchivalSink | null;
  private readonly clock: () => Date;

  constructor(store: LineageStore, options: LineageChainManagerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? silentLogger;
    this.archive = options.archive ?? null;
    this.clock = options.clock ?? (() => new Date());
  }

  get location(): string {
    return this.store.location;
  }

  /** The persisted chain, or an empty one */
  async load(): Promise<LineageChain> {
    return (await this.store.read()) ?? emptyChain(this.clock().toISOString());
  }

  async tip(): Promise<LineageEntry | null> {
    return lastEntry(await this.load());
  }

  /**
   * Append a candidate entry.
   *
   * @throws IntegrityError if the chain fails verification or the tip moved
   * @throws DuplicateStateError if the global root repeats the tip without force
   */
  async append(candidate: LineageEntry, options: AppendOptions = {}): Promise<AppendResult> {
    return this.store.withLock(async () => {
      const chain = await this.load();
      const current = verifyLineageChain(chain);
      if (!current.valid) {
        throw new IntegrityError("Refusing to append to a lineage that fails verification", {
          violations: current.violations.length,
          first: current.violations[0]?.message,
        });
      }

      const tip = lastEntry(chain);
      const tipId = tip?.entry_id ?? null;
      const tipRoot = tip?.global_merkle_root ?? null;
      if (
        candidate.chain.previous_entry_id !== tipId ||
        candidate.chain.previous_merkle_root !== tipRoot
      ) {
        throw new IntegrityError("Lineage tip has advanced since the candidate was built", {
          expected_previous_entry_id: tipId,
          candidate_previous_entry_id: candidate.chain.previous_entry_id,
        });
      }

      if (tip !== null && tip.global_merkle_root === candidate.global_merkle_root && options.force !== true) {
        throw new DuplicateStateError(
          `Global Merkle root ${candidate.global_merkle_root} is already the lineage tip (entry ${tip.entry_id})`,
          { entry_id: tip.entry_id, global_merkle_root: candidate.global_merkle_root },
        );
      }

      const entry = sealEntry(candidate, tip, this.clock(), options.daoApproval);
      const entries = [...chain.entries, entry];
      const next: LineageChain = {
        metadata: buildMetadata(entries, chain.metadata.created_at),
        entries,
      };

      const { backup } = await this.store.commit(next);

      this.logger.info(
        {
          entry_id: entry.entry_id,
          change_type: entry.changes.type,
          global_merkle_root: entry.global_merkle_root,
          governed: options.daoApproval !== undefined,
          backup,
        },
        "lineage entry appended",
      );

      const warnings: string[] = [];
      let snapshot: ArchiveReceipt | null = null;
      if (this.archive !== null) {
        try {
          snapshot = await this.archive.archive("lineage_entry", String(entry.entry_id), entry, this.clock());
        } catch (err) {
          // The entry is committed; a failed mirror is reported, not rolled back
          warnings.push(`archive failed: ${errorMessage(err)}`);
          this.logger.warn({ entry_id: entry.entry_id, err: errorMessage(err) }, "lineage archive failed");
        }
      }

      return { entry, chain: next, backup, snapshot, warnings };
    });
  }

  /**
   * Verify the persisted chain.
   */
  async verify(options: VerifyOptions = {}): Promise<LineageReport> {
    return verifyLineage(await this.load(), { ...options, verifiedAt: this.clock().toISOString() });
  }
}

/**
 * Structural verification plus, optionally, every referenced attestation.
 * A referenced attestation that cannot be loaded is a violation.
 */
export async function verifyLineage(
  chain: LineageChain,
  options: VerifyOptions & { readonly verifiedAt?: string } = {},
): Promise<LineageReport> {
  const base = verifyLineageChain(chain, options.verifiedAt);
  if (options.verifySignatures !== true) return base;

  const violations: LineageViolation[] = [...base.violations];
  let checked = 0;
  let valid = 0;

  for (const entry of chain.entries) {
    const ref = entry.attestation;
    if (ref === null) continue;
    checked++;

    const attestation =
      options.resolveAttestation === undefined ? null : await options.resolveAttestation(ref, entry);
    if (attestation === null) {
      violations.push({
        entry_id: entry.entry_id,
        kind: "signature_unavailable",
        message: `Attestation ${ref.attestation_path ?? ref.message_hash} could not be loaded`,
      });
      continue;
    }

    if (attestation.message_hash !== ref.message_hash) {
      violations.push({
        entry_id: entry.entry_id,
        kind: "signature_invalid",
        message: "Loaded attestation is not the one the entry references",
      });
      continue;
    }

    const result = await verifyAttestation(attestation, entrySummary(entry));
    if (result.valid) {
      valid++;
    } else {
      violations.push({
        entry_id: entry.entry_id,
        kind: "signature_invalid",
        message: `${result.reason ?? "invalid"}: ${result.message}`,
      });
    }
  }

  return {
    ...base,
    valid: violations.length === 0,
    violations,
    signatures: { checked, valid },
  };
}
