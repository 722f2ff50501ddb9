/**
 * Proposal Store — one document per proposal.
 *
 * Implementations:
 * - InMemoryProposalStore: tests and embedding
 * - FileProposalStore: "<dir>/<proposal_id>.json"
 *
 * Updates to one proposal are serialized (in-process mutex plus, for
 * files, a per-proposal lock file); different proposals never contend.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { DuplicateStateError, EvidenceMissingError, IntegrityError } from "@compliance-ledger/types";
import type { Proposal } from "@compliance-ledger/types";
import {
  KeyedMutex,
  atomicWriteJson,
  describeIssues,
  withFileLock,
} from "@compliance-ledger/lineage";
import type { FileLockOptions } from "@compliance-ledger/lineage";
import { ProposalSchema } from "./schema.js";

export type ProposalUpdate = (current: Proposal) => Promise<Proposal>;

export interface ProposalStore {
  readonly location: string;

  get(proposalId: string): Promise<Proposal | null>;

  /** Every stored proposal, ordered by id */
  list(): Promise<Proposal[]>;

  /** @throws DuplicateStateError if the id is taken */
  create(proposal: Proposal): Promise<void>;

  /**
   * Replace a proposal with what `fn` returns, holding its lock.
   * Nothing is written if `fn` throws.
   *
   * @throws EvidenceMissingError if the proposal does not exist
   */
  update(proposalId: string, fn: ProposalUpdate): Promise<Proposal>;
}

function parseProposal(text: string, location: string): Proposal {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IntegrityError(`Proposal ${location} is not valid JSON`, {
      location,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = ProposalSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IntegrityError(`Proposal ${location} is malformed: ${describeIssues(parsed.error)}`, {
      location,
    });
  }
  return parsed.data;
}

function notFound(proposalId: string): EvidenceMissingError {
  return new EvidenceMissingError(`Proposal ${proposalId} not found`, { proposal_id: proposalId });
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemoryProposalStore implements ProposalStore {
  readonly location = "memory://proposals";
  private readonly documents = new Map<string, string>();
  private readonly mutex = new KeyedMutex();

  async get(proposalId: string): Promise<Proposal | null> {
    const text = this.documents.get(proposalId);
    return text === undefined ? null : parseProposal(text, `memory://${proposalId}`);
  }

  async list(): Promise<Proposal[]> {
    const ids = [...this.documents.keys()].sort();
    const proposals: Proposal[] = [];
    for (const id of ids) {
      const p = await this.get(id);
      if (p !== null) proposals.push(p);
    }
    return proposals;
  }

  async create(proposal: Proposal): Promise<void> {
    await this.mutex.run(proposal.proposal_id, async () => {
      if (this.documents.has(proposal.proposal_id)) {
        throw new DuplicateStateError(`Proposal ${proposal.proposal_id} already exists`, {
          proposal_id: proposal.proposal_id,
        });
      }
      this.documents.set(proposal.proposal_id, JSON.stringify(proposal));
    });
  }

  update(proposalId: string, fn: ProposalUpdate): Promise<Proposal> {
    return this.mutex.run(proposalId, async () => {
      const current = await this.get(proposalId);
      if (current === null) throw notFound(proposalId);
      const next = await fn(current);
      this.documents.set(proposalId, JSON.stringify(next));
      return next;
    });
  }
}

// =============================================================================
// Files
// =============================================================================

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface FileProposalStoreOptions {
  readonly lock?: FileLockOptions;
}

export class FileProposalStore implements ProposalStore {
  readonly location: string;
  private readonly lockOptions: FileLockOptions;
  private readonly mutex = new KeyedMutex();

  constructor(dir: string, options: FileProposalStoreOptions = {}) {
    this.location = dir;
    this.lockOptions = options.lock ?? {};
  }

  /** Path of a proposal's document */
  pathOf(proposalId: string): string {
    if (!SAFE_ID.test(proposalId)) {
      throw new EvidenceMissingError(`Invalid proposal id "${proposalId}"`, {
        proposal_id: proposalId,
      });
    }
    return join(this.location, `${proposalId}.json`);
  }

  async get(proposalId: string): Promise<Proposal | null> {
    const path = this.pathOf(proposalId);
    if (!existsSync(path)) return null;
    return parseProposal(readFileSync(path, "utf8"), path);
  }

  async list(): Promise<Proposal[]> {
    if (!existsSync(this.location)) return [];
    const names = readdirSync(this.location)
      .filter((name) => name.endsWith(".json") && !name.startsWith("."))
      .sort();
    return names.map((name) => {
      const path = join(this.location, name);
      return parseProposal(readFileSync(path, "utf8"), path);
    });
  }

  async create(proposal: Proposal): Promise<void> {
    const path = this.pathOf(proposal.proposal_id);
    await this.locked(proposal.proposal_id, async () => {
      if (existsSync(path)) {
        throw new DuplicateStateError(`Proposal ${proposal.proposal_id} already exists`, {
          proposal_id: proposal.proposal_id,
          location: path,
        });
      }
      atomicWriteJson(path, proposal);
    });
  }

  update(proposalId: string, fn: ProposalUpdate): Promise<Proposal> {
    const path = this.pathOf(proposalId);
    return this.locked(proposalId, async () => {
      if (!existsSync(path)) throw notFound(proposalId);
      const next = await fn(parseProposal(readFileSync(path, "utf8"), path));
      atomicWriteJson(path, next);
      return next;
    });
  }

  private locked<T>(proposalId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(proposalId, () => {
      mkdirSync(this.location, { recursive: true });
      return withFileLock(`${this.pathOf(proposalId)}.lock`, fn, this.lockOptions);
    });
  }
}
