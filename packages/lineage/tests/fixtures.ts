import { createHash } from "node:crypto";
import type {
  Attribution,
  HexHash,
  LineageChain,
  LineageEntry,
  RegistrySummary,
} from "@compliance-ledger/types";
import { buildCandidateEntry } from "../src/candidate.js";
import type { CandidateSource } from "../src/candidate.js";
import { buildMetadata } from "../src/hash-chain.js";

export function sha256(data: string): HexHash {
  return createHash("sha256").update(data).digest("hex");
}

export const CREATED_AT = "2026-01-01T00:00:00.000Z";

export const ATTRIBUTION: Attribution = {
  actor: "test-runner",
  event: "manual",
  commit_ref: null,
};

export function summary(tag: string, overrides: Partial<RegistrySummary> = {}): RegistrySummary {
  return {
    global_merkle_root: sha256(`global-${tag}`),
    standard_merkle_roots: { SOC2: sha256(`soc2-${tag}`) },
    total_rules: 5,
    total_manifestations: 20,
    compliance_score: 0.75,
    version: "1.0.0",
    generated_at: CREATED_AT,
    ...overrides,
  };
}

export function source(tag: string, overrides: Partial<CandidateSource> = {}): CandidateSource {
  return { summary: summary(tag), attestation: null, attribution: ATTRIBUTION, ...overrides };
}

/** Day `n` of January 2026, midnight UTC */
export function day(n: number): Date {
  return new Date(Date.UTC(2026, 0, n));
}

/** A clock that advances one second per call */
export function steppingClock(start = "2026-02-01T00:00:00.000Z"): () => Date {
  let t = Date.parse(start);
  return () => new Date((t += 1000));
}

export function withMetadata(entries: readonly LineageEntry[]): LineageChain {
  return { metadata: buildMetadata(entries, CREATED_AT), entries };
}

/** A valid chain of `n` entries, one per day from January 1st */
export function chainOf(n: number): LineageChain {
  let chain = withMetadata([]);
  for (let i = 1; i <= n; i++) {
    const entry = buildCandidateEntry(chain, source(`s${i}`), day(i));
    chain = withMetadata([...chain.entries, entry]);
  }
  return chain;
}
