import { createHash } from "node:crypto";
import type {
  Attestation,
  GovernanceParams,
  HexHash,
  ProposalEvidence,
  RegistrySummary,
  Validator,
} from "@compliance-ledger/types";
import { PlaceholderSigner, signRegistry } from "@compliance-ledger/attestation";
import {
  InMemoryLineageStore,
  LineageChainManager,
  attestationRef,
  buildCandidateEntry,
  lastEntry,
} from "@compliance-ledger/lineage";
import { InMemoryProposalStore } from "../src/proposal-store.js";
import type { CreateProposalInput } from "../src/types.js";
import { ValidatorRoster } from "../src/validators.js";
import { VotingEngine } from "../src/voting-engine.js";

export function sha256(data: string): HexHash {
  return createHash("sha256").update(data).digest("hex");
}

export const SECRET = Buffer.from("test-secret").toString("hex");
export const START = "2026-03-01T00:00:00.000Z";

export const VALIDATORS: Validator[] = [
  { id: "v1", name: "Validator One", voting_power: 1, active: true },
  { id: "v2", name: "Validator Two", voting_power: 1, active: true },
  { id: "v3", name: "Validator Three", voting_power: 1, active: true },
  { id: "v4", name: "Retired", voting_power: 5, active: false },
];

export const PARAMS: GovernanceParams = {
  quorum_ratio: 0.67,
  approval_threshold_ratio: 0.67,
  voting_period_hours: 72,
  execution_delay_hours: 0,
  allow_duplicate: false,
};

export class ManualClock {
  private t: number;

  constructor(start: string = START) {
    this.t = Date.parse(start);
  }

  readonly now = (): Date => new Date(this.t);

  advanceHours(hours: number): void {
    this.t += hours * 3_600_000;
  }
}

export function summary(tag: string): RegistrySummary {
  return {
    global_merkle_root: sha256(`global-${tag}`),
    standard_merkle_roots: { SOC2: sha256(`soc2-${tag}`) },
    total_rules: 5,
    total_manifestations: 20,
    compliance_score: 0.75,
    version: "1.0.0",
    generated_at: "2026-02-01T00:00:00.000Z",
  };
}

export async function signed(tag: string): Promise<Attestation> {
  return signRegistry(summary(tag), new PlaceholderSigner(SECRET), {
    signedAt: "2026-02-01T00:00:01.000Z",
  });
}

export function setup(params: Partial<GovernanceParams> = {}, validators = VALIDATORS) {
  const clock = new ManualClock();
  const lineage = new LineageChainManager(new InMemoryLineageStore(), { clock: clock.now });
  const store = new InMemoryProposalStore();
  const roster = ValidatorRoster.from(validators);
  const engine = new VotingEngine(store, roster, lineage, { clock: clock.now });
  return { clock, lineage, store, roster, engine, params: { ...PARAMS, ...params } };
}

/** A proposal input for snapshot `tag` against the lineage as it is now */
export async function proposalInput(
  lineage: LineageChainManager,
  tag: string,
  params: GovernanceParams = PARAMS,
): Promise<CreateProposalInput> {
  const chain = await lineage.load();
  const attestation = await signed(tag);
  const entry = buildCandidateEntry(chain, {
    summary: summary(tag),
    attestation: attestationRef(attestation, "attestation.json", null),
    attribution: { actor: "test-runner", event: "propose", commit_ref: null },
  });
  const tip = lastEntry(chain);
  const evidence: ProposalEvidence = {
    registry: { path: "registry.json", sha256: sha256(`registry-${tag}`) },
    attestation: { path: "attestation.json", sha256: sha256(`attestation-${tag}`) },
    snapshot: null,
    lineage: {
      path: lineage.location,
      tip_entry_id: tip?.entry_id ?? null,
      tip_merkle_root: tip?.global_merkle_root ?? null,
    },
  };
  return { entry, params, evidence, attestation, chain };
}

/** Append snapshot `tag` directly, without governance */
export async function appendDirect(lineage: LineageChainManager, tag: string): Promise<void> {
  const input = await proposalInput(lineage, tag);
  await lineage.append(input.entry);
}
