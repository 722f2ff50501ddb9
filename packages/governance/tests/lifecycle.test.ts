/**
 * Tests for proposal creation, transitions and validation.
 */

import { describe, it, expect } from "vitest";
import {
  DuplicateStateError,
  EvidenceMissingError,
  GovernanceError,
  IntegrityError,
} from "@compliance-ledger/types";
import type { GovernanceParams, Proposal } from "@compliance-ledger/types";
import {
  VALID_TRANSITIONS,
  canTransition,
  createProposal,
  startVoting,
  transition,
  validateProposal,
} from "../src/lifecycle.js";
import type { ValidationContext } from "../src/types.js";
import { PARAMS, START, appendDirect, proposalInput, setup, sha256, signed, summary } from "./fixtures.js";

const NOW = new Date(START);

// =============================================================================
// Creation
// =============================================================================

describe("createProposal", () => {
  it("creates a CREATED proposal from matching evidence", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const proposal = createProposal(input, NOW);

    expect(proposal.proposal_id).toBe(
      `LINEAGE-UPDATE-20260301-000000-${input.entry.chain.entry_hash.slice(0, 8)}`,
    );
    expect(proposal.status).toBe("CREATED");
    expect(proposal.type).toBe("lineage_update");
    expect(proposal.title).toBe("Lineage update: Initial registry snapshot: 5 rules, 20 manifestations");
    expect(proposal.history).toEqual([{ from: null, to: "CREATED", at: START }]);
    expect(proposal.voting).toEqual({
      status: "pending",
      voting_start: null,
      voting_end: null,
      votes: {},
      tallies: { yes: 0, no: 0, abstain: 0 },
      result: null,
    });
    expect(proposal.execution.status).toBe("pending");
  });

  it("summarizes the change against the tip", async () => {
    const { lineage } = setup();
    const initial = createProposal(await proposalInput(lineage, "a"), NOW);
    expect(initial.change_summary).toEqual({
      type: "initial",
      description: "Initial registry snapshot: 5 rules, 20 manifestations",
      global_merkle_root: summary("a").global_merkle_root,
      previous_merkle_root: null,
      compliance_score_delta: 0.75,
      rules_delta: 5,
    });

    await appendDirect(lineage, "a");
    const next = createProposal(await proposalInput(lineage, "b"), NOW);
    expect(next.change_summary.type).toBe("modification");
    expect(next.change_summary.previous_merkle_root).toBe(summary("a").global_merkle_root);
    expect(next.change_summary.compliance_score_delta).toBe(0);
    expect(next.change_summary.rules_delta).toBe(0);
  });

  it("uses a given title", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    expect(createProposal({ ...input, title: "Q1 snapshot" }, NOW).title).toBe("Q1 snapshot");
  });

  it.each<[string, Partial<GovernanceParams>]>([
    ["zero quorum", { quorum_ratio: 0 }],
    ["quorum above one", { quorum_ratio: 1.5 }],
    ["zero threshold", { approval_threshold_ratio: 0 }],
    ["threshold above one", { approval_threshold_ratio: 1.01 }],
    ["zero voting period", { voting_period_hours: 0 }],
    ["negative delay", { execution_delay_hours: -1 }],
  ])("rejects %s", async (_label, override) => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a", { ...PARAMS, ...override });
    expect(() => createProposal(input, NOW)).toThrow(GovernanceError);
  });

  it("accepts ratios of exactly one", async () => {
    const { lineage } = setup();
    const params = { ...PARAMS, quorum_ratio: 1, approval_threshold_ratio: 1 };
    const input = await proposalInput(lineage, "a", params);
    expect(createProposal(input, NOW).governance).toEqual(params);
  });

  it("requires the attestation", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    expect(() => createProposal({ ...input, attestation: null }, NOW)).toThrow(EvidenceMissingError);
  });

  it("requires the attestation the entry references", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const other = await signed("b");
    expect(() => createProposal({ ...input, attestation: other }, NOW)).toThrow(
      /does not reference the supplied attestation/,
    );
  });

  it("requires the attestation root to match the candidate", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const attestation = input.attestation;
    if (attestation === null) throw new Error("fixture has an attestation");
    const relabelled = {
      ...attestation,
      payload: { ...attestation.payload, global_merkle_root: sha256("elsewhere") },
    };
    expect(() => createProposal({ ...input, attestation: relabelled }, NOW)).toThrow(
      /Attestation global Merkle root/,
    );
  });

  it("refuses a candidate whose hash does not recompute", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const edited = { ...input.entry, compliance_score: 1 };
    expect(() => createProposal({ ...input, entry: edited }, NOW)).toThrow(IntegrityError);
  });

  it("refuses a candidate built against an older tip", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    await appendDirect(lineage, "z");
    const chain = await lineage.load();
    expect(() => createProposal({ ...input, chain }, NOW)).toThrow(/current chain tip/);
  });

  it("refuses to repeat the tip's root unless duplicates are allowed", async () => {
    const { lineage } = setup();
    await appendDirect(lineage, "a");

    const input = await proposalInput(lineage, "a");
    expect(() => createProposal(input, NOW)).toThrow(DuplicateStateError);

    const allowed = await proposalInput(lineage, "a", { ...PARAMS, allow_duplicate: true });
    expect(createProposal(allowed, NOW).change_summary.type).toBe("no_change");
  });
});

// =============================================================================
// Transitions
// =============================================================================

describe("transitions", () => {
  it("has no way out of terminal states", () => {
    expect(VALID_TRANSITIONS.REJECTED).toEqual([]);
    expect(VALID_TRANSITIONS.EXECUTED).toEqual([]);
    expect(VALID_TRANSITIONS.EXECUTION_FAILED).toEqual([]);
  });

  it("executes only from APPROVED", () => {
    expect(canTransition("APPROVED", "EXECUTED")).toBe(true);
    expect(canTransition("CLOSED", "EXECUTED")).toBe(false);
    expect(canTransition("REJECTED", "EXECUTED")).toBe(false);
  });

  it("refuses a skipped step", async () => {
    const { lineage } = setup();
    const proposal = createProposal(await proposalInput(lineage, "a"), NOW);
    expect(() => transition(proposal, "APPROVED", START)).toThrow(GovernanceError);
  });

  it("records notes in history", async () => {
    const { lineage } = setup();
    const proposal = createProposal(await proposalInput(lineage, "a"), NOW);
    const moved = transition(proposal, "VOTING", START, "opened early");
    expect(moved.history[1]).toEqual({ from: "CREATED", to: "VOTING", at: START, note: "opened early" });
  });
});

describe("startVoting", () => {
  it("opens the window for the voting period", async () => {
    const { lineage } = setup();
    const proposal = startVoting(createProposal(await proposalInput(lineage, "a"), NOW), NOW);

    expect(proposal.status).toBe("VOTING");
    expect(proposal.voting.status).toBe("open");
    expect(proposal.voting.voting_start).toBe(START);
    expect(proposal.voting.voting_end).toBe("2026-03-04T00:00:00.000Z");
  });

  it("only starts from CREATED", async () => {
    const { lineage } = setup();
    const voting = startVoting(createProposal(await proposalInput(lineage, "a"), NOW), NOW);
    expect(() => startVoting(voting, NOW)).toThrow(GovernanceError);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("validateProposal", () => {
  async function fixture(): Promise<{ proposal: Proposal; context: ValidationContext }> {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const proposal = createProposal(input, NOW);
    const context: ValidationContext = {
      chain: input.chain,
      attestation: input.attestation,
      registry: summary("a"),
      digests: { registry: sha256("registry-a"), attestation: sha256("attestation-a") },
    };
    return { proposal, context };
  }

  function failed(report: ReturnType<typeof validateProposal>): string[] {
    return report.checks.filter((c) => !c.ok).map((c) => c.name);
  }

  it("passes when the evidence still holds", async () => {
    const { proposal, context } = await fixture();
    const report = validateProposal(proposal, context);
    expect(report.valid).toBe(true);
    expect(report.checks.map((c) => c.name)).toEqual([
      "parameters",
      "entry_hash",
      "lineage",
      "chain_tip",
      "attestation",
      "attestation_root",
      "registry_root",
      "registry_digest",
      "attestation_digest",
    ]);
  });

  it("flags a rebuilt registry", async () => {
    const { proposal, context } = await fixture();
    const report = validateProposal(proposal, {
      ...context,
      registry: summary("b"),
      digests: { ...context.digests, registry: sha256("registry-b") },
    });
    expect(failed(report)).toEqual(["registry_root", "registry_digest"]);
  });

  it("flags missing evidence files", async () => {
    const { proposal, context } = await fixture();
    const report = validateProposal(proposal, {
      ...context,
      attestation: null,
      registry: null,
      digests: { registry: null, attestation: null },
    });
    expect(failed(report)).toEqual([
      "attestation",
      "attestation_root",
      "registry_root",
      "registry_digest",
      "attestation_digest",
    ]);
    expect(report.checks.find((c) => c.name === "registry_root")?.message).toBe(
      "Registry registry.json not found",
    );
  });

  it("flags a tip that moved", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const proposal = createProposal(input, NOW);
    await appendDirect(lineage, "z");

    const report = validateProposal(proposal, {
      chain: await lineage.load(),
      attestation: input.attestation,
      registry: summary("a"),
      digests: { registry: sha256("registry-a"), attestation: sha256("attestation-a") },
    });
    expect(failed(report)).toEqual(["chain_tip"]);
  });

  it("skips the tip check once the proposal is terminal", async () => {
    const { lineage } = setup();
    const input = await proposalInput(lineage, "a");
    const proposal: Proposal = { ...createProposal(input, NOW), status: "REJECTED" };
    await appendDirect(lineage, "z");

    const report = validateProposal(proposal, {
      chain: await lineage.load(),
      attestation: input.attestation,
      registry: summary("a"),
      digests: { registry: sha256("registry-a"), attestation: sha256("attestation-a") },
    });
    expect(report.checks.find((c) => c.name === "chain_tip")).toMatchObject({
      ok: true,
      message: "Proposal is REJECTED; tip not rechecked",
    });
  });
});
