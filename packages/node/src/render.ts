/**
 * @compliance-ledger/node — Terminal rendering.
 *
 * Human-readable verdicts for operation results, and the JSON form
 * printed under --json.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { AnyOperationResult } from "./reports.js";

// =============================================================================
// Helpers
// =============================================================================

function abbreviate(hash: string): string {
  return hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

class Lines {
  private readonly out: string[] = [];

  constructor(private readonly ink: ChalkInstance) {}

  ok(msg: string): void {
    this.out.push(this.ink.green("  ✓ ") + this.ink.white(msg));
  }

  fail(msg: string): void {
    this.out.push(this.ink.red("  ✗ ") + this.ink.white(msg));
  }

  warn(msg: string): void {
    this.out.push(this.ink.yellow("    ! ") + this.ink.yellow(msg));
  }

  info(label: string, value: string): void {
    this.out.push(this.ink.gray("    → ") + this.ink.gray(label.padEnd(16)) + this.ink.white(value));
  }

  hash(label: string, hash: string): void {
    this.out.push(this.ink.gray("    → ") + this.ink.gray(label.padEnd(16)) + this.ink.yellow(abbreviate(hash)));
  }

  verdict(ok: boolean, msg: string): void {
    if (ok) this.ok(msg);
    else this.fail(msg);
  }

  toString(): string {
    return this.out.join("\n");
  }
}

// =============================================================================
// Rendering
// =============================================================================

export function renderJson(result: AnyOperationResult): string {
  return JSON.stringify(
    {
      operation: result.operation,
      ok: result.ok,
      exit_code: result.exitCode,
      report: result.report,
      error: result.error,
    },
    null,
    2,
  );
}

export function renderResult(result: AnyOperationResult, ink: ChalkInstance = chalk): string {
  const lines = new Lines(ink);

  if (result.error !== null) {
    lines.fail(`${result.operation}: ${result.error.message}`);
    lines.info("error", result.error.code);
    return lines.toString();
  }

  switch (result.operation) {
    case "build-registry": {
      const r = result.report;
      if (r === null) break;
      lines.ok(`Registry built (${r.total_rules} rules, ${r.total_manifestations} manifestations)`);
      lines.hash("global root", r.global_merkle_root);
      lines.info("compliance", percent(r.compliance_score));
      lines.info(
        "rules",
        `${r.rule_status.compliant} compliant, ${r.rule_status.partial} partial, ${r.rule_status.missing} missing`,
      );
      for (const s of r.standards) lines.hash(s.standard_id, s.merkle_root);
      lines.info("written to", r.registry_path);
      break;
    }

    case "verify-registry": {
      const r = result.report;
      if (r === null) break;
      lines.verdict(
        r.registry.valid,
        r.registry.valid ? "Registry verifies" : `Registry has ${r.registry.violations.length} violation(s)`,
      );
      lines.hash("global root", r.registry.global_merkle_root);
      for (const v of r.registry.violations) {
        lines.warn(`${v.kind}${v.location === null ? "" : ` ${v.location}`}: ${v.message}`);
      }
      if (r.attestation !== null) {
        lines.verdict(r.attestation.valid, `Attestation: ${r.attestation.message}`);
      }
      break;
    }

    case "sign-registry": {
      const r = result.report;
      if (r === null) break;
      lines.ok(`Registry signed (${r.algorithm}, ${r.backend})`);
      lines.hash("message hash", r.message_hash);
      lines.info("written to", r.attestation_path);
      if (r.snapshot !== null) lines.info("archived", r.snapshot.snapshot_id);
      break;
    }

    case "verify-signature": {
      const r = result.report;
      if (r === null) break;
      lines.verdict(r.verification.valid, r.verification.message);
      if (r.verification.reason !== undefined) lines.info("reason", r.verification.reason);
      lines.hash("stored hash", r.verification.stored_hash);
      lines.hash("recomputed", r.verification.recomputed_hash);
      break;
    }

    case "propose-update": {
      const r = result.report;
      if (r === null) break;
      lines.ok(`Proposal ${r.proposal_id} created`);
      lines.info("title", r.proposal.title);
      lines.info("change", r.proposal.change_summary.type);
      lines.hash("proposed root", r.proposal.change_summary.global_merkle_root);
      lines.info("written to", r.location);
      break;
    }

    case "validate-proposal": {
      const r = result.report;
      if (r === null) break;
      lines.verdict(r.valid, `Proposal ${r.proposal_id} (${r.status}) ${r.valid ? "is valid" : "is not valid"}`);
      for (const c of r.checks) {
        if (c.ok) lines.info(c.name, c.message);
        else lines.warn(`${c.name}: ${c.message}`);
      }
      break;
    }

    case "start-voting": {
      const r = result.report;
      if (r === null) break;
      lines.ok(`Voting open on ${r.proposal_id}`);
      lines.info("ends", r.voting_end ?? "-");
      break;
    }

    case "cast-vote": {
      const r = result.report;
      if (r === null) break;
      lines.ok(`${r.validator_id} voted ${r.choice} on ${r.proposal_id}`);
      lines.info("tallies", `yes ${r.tallies.yes}, no ${r.tallies.no}, abstain ${r.tallies.abstain}`);
      break;
    }

    case "tally": {
      const r = result.report;
      if (r === null) break;
      lines.verdict(result.ok, `Proposal ${r.proposal_id} is ${r.status}${r.dry_run ? " (dry run)" : ""}`);
      if (r.result !== null) {
        lines.info("participation", percent(r.result.participation));
        lines.info("approval", percent(r.result.approval_ratio));
        if (r.result.reason !== null) lines.info("reason", r.result.reason);
      }
      if (r.status === "APPROVED" && r.executable_at !== null) lines.info("executable at", r.executable_at);
      if (r.execution.result !== null) lines.info("execution", r.execution.result);
      break;
    }

    case "verify-lineage": {
      const r = result.report;
      if (r === null) break;
      lines.verdict(
        r.valid,
        r.valid
          ? `Lineage verifies (${r.total_entries} entries)`
          : `Lineage has ${r.violations.length} violation(s) across ${r.total_entries} entries`,
      );
      if (r.signatures.checked > 0) {
        lines.info("signatures", `${r.signatures.valid}/${r.signatures.checked} valid`);
      }
      for (const v of r.violations) {
        lines.warn(`${v.entry_id === null ? "chain" : `entry ${v.entry_id}`} ${v.kind}: ${v.message}`);
      }
      break;
    }

    case "update-lineage": {
      const r = result.report;
      if (r === null) break;
      lines.ok(
        r.dry_run
          ? `Would append entry ${r.entry.entry_id} (${r.entry.changes.type})`
          : `Appended entry ${r.entry.entry_id} (${r.entry.changes.type})`,
      );
      lines.info("changes", r.entry.changes.description);
      lines.hash("entry hash", r.entry.chain.entry_hash);
      if (r.backup !== null) lines.info("backup", r.backup);
      for (const w of r.warnings) lines.warn(w);
      break;
    }
  }

  return lines.toString();
}
