/**
 * Shared scanner-output fixtures for registry tests.
 */

import { createHash } from "node:crypto";
import type { ManifestationSlot, RuleInput, StandardInput } from "@compliance-ledger/types";
import { DEFAULT_SLOT_ROLES } from "../src/types.js";

export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function slot(role: string, content: string | null): ManifestationSlot {
  return content === null
    ? { role, path: `${role}/absent`, hash: "", exists: false }
    : { role, path: `${role}/${content}`, hash: sha256(content), exists: true, size: content.length };
}

/** A rule whose slots hold "<ruleId>-<role>" unless listed in `absent` */
export function rule(ruleId: string, absent: readonly string[] = []): RuleInput {
  return {
    rule_id: ruleId,
    name: `Rule ${ruleId}`,
    slots: DEFAULT_SLOT_ROLES.map((role) =>
      slot(role, absent.includes(role) ? null : `${ruleId}-${role}`),
    ),
  };
}

export function standard(standardId: string, rules: readonly RuleInput[]): StandardInput {
  return { standard_id: standardId, name: `Standard ${standardId}`, rules };
}

export const SAMPLE: readonly StandardInput[] = [
  standard("SOC2", [rule("CC6.1"), rule("CC6.2", ["contract"])]),
  standard("GDPR", [rule("ART-32"), rule("ART-30", ["policy", "contract", "interface", "implementation"]), rule("ART-5")]),
];

export const GENERATED_AT = "2026-01-01T00:00:00.000Z";
