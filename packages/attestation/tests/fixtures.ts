import type { RegistrySummary } from "@compliance-ledger/types";
import { createHash } from "node:crypto";

export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export const SUMMARY: RegistrySummary = {
  global_merkle_root: sha256("global"),
  standard_merkle_roots: { SOC2: sha256("soc2"), GDPR: sha256("gdpr") },
  total_rules: 5,
  total_manifestations: 20,
  compliance_score: 0.75,
  version: "1.0.0",
  generated_at: "2026-01-01T00:00:00.000Z",
};

export const PLACEHOLDER_SECRET = Buffer.from("test-secret").toString("hex");
export const ED25519_SECRET = "01".repeat(32);
export const SIGNED_AT = "2026-01-02T03:04:05.678Z";
