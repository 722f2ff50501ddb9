/**
 * Registry projections used downstream by attestation and lineage.
 */

import type { GlobalRegistry, HexHash, RegistrySummary } from "@compliance-ledger/types";

/**
 * The fixed field set an attestation signs. Extra registry fields
 * (standards, slots) are deliberately not part of it.
 */
export function summarizeRegistry(registry: GlobalRegistry): RegistrySummary {
  return {
    global_merkle_root: registry.global_merkle_root,
    standard_merkle_roots: { ...registry.standard_merkle_roots },
    total_rules: registry.total_rules,
    total_manifestations: registry.total_manifestations,
    compliance_score: registry.compliance_score,
    version: registry.version,
    generated_at: registry.generated_at,
  };
}

/**
 * Key for a rule across the registry.
 */
export function ruleKey(standardId: string, ruleId: string): string {
  return `${standardId}/${ruleId}`;
}

/**
 * "<standard>/<rule>" → rule root, for every rule in the registry.
 */
export function ruleRoots(registry: GlobalRegistry): Record<string, HexHash> {
  const roots: Record<string, HexHash> = {};
  for (const standard of registry.standards) {
    for (const rule of standard.rules) {
      roots[ruleKey(standard.standard_id, rule.rule_id)] = rule.root_hash;
    }
  }
  return roots;
}
