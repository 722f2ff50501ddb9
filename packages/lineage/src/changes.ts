/**
 * Change classification between consecutive lineage entries.
 *
 * Rule-level counts come from `rule_roots` when both entries carry them;
 * otherwise they fall back to the difference in total_rules, which cannot
 * see modified rules.
 *
 *   root unchanged              → no_change
 *   rules added and removed     → mixed
 *   rules added                 → expansion
 *   rules removed               → reduction
 *   root changed, same rule set → modification
 */

import type { ChangeSummary, ChangeType, LineageEntry } from "@compliance-ledger/types";

export type ChangeSubject = Pick<
  LineageEntry,
  "global_merkle_root" | "total_rules" | "total_manifestations" | "rule_roots"
>;

interface RuleDelta {
  readonly added: number;
  readonly removed: number;
  readonly modified: number;
}

function ruleDelta(previous: ChangeSubject, next: ChangeSubject): RuleDelta {
  if (previous.rule_roots !== undefined && next.rule_roots !== undefined) {
    const prev = previous.rule_roots;
    const curr = next.rule_roots;
    let added = 0;
    let modified = 0;
    for (const [key, root] of Object.entries(curr)) {
      const before = prev[key];
      if (before === undefined) added++;
      else if (before !== root) modified++;
    }
    const removed = Object.keys(prev).filter((key) => curr[key] === undefined).length;
    return { added, removed, modified };
  }

  const delta = next.total_rules - previous.total_rules;
  return { added: Math.max(delta, 0), removed: Math.max(-delta, 0), modified: 0 };
}

const LABELS: Record<Exclude<ChangeType, "initial" | "no_change">, string> = {
  expansion: "Registry expanded",
  reduction: "Registry reduced",
  mixed: "Rules added and removed",
  modification: "Manifestations modified",
};

export function classifyChanges(
  previous: ChangeSubject | null,
  next: ChangeSubject,
): ChangeSummary {
  if (previous === null) {
    return {
      type: "initial",
      description: `Initial registry snapshot: ${next.total_rules} rules, ${next.total_manifestations} manifestations`,
      rules_added: next.total_rules,
      rules_removed: 0,
      rules_modified: 0,
      files_added: next.total_manifestations,
      files_removed: 0,
      files_modified: 0,
    };
  }

  const { added, removed, modified } = ruleDelta(previous, next);
  const fileDelta = next.total_manifestations - previous.total_manifestations;
  const slotsPerRule =
    next.total_rules > 0 ? Math.round(next.total_manifestations / next.total_rules) : 0;

  let type: ChangeType;
  if (next.global_merkle_root === previous.global_merkle_root) type = "no_change";
  else if (added > 0 && removed > 0) type = "mixed";
  else if (added > 0) type = "expansion";
  else if (removed > 0) type = "reduction";
  else type = "modification";

  const description =
    type === "no_change"
      ? "Global Merkle root unchanged"
      : `${LABELS[type]}: ${added} rules added, ${removed} removed, ${modified} modified`;

  return {
    type,
    description,
    rules_added: added,
    rules_removed: removed,
    rules_modified: modified,
    files_added: Math.max(fileDelta, 0),
    files_removed: Math.max(-fileDelta, 0),
    files_modified: modified * slotsPerRule,
  };
}
