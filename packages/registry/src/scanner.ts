/**
 * Manifestation scanning.
 *
 * A scanner produces the ordered, hashed slot list the builder consumes.
 * FileManifestationScanner reads a catalog naming, for every rule, the
 * path of each slot role, and hashes the bytes of the files it finds.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { EvidenceMissingError } from "@compliance-ledger/types";
import type { ManifestationSlot, RuleInput, StandardInput } from "@compliance-ledger/types";
import { MISSING_SLOT_HASH, sha256 } from "./hashing.js";
import { DEFAULT_SLOT_LAYOUT } from "./types.js";
import type { SlotLayout } from "./types.js";

export interface ManifestationScanner {
  scan(): Promise<readonly StandardInput[]>;
}

// =============================================================================
// Catalog
// =============================================================================

export interface CatalogRule {
  readonly rule_id: string;
  readonly name: string;

  /** role → path relative to the scan root */
  readonly slots: Readonly<Record<string, string>>;
}

export interface CatalogStandard {
  readonly standard_id: string;
  readonly name: string;
  readonly rules: readonly CatalogRule[];
}

export interface ManifestationCatalog {
  readonly version: string;
  readonly standards: readonly CatalogStandard[];
}

// =============================================================================
// File scanner
// =============================================================================

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileManifestationScanner implements ManifestationScanner {
  private readonly catalog: ManifestationCatalog;
  private readonly rootDir: string;
  private readonly layout: SlotLayout;

  constructor(catalog: ManifestationCatalog, rootDir: string, layout: SlotLayout = DEFAULT_SLOT_LAYOUT) {
    this.catalog = catalog;
    this.rootDir = rootDir;
    this.layout = layout;
  }

  async scan(): Promise<readonly StandardInput[]> {
    const standards: StandardInput[] = [];
    for (const standard of this.catalog.standards) {
      const rules: RuleInput[] = [];
      for (const rule of standard.rules) {
        rules.push(await this.scanRule(standard.standard_id, rule));
      }
      standards.push({ standard_id: standard.standard_id, name: standard.name, rules });
    }
    return standards;
  }

  private async scanRule(standardId: string, rule: CatalogRule): Promise<RuleInput> {
    const declared = Object.keys(rule.slots);
    const unknown = declared.filter((role) => !this.layout.roles.includes(role));
    if (unknown.length > 0 || declared.length !== this.layout.roles.length) {
      throw new EvidenceMissingError(
        `Catalog rule ${standardId}/${rule.rule_id} declares ${declared.length} slots ` +
          `(expected ${this.layout.roles.length}: ${this.layout.roles.join(", ")})`,
        { standard: standardId, rule: rule.rule_id, declared, unknown },
      );
    }

    const slots: ManifestationSlot[] = [];
    for (const role of this.layout.roles) {
      const path = rule.slots[role];
      if (path === undefined) {
        throw new EvidenceMissingError(
          `Catalog rule ${standardId}/${rule.rule_id} has no path for slot "${role}"`,
          { standard: standardId, rule: rule.rule_id, role },
        );
      }
      slots.push(await this.scanSlot(role, path));
    }
    return { rule_id: rule.rule_id, name: rule.name, slots };
  }

  private async scanSlot(role: string, path: string): Promise<ManifestationSlot> {
    try {
      const bytes = await readFile(resolve(this.rootDir, path));
      return { role, path, hash: sha256(bytes), exists: true, size: bytes.length };
    } catch (err) {
      if (isNotFound(err)) {
        return { role, path, hash: MISSING_SLOT_HASH, exists: false, size: 0 };
      }
      throw err;
    }
  }
}
