/**
 * @compliance-ledger/node — Document I/O.
 *
 * Input documents (catalog, registry, attestation, validator roster) are
 * validated on load. A missing or malformed input is a ConfigurationError;
 * lineage and proposal documents are validated by their own stores.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { Attestation, GlobalRegistry, HexHash } from "@compliance-ledger/types";
import type { ManifestationCatalog } from "@compliance-ledger/registry";
import { atomicWriteJson, describeIssues } from "@compliance-ledger/lineage";
import { ConfigurationError } from "./config.js";

// =============================================================================
// Schemas
// =============================================================================

const summaryShape = {
  global_merkle_root: z.string(),
  standard_merkle_roots: z.record(z.string()),
  total_rules: z.number().int().nonnegative(),
  total_manifestations: z.number().int().nonnegative(),
  compliance_score: z.number(),
  version: z.string(),
  generated_at: z.string(),
};

const slot = z
  .object({
    role: z.string(),
    path: z.string(),
    hash: z.string(),
    exists: z.boolean(),
    size: z.number().int().nonnegative().optional(),
  })
  .strict();

const rule = z
  .object({
    rule_id: z.string(),
    standard_id: z.string(),
    name: z.string(),
    slots: z.array(slot),
    leaf_hashes: z.array(z.string()),
    intermediate_hashes: z.array(z.string()),
    root_hash: z.string(),
    status: z.enum(["compliant", "partial", "missing"]),
  })
  .strict();

const standard = z
  .object({
    standard_id: z.string(),
    name: z.string(),
    rules: z.array(rule),
    merkle_root: z.string(),
    compliance_score: z.number(),
  })
  .strict();

export const RegistryDocumentSchema: z.ZodType<GlobalRegistry> = z
  .object({
    ...summaryShape,
    standards: z.array(standard),
  })
  .strict();

export const AttestationDocumentSchema: z.ZodType<Attestation> = z
  .object({
    version: z.string(),
    signed_at: z.string(),
    payload: z.object(summaryShape).strict(),
    message_hash: z.string(),
    signature: z
      .object({
        algorithm: z.string(),
        backend: z.string(),
        signature_bytes: z.string(),
        size: z.number().int().nonnegative(),
        created_at: z.string(),
      })
      .strict(),
    public_key: z
      .object({
        algorithm: z.string(),
        backend: z.string(),
        key_bytes: z.string(),
        created_at: z.string(),
      })
      .strict(),
  })
  .strict();

export const CatalogSchema: z.ZodType<ManifestationCatalog> = z.object({
  version: z.string(),
  standards: z.array(
    z.object({
      standard_id: z.string().min(1),
      name: z.string(),
      rules: z.array(
        z.object({
          rule_id: z.string().min(1),
          name: z.string(),
          slots: z.record(z.string()),
        }),
      ),
    }),
  ),
});

// =============================================================================
// Reading and writing
// =============================================================================

function parseDocument<T>(path: string, text: string, schema: z.ZodType<T>, label: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${label} ${path} is not valid JSON`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${label} ${path} is malformed: ${describeIssues(parsed.error)}`, {
      path,
    });
  }
  return parsed.data;
}

/**
 * @throws ConfigurationError when the file is missing or does not match the schema
 */
export function readDocument<T>(path: string, schema: z.ZodType<T>, label: string): T {
  if (!existsSync(path)) {
    throw new ConfigurationError(`${label} ${path} not found`, { path });
  }
  return parseDocument(path, readFileSync(path, "utf8"), schema, label);
}

/**
 * Like readDocument, but a missing file is null.
 */
export function optionalDocument<T>(path: string, schema: z.ZodType<T>, label: string): T | null {
  return existsSync(path) ? readDocument(path, schema, label) : null;
}

/** SHA-256 of the file's bytes, or null when it does not exist */
export function fileDigest(path: string): HexHash | null {
  if (!existsSync(path)) return null;
  return createHash("sha256").update(readFileSync(path)).digest("hex");
}

export function writeDocument(path: string, document: unknown): void {
  atomicWriteJson(path, document);
}
