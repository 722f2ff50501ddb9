/**
 * @compliance-ledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Relative paths resolve against LEDGER_ROOT.
 */

import { isAbsolute, resolve } from "node:path";
import { z } from "zod";
import type { GovernanceParams } from "@compliance-ledger/types";
import type { SlotLayout } from "@compliance-ledger/registry";
import type { FileLockOptions } from "@compliance-ledger/lineage";

// =============================================================================
// Errors
// =============================================================================

/**
 * Missing or malformed configuration or input document. Maps to exit code 2.
 */
export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION";
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export function isConfigurationError(value: unknown): value is ConfigurationError {
  return value instanceof ConfigurationError;
}

// =============================================================================
// Schema
// =============================================================================

const flag = z
  .string()
  .transform((v) => v === "true")
  .default("false");

export const ConfigSchema = z.object({
  // Layout
  LEDGER_ROOT: z.string().min(1).default("."),
  CATALOG_PATH: z.string().min(1).default("compliance/catalog.json"),
  REGISTRY_PATH: z.string().min(1).default("compliance/registry.json"),
  ATTESTATION_PATH: z.string().min(1).default("compliance/attestation.json"),
  LINEAGE_PATH: z.string().min(1).default("compliance/lineage.json"),
  LINEAGE_BACKUP_DIR: z.string().min(1).default("compliance/backups"),
  PROPOSALS_DIR: z.string().min(1).default("governance/proposals"),
  VALIDATORS_PATH: z.string().min(1).default("governance/validators.json"),

  // Archive
  ARCHIVE_DIR: z.string().min(1).default("compliance/archive"),
  ARCHIVE_ENABLED: flag,

  // Signing
  SIGNER_BACKEND: z.enum(["placeholder", "ed25519"]).default("placeholder"),
  SIGNER_SECRET_KEY: z
    .string()
    .regex(/^(?:[0-9a-fA-F]{2})+$/, "must be hex")
    .optional(),

  // Registry
  SLOTS_PER_RULE: z.coerce.number().int().min(1).default(4),
  SLOT_ROLES: z.string().default("implementation,policy,contract,interface"),
  REGISTRY_VERSION: z.string().min(1).default("1.0.0"),

  // Governance (ranges are checked by the governance package)
  QUORUM_RATIO: z.coerce.number().finite().default(0.67),
  APPROVAL_THRESHOLD_RATIO: z.coerce.number().finite().default(0.67),
  VOTING_PERIOD_HOURS: z.coerce.number().finite().default(72),
  EXECUTION_DELAY_HOURS: z.coerce.number().finite().default(24),

  // Locking
  LOCK_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
  LOCK_STALE_MS: z.coerce.number().int().min(1).default(60_000),

  ACTOR: z.string().min(1).default("compliance-ledger"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type LedgerConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws ConfigurationError naming every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): LedgerConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

// =============================================================================
// Derived settings
// =============================================================================

export interface LedgerPaths {
  readonly root: string;
  readonly catalog: string;
  readonly registry: string;
  readonly attestation: string;
  readonly lineage: string;
  readonly lineageBackups: string;
  readonly proposals: string;
  readonly validators: string;
  readonly archive: string;
}

export function resolvePaths(config: LedgerConfig): LedgerPaths {
  const root = resolve(config.LEDGER_ROOT);
  const at = (p: string): string => (isAbsolute(p) ? p : resolve(root, p));
  return {
    root,
    catalog: at(config.CATALOG_PATH),
    registry: at(config.REGISTRY_PATH),
    attestation: at(config.ATTESTATION_PATH),
    lineage: at(config.LINEAGE_PATH),
    lineageBackups: at(config.LINEAGE_BACKUP_DIR),
    proposals: at(config.PROPOSALS_DIR),
    validators: at(config.VALIDATORS_PATH),
    archive: at(config.ARCHIVE_DIR),
  };
}

/**
 * @throws ConfigurationError when SLOT_ROLES does not name SLOTS_PER_RULE distinct roles
 */
export function slotLayout(config: LedgerConfig): SlotLayout {
  const roles = config.SLOT_ROLES.split(",")
    .map((r) => r.trim())
    .filter((r) => r !== "");
  if (roles.length !== config.SLOTS_PER_RULE) {
    throw new ConfigurationError(
      `SLOT_ROLES names ${roles.length} roles but SLOTS_PER_RULE is ${config.SLOTS_PER_RULE}`,
      { roles },
    );
  }
  if (new Set(roles).size !== roles.length) {
    throw new ConfigurationError("SLOT_ROLES contains a duplicate role", { roles });
  }
  return { roles };
}

export function governanceParams(config: LedgerConfig, allowDuplicate = false): GovernanceParams {
  return {
    quorum_ratio: config.QUORUM_RATIO,
    approval_threshold_ratio: config.APPROVAL_THRESHOLD_RATIO,
    voting_period_hours: config.VOTING_PERIOD_HOURS,
    execution_delay_hours: config.EXECUTION_DELAY_HOURS,
    allow_duplicate: allowDuplicate,
  };
}

export function lockOptions(config: LedgerConfig): FileLockOptions {
  return { timeoutMs: config.LOCK_TIMEOUT_MS, staleMs: config.LOCK_STALE_MS };
}
