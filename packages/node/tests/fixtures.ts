import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { LedgerLogger } from "@compliance-ledger/types";
import { StaticAttributionProvider } from "@compliance-ledger/lineage";
import { loadConfig } from "../src/config.js";
import { ComplianceLedgerService } from "../src/service.js";

export const SECRET = Buffer.from("test-secret").toString("hex");
export const START = "2026-03-01T00:00:00.000Z";

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

export function writeFile(root: string, path: string, content: string): void {
  const target = join(root, path);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, content);
}

export const CATALOG = {
  version: "1.0",
  standards: [
    {
      standard_id: "SOC2",
      name: "SOC 2",
      rules: [
        {
          rule_id: "CC6.1",
          name: "Logical access",
          slots: {
            implementation: "src/access.ts",
            policy: "policies/access.md",
            contract: "contracts/access.json",
            interface: "api/access.yaml",
          },
        },
        {
          rule_id: "CC7.2",
          name: "Monitoring",
          slots: {
            implementation: "src/monitoring.ts",
            policy: "policies/monitoring.md",
            contract: "contracts/monitoring.json",
            interface: "api/monitoring.yaml",
          },
        },
      ],
    },
    {
      standard_id: "GDPR",
      name: "GDPR",
      rules: [
        {
          rule_id: "ART32",
          name: "Security of processing",
          slots: {
            implementation: "src/processing.ts",
            policy: "policies/processing.md",
            contract: "contracts/processing.json",
            interface: "api/processing.yaml",
          },
        },
      ],
    },
  ],
};

export const VALIDATORS = {
  version: "1.0",
  validators: [
    { id: "v1", name: "Validator One", voting_power: 1, active: true },
    { id: "v2", name: "Validator Two", voting_power: 1, active: true },
    { id: "v3", name: "Validator Three", voting_power: 1, active: true },
  ],
};

/**
 * A ledger root with the catalog, validator roster and six of the twelve
 * catalogued artifacts: CC6.1 complete, CC7.2 half, ART32 absent.
 */
export function ledgerRoot(): string {
  const root = mkdtempSync(join(tmpdir(), "ledger-node-"));
  writeFile(root, "compliance/catalog.json", JSON.stringify(CATALOG));
  writeFile(root, "governance/validators.json", JSON.stringify(VALIDATORS));

  writeFile(root, "src/access.ts", "export const access = true;\n");
  writeFile(root, "policies/access.md", "# Access policy\n");
  writeFile(root, "contracts/access.json", "{}\n");
  writeFile(root, "api/access.yaml", "openapi: 3.0.0\n");
  writeFile(root, "src/monitoring.ts", "export const monitoring = true;\n");
  writeFile(root, "policies/monitoring.md", "# Monitoring policy\n");
  return root;
}

export function ledgerEnv(root: string, overrides: Record<string, string> = {}): Record<string, string> {
  return {
    LEDGER_ROOT: root,
    NODE_ENV: "test",
    SIGNER_SECRET_KEY: SECRET,
    EXECUTION_DELAY_HOURS: "0",
    ...overrides,
  };
}

export interface ServiceSetup {
  readonly service: ComplianceLedgerService;
  readonly clock: ManualClock;
}

export function ledgerService(
  root: string,
  overrides: Record<string, string> = {},
  logger?: LedgerLogger,
): ServiceSetup {
  const clock = new ManualClock();
  const service = new ComplianceLedgerService(loadConfig(ledgerEnv(root, overrides)), {
    clock: clock.now,
    attribution: new StaticAttributionProvider("0123456789abcdef0123456789abcdef01234567"),
    ...(logger !== undefined ? { logger } : {}),
  });
  return { service, clock };
}
