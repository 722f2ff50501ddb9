#!/usr/bin/env node
/**
 * @compliance-ledger/node — Command-line entry point.
 *
 * Loads configuration from the environment, runs one operation and
 * exits with its code: 0 success, 1 failure or violations, 2
 * configuration error. Reports go to stdout, logs to stderr.
 */

import { loadConfig, isConfigurationError } from "./config.js";
import type { LedgerConfig } from "./config.js";
import { USAGE, parseCommand, runCommand } from "./commands.js";
import type { ParsedCommand } from "./commands.js";
import { createLogger } from "./logger.js";
import { renderJson, renderResult } from "./render.js";
import { ComplianceLedgerService } from "./service.js";

function setup(): { command: ParsedCommand; config: LedgerConfig } | null {
  try {
    return { command: parseCommand(process.argv.slice(2)), config: loadConfig() };
  } catch (err) {
    if (!isConfigurationError(err)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}\n`);
    return null;
  }
}

async function main(): Promise<number> {
  const ready = setup();
  if (ready === null) return 2;
  const { command, config } = ready;

  const logger = createLogger(config);
  const service = new ComplianceLedgerService(config, { logger });
  const result = await runCommand(service, command);

  process.stdout.write(`${command.json ? renderJson(result) : renderResult(result)}\n`);
  logger.flush();
  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  });
