/**
 * @compliance-ledger/node — Command dispatch.
 *
 * Maps a command line onto one service operation.
 */

import { parseArgs } from "node:util";
import { ConfigurationError } from "./config.js";
import type { AnyOperationResult, OperationName } from "./reports.js";
import type { ComplianceLedgerService } from "./service.js";

export const USAGE = `Usage: compliance-ledger <command> [options]

Commands:
  build-registry
  verify-registry [--verify-signatures]
  sign-registry
  verify-signature
  propose-update [--force] [--title <text>]
  validate-proposal <proposal-id>
  start-voting <proposal-id>
  cast-vote <proposal-id> <validator-id> <yes|no|abstain>
  tally <proposal-id> [--force] [--dry-run]
  verify-lineage [--verify-signatures]
  update-lineage [--force] [--dry-run]

Options:
  --json    Print the machine-readable report`;

/** Positional arguments each command takes after its name */
const ARITY: Readonly<Record<OperationName, readonly string[]>> = {
  "build-registry": [],
  "verify-registry": [],
  "sign-registry": [],
  "verify-signature": [],
  "propose-update": [],
  "validate-proposal": ["proposal-id"],
  "start-voting": ["proposal-id"],
  "cast-vote": ["proposal-id", "validator-id", "choice"],
  tally: ["proposal-id"],
  "verify-lineage": [],
  "update-lineage": [],
};

function isOperationName(value: string): value is OperationName {
  return Object.hasOwn(ARITY, value);
}

export interface ParsedCommand {
  readonly operation: OperationName;
  readonly args: readonly string[];
  readonly json: boolean;
  readonly force: boolean;
  readonly dryRun: boolean;
  readonly verifySignatures: boolean;
  readonly title: string | undefined;
}

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        json: { type: "boolean", default: false },
        force: { type: "boolean", default: false },
        "dry-run": { type: "boolean", default: false },
        "verify-signatures": { type: "boolean", default: false },
        title: { type: "string" },
      },
    });
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * @throws ConfigurationError on an unknown command, option or argument count
 */
export function parseCommand(argv: readonly string[]): ParsedCommand {
  const parsed = parseArgv(argv);
  const [name, ...args] = parsed.positionals;
  if (name === undefined || !isOperationName(name)) {
    throw new ConfigurationError(name === undefined ? "No command given" : `Unknown command "${name}"`);
  }

  const expected = ARITY[name];
  if (args.length !== expected.length) {
    throw new ConfigurationError(
      `${name} takes ${expected.length === 0 ? "no arguments" : expected.map((a) => `<${a}>`).join(" ")}`,
    );
  }

  return {
    operation: name,
    args,
    json: parsed.values.json === true,
    force: parsed.values.force === true,
    dryRun: parsed.values["dry-run"] === true,
    verifySignatures: parsed.values["verify-signatures"] === true,
    title: parsed.values.title,
  };
}

function arg(command: ParsedCommand, index: number): string {
  const value = command.args[index];
  if (value === undefined) {
    throw new ConfigurationError(`${command.operation} is missing argument ${index + 1}`);
  }
  return value;
}

export async function runCommand(
  service: ComplianceLedgerService,
  command: ParsedCommand,
): Promise<AnyOperationResult> {
  const { force, dryRun, verifySignatures } = command;
  switch (command.operation) {
    case "build-registry":
      return service.buildRegistry();
    case "verify-registry":
      return service.verifyRegistry({ verifySignatures });
    case "sign-registry":
      return service.signRegistry();
    case "verify-signature":
      return service.verifySignature();
    case "propose-update":
      return service.proposeUpdate({
        force,
        ...(command.title !== undefined ? { title: command.title } : {}),
      });
    case "validate-proposal":
      return service.validateProposal(arg(command, 0));
    case "start-voting":
      return service.startVoting(arg(command, 0));
    case "cast-vote":
      return service.castVote(arg(command, 0), arg(command, 1), arg(command, 2));
    case "tally":
      return service.tally(arg(command, 0), { force, dryRun });
    case "verify-lineage":
      return service.verifyLineage({ verifySignatures });
    case "update-lineage":
      return service.updateLineage({ force, dryRun });
  }
}
