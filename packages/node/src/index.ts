/**
 * @compliance-ledger/node — Operation host for the compliance ledger.
 *
 * Configuration, logging and document I/O around the core packages, and
 * the service behind the command-line operations.
 */

export {
  ConfigSchema,
  ConfigurationError,
  isConfigurationError,
  loadConfig,
  resolvePaths,
  slotLayout,
  governanceParams,
  lockOptions,
} from "./config.js";
export type { LedgerConfig, LedgerPaths } from "./config.js";
export { createLogger } from "./logger.js";
export {
  RegistryDocumentSchema,
  AttestationDocumentSchema,
  CatalogSchema,
  readDocument,
  optionalDocument,
  fileDigest,
  writeDocument,
} from "./documents.js";
export { ComplianceLedgerService } from "./service.js";
export type {
  ComplianceLedgerServiceOptions,
  ProposeUpdateOptions,
  LedgerTallyOptions,
  UpdateLineageOptions,
  VerifyOptions,
} from "./service.js";
export { parseCommand, runCommand, USAGE } from "./commands.js";
export type { ParsedCommand } from "./commands.js";
export { renderResult, renderJson } from "./render.js";
export type {
  ExitCode,
  ErrorInfo,
  OperationName,
  OperationReports,
  OperationResult,
  AnyOperationResult,
  BuildRegistryReport,
  VerifyRegistryReport,
  SignRegistryReport,
  VerifySignatureReport,
  ProposeUpdateReport,
  StartVotingReport,
  CastVoteReport,
  TallyReport,
  UpdateLineageReport,
} from "./reports.js";
