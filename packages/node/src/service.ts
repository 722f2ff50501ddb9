/**
 * @compliance-ledger/node — ComplianceLedgerService.
 *
 * Wires the core packages to the configured file layout and exposes one
 * method per external operation. Each method returns an OperationResult:
 *
 * - ConfigurationError → exit 2, with the error in the result
 * - any LedgerError    → exit 1, with the error in the result
 * - a report with violations or a failed verdict → exit 1
 *
 * Anything else is a defect and propagates.
 */

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, relative, resolve, sep } from "node:path";
import {
  DuplicateStateError,
  ExecutionError,
  GovernanceError,
  IntegrityError,
  isLedgerError,
  silentLogger,
} from "@compliance-ledger/types";
import type {
  Attestation,
  AttestationRef,
  GlobalRegistry,
  LedgerLogger,
  Proposal,
  RegistrySummary,
  RuleStatus,
} from "@compliance-ledger/types";
import {
  FileManifestationScanner,
  buildRegistry,
  ruleRoots,
  summarizeRegistry,
  verifyRegistry,
} from "@compliance-ledger/registry";
import type { ManifestationScanner, SlotLayout } from "@compliance-ledger/registry";
import {
  FileArchivalSink,
  assertAttestation,
  createSigner,
  signRegistry,
  verifyAttestation,
} from "@compliance-ledger/attestation";
import type { ArchivalSink } from "@compliance-ledger/attestation";
import {
  GitAttributionProvider,
  JsonFileLineageStore,
  LineageChainManager,
  attestationRef,
  buildCandidateEntry,
  lastEntry,
} from "@compliance-ledger/lineage";
import type { AttestationResolver, AttributionProvider } from "@compliance-ledger/lineage";
import {
  FileProposalStore,
  ValidatorRoster,
  ValidatorRosterSchema,
  VotingEngine,
  executableAt,
  validateProposal,
} from "@compliance-ledger/governance";
import {
  governanceParams,
  isConfigurationError,
  lockOptions,
  resolvePaths,
  slotLayout,
} from "./config.js";
import type { LedgerConfig, LedgerPaths } from "./config.js";
import {
  AttestationDocumentSchema,
  CatalogSchema,
  RegistryDocumentSchema,
  fileDigest,
  optionalDocument,
  readDocument,
  writeDocument,
} from "./documents.js";
import type {
  ErrorInfo,
  ExitCode,
  OperationName,
  OperationReports,
  OperationResult,
} from "./reports.js";

export interface ComplianceLedgerServiceOptions {
  readonly logger?: LedgerLogger;
  readonly clock?: () => Date;

  /** Revision source for entry attribution (default: the git tree at LEDGER_ROOT) */
  readonly attribution?: AttributionProvider;

  /** Manifestation source (default: the catalog at CATALOG_PATH) */
  readonly scanner?: ManifestationScanner;
}

export interface ProposeUpdateOptions {
  /** Allow the proposed entry to repeat the tip's global root */
  readonly force?: boolean;
  readonly title?: string;
}

export interface LedgerTallyOptions {
  /** Tally before voting ends and execute before the delay has elapsed */
  readonly force?: boolean;
  readonly dryRun?: boolean;
}

export interface UpdateLineageOptions {
  readonly force?: boolean;
  readonly dryRun?: boolean;
}

export interface VerifyOptions {
  readonly verifySignatures?: boolean;
}

interface Outcome<K extends OperationName> {
  readonly ok: boolean;
  readonly report: OperationReports[K];
}

function errorInfo(
  err: Error & { readonly code: string },
  details: Readonly<Record<string, unknown>> | undefined,
): ErrorInfo {
  return { name: err.name, code: err.code, message: err.message, details: details ?? null };
}

export class ComplianceLedgerService {
  private readonly config: LedgerConfig;
  private readonly paths: LedgerPaths;
  private readonly logger: LedgerLogger;
  private readonly clock: () => Date;
  private readonly attribution: AttributionProvider;
  private readonly scanner: ManifestationScanner | null;
  private readonly archive: ArchivalSink | null;
  private readonly lineage: LineageChainManager;
  private readonly proposals: FileProposalStore;

  constructor(config: LedgerConfig, options: ComplianceLedgerServiceOptions = {}) {
    this.config = config;
    this.paths = resolvePaths(config);
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.attribution = options.attribution ?? new GitAttributionProvider(this.paths.root);
    this.scanner = options.scanner ?? null;
    this.archive = config.ARCHIVE_ENABLED ? new FileArchivalSink(this.paths.archive) : null;

    const lock = lockOptions(config);
    this.lineage = new LineageChainManager(
      new JsonFileLineageStore(this.paths.lineage, { backupDir: this.paths.lineageBackups, lock }),
      { logger: this.logger, archive: this.archive, clock: this.clock },
    );
    this.proposals = new FileProposalStore(this.paths.proposals, { lock });
  }

  // ===========================================================================
  // Registry
  // ===========================================================================

  async buildRegistry(): Promise<OperationResult<"build-registry">> {
    return this.run("build-registry", async () => {
      const layout = this.layout();
      const scanner =
        this.scanner ??
        new FileManifestationScanner(
          readDocument(this.paths.catalog, CatalogSchema, "Catalog"),
          this.paths.root,
          layout,
        );

      const registry = buildRegistry(await scanner.scan(), {
        version: this.config.REGISTRY_VERSION,
        layout,
        generatedAt: this.clock().toISOString(),
      });
      writeDocument(this.paths.registry, registry);

      const ruleStatus: Record<RuleStatus, number> = { compliant: 0, partial: 0, missing: 0 };
      for (const standard of registry.standards) {
        for (const rule of standard.rules) ruleStatus[rule.status]++;
      }

      this.logger.info(
        {
          global_merkle_root: registry.global_merkle_root,
          total_rules: registry.total_rules,
          compliance_score: registry.compliance_score,
        },
        "registry built",
      );

      return {
        ok: true,
        report: {
          registry_path: this.rel(this.paths.registry),
          version: registry.version,
          generated_at: registry.generated_at,
          global_merkle_root: registry.global_merkle_root,
          compliance_score: registry.compliance_score,
          total_rules: registry.total_rules,
          total_manifestations: registry.total_manifestations,
          standards: registry.standards.map((s) => ({
            standard_id: s.standard_id,
            merkle_root: s.merkle_root,
            compliance_score: s.compliance_score,
            rules: s.rules.length,
          })),
          rule_status: ruleStatus,
        },
      };
    });
  }

  async verifyRegistry(options: VerifyOptions = {}): Promise<OperationResult<"verify-registry">> {
    return this.run("verify-registry", async () => {
      const registry = this.readRegistry();
      const report = verifyRegistry(registry, this.layout());

      const attestation =
        options.verifySignatures === true
          ? await verifyAttestation(this.readAttestation(), summarizeRegistry(registry))
          : null;

      return {
        ok: report.valid && (attestation?.valid ?? true),
        report: { registry_path: this.rel(this.paths.registry), registry: report, attestation },
      };
    });
  }

  // ===========================================================================
  // Attestation
  // ===========================================================================

  async signRegistry(): Promise<OperationResult<"sign-registry">> {
    return this.run("sign-registry", async () => {
      const registry = this.readRegistry();
      const check = verifyRegistry(registry, this.layout());
      if (!check.valid) {
        throw new IntegrityError("Refusing to sign a registry that fails verification", {
          violations: check.violations.length,
          first: check.violations[0]?.message,
        });
      }

      const signer = createSigner({
        backend: this.config.SIGNER_BACKEND,
        secretKey: this.config.SIGNER_SECRET_KEY,
      });
      const now = this.clock();
      const attestation = await signRegistry(summarizeRegistry(registry), signer, {
        signedAt: now.toISOString(),
      });
      // archive first: a refused snapshot leaves the current attestation in place
      const snapshot =
        this.archive === null
          ? null
          : await this.archive.archive("attestation", attestation.message_hash, attestation, now);
      writeDocument(this.paths.attestation, attestation);

      this.logger.info(
        {
          message_hash: attestation.message_hash,
          backend: attestation.signature.backend,
          snapshot: snapshot?.location ?? null,
        },
        "registry signed",
      );

      return {
        ok: true,
        report: {
          attestation_path: this.rel(this.paths.attestation),
          message_hash: attestation.message_hash,
          algorithm: attestation.signature.algorithm,
          backend: attestation.signature.backend,
          signed_at: attestation.signed_at,
          snapshot,
        },
      };
    });
  }

  async verifySignature(): Promise<OperationResult<"verify-signature">> {
    return this.run("verify-signature", async () => {
      const attestation = this.readAttestation();
      const verification = await verifyAttestation(attestation, summarizeRegistry(this.readRegistry()));
      return {
        ok: verification.valid,
        report: { attestation_path: this.rel(this.paths.attestation), verification },
      };
    });
  }

  // ===========================================================================
  // Governance
  // ===========================================================================

  async proposeUpdate(options: ProposeUpdateOptions = {}): Promise<OperationResult<"propose-update">> {
    return this.run("propose-update", async () => {
      const registry = this.readRegistry();
      const summary = this.assertRegistry(registry);
      const attestation = optionalDocument(this.paths.attestation, AttestationDocumentSchema, "Attestation");
      if (attestation !== null) await assertAttestation(attestation, summary);

      const chain = await this.lineage.load();
      const tip = lastEntry(chain);
      const snapshot = attestation === null ? null : await this.snapshotOf(attestation);

      const entry = buildCandidateEntry(
        chain,
        {
          summary,
          ruleRoots: ruleRoots(registry),
          attestation: attestation === null ? null : this.refTo(attestation, snapshot),
          attribution: {
            actor: this.config.ACTOR,
            event: "propose-update",
            commit_ref: await this.attribution.revision(),
          },
        },
        this.clock(),
      );

      const proposal = await this.engine().create({
        entry,
        params: governanceParams(this.config, options.force === true),
        attestation,
        chain,
        ...(options.title !== undefined ? { title: options.title } : {}),
        evidence: {
          registry: {
            path: this.rel(this.paths.registry),
            sha256: fileDigest(this.paths.registry) ?? "",
          },
          attestation: {
            path: this.rel(this.paths.attestation),
            sha256: fileDigest(this.paths.attestation) ?? "",
          },
          snapshot,
          lineage: {
            path: this.rel(this.paths.lineage),
            tip_entry_id: tip?.entry_id ?? null,
            tip_merkle_root: tip?.global_merkle_root ?? null,
          },
        },
      });

      return {
        ok: true,
        report: {
          proposal_id: proposal.proposal_id,
          location: this.rel(this.proposals.pathOf(proposal.proposal_id)),
          proposal,
        },
      };
    });
  }

  async validateProposal(proposalId: string): Promise<OperationResult<"validate-proposal">> {
    return this.run("validate-proposal", async () => {
      const proposal = await this.engine().get(proposalId);
      const registryPath = this.abs(proposal.evidence.registry.path);
      const attestationPath = this.abs(proposal.evidence.attestation.path);
      const registry = optionalDocument(registryPath, RegistryDocumentSchema, "Registry");

      const validation = validateProposal(proposal, {
        chain: await this.lineage.load(),
        attestation: optionalDocument(attestationPath, AttestationDocumentSchema, "Attestation"),
        registry: registry === null ? null : summarizeRegistry(registry),
        digests: {
          registry: fileDigest(registryPath),
          attestation: fileDigest(attestationPath),
        },
      });
      return { ok: validation.valid, report: validation };
    });
  }

  async startVoting(proposalId: string): Promise<OperationResult<"start-voting">> {
    return this.run("start-voting", async () => {
      const proposal = await this.engine().startVoting(proposalId);
      return {
        ok: true,
        report: {
          proposal_id: proposal.proposal_id,
          status: proposal.status,
          voting_start: proposal.voting.voting_start,
          voting_end: proposal.voting.voting_end,
        },
      };
    });
  }

  async castVote(
    proposalId: string,
    validatorId: string,
    choice: string,
  ): Promise<OperationResult<"cast-vote">> {
    return this.run("cast-vote", async () => {
      const proposal = await this.engine(this.readRoster()).castVote(proposalId, validatorId, choice);
      const recorded = proposal.voting.votes[validatorId];
      if (recorded === undefined) {
        throw new GovernanceError(`Vote by ${validatorId} was not recorded`, {
          proposal_id: proposalId,
          validator_id: validatorId,
        });
      }
      return {
        ok: true,
        report: {
          proposal_id: proposal.proposal_id,
          validator_id: validatorId,
          choice: recorded,
          tallies: proposal.voting.tallies,
        },
      };
    });
  }

  /**
   * Advance a proposal: tally it while VOTING, then execute it once
   * approved and past the execution delay (immediately under force or a
   * zero delay). Rerunning on an APPROVED proposal executes it when eligible.
   */
  async tally(proposalId: string, options: LedgerTallyOptions = {}): Promise<OperationResult<"tally">> {
    return this.run("tally", async () => {
      const engine = this.engine(this.readRoster());
      const force = options.force === true;
      const dryRun = options.dryRun === true;

      let proposal = await engine.get(proposalId);
      if (proposal.status === "VOTING") {
        proposal = (await engine.tally(proposalId, { force, dryRun })).proposal;
      } else if (proposal.status !== "APPROVED") {
        throw new GovernanceError(`Proposal ${proposalId} is ${proposal.status}; nothing to tally or execute`, {
          proposal_id: proposalId,
          status: proposal.status,
        });
      }

      const eligible = executableAt(proposal);
      if (
        !dryRun &&
        proposal.status === "APPROVED" &&
        eligible !== null &&
        (force || this.clock().getTime() >= eligible.getTime())
      ) {
        proposal = await this.execute(engine, proposalId, force);
      }

      return {
        ok: proposal.voting.result?.approved === true && proposal.status !== "EXECUTION_FAILED",
        report: {
          proposal_id: proposal.proposal_id,
          status: proposal.status,
          dry_run: dryRun,
          result: proposal.voting.result,
          executable_at: executableAt(proposal)?.toISOString() ?? null,
          execution: proposal.execution,
        },
      };
    });
  }

  // ===========================================================================
  // Lineage
  // ===========================================================================

  async verifyLineage(options: VerifyOptions = {}): Promise<OperationResult<"verify-lineage">> {
    return this.run("verify-lineage", async () => {
      const report = await this.lineage.verify({
        verifySignatures: options.verifySignatures === true,
        resolveAttestation: this.resolver(),
      });
      return { ok: report.valid, report };
    });
  }

  /**
   * Append the current signed registry directly, without a proposal.
   */
  async updateLineage(options: UpdateLineageOptions = {}): Promise<OperationResult<"update-lineage">> {
    return this.run("update-lineage", async () => {
      const registry = this.readRegistry();
      const summary = this.assertRegistry(registry);
      const attestation = optionalDocument(this.paths.attestation, AttestationDocumentSchema, "Attestation");
      if (attestation !== null) await assertAttestation(attestation, summary);

      const chain = await this.lineage.load();
      const snapshot = attestation === null ? null : await this.snapshotOf(attestation);
      const candidate = buildCandidateEntry(
        chain,
        {
          summary,
          ruleRoots: ruleRoots(registry),
          attestation: attestation === null ? null : this.refTo(attestation, snapshot),
          attribution: {
            actor: this.config.ACTOR,
            event: "update-lineage",
            commit_ref: await this.attribution.revision(),
          },
        },
        this.clock(),
      );

      if (options.dryRun === true) {
        const tip = lastEntry(chain);
        if (tip !== null && tip.global_merkle_root === candidate.global_merkle_root && options.force !== true) {
          throw new DuplicateStateError(
            `Global Merkle root ${candidate.global_merkle_root} is already the lineage tip (entry ${tip.entry_id})`,
            { entry_id: tip.entry_id },
          );
        }
        return {
          ok: true,
          report: { dry_run: true, entry: candidate, backup: null, snapshot: null, warnings: [] },
        };
      }

      const appended = await this.lineage.append(candidate, { force: options.force === true });
      return {
        ok: true,
        report: {
          dry_run: false,
          entry: appended.entry,
          backup: appended.backup === null ? null : this.rel(appended.backup),
          snapshot: appended.snapshot,
          warnings: appended.warnings,
        },
      };
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async run<K extends OperationName>(
    operation: K,
    fn: () => Promise<Outcome<K>>,
  ): Promise<OperationResult<K>> {
    try {
      const { ok, report } = await fn();
      return { operation, ok, exitCode: ok ? 0 : 1, report, error: null };
    } catch (err) {
      let exitCode: ExitCode;
      let error: ErrorInfo;
      if (isConfigurationError(err)) {
        exitCode = 2;
        error = errorInfo(err, err.details);
      } else if (isLedgerError(err)) {
        exitCode = 1;
        error = errorInfo(err, err.details);
      } else {
        throw err;
      }
      this.logger.warn({ operation, code: error.code, err: error.message }, "operation failed");
      return { operation, ok: false, exitCode, report: null, error };
    }
  }

  private async execute(engine: VotingEngine, proposalId: string, force: boolean): Promise<Proposal> {
    try {
      return (await engine.execute(proposalId, { force })).proposal;
    } catch (err) {
      // The engine has already recorded EXECUTION_FAILED
      if (err instanceof ExecutionError) return engine.get(proposalId);
      throw err;
    }
  }

  private engine(roster: ValidatorRoster = ValidatorRoster.from([])): VotingEngine {
    return new VotingEngine(this.proposals, roster, this.lineage, {
      logger: this.logger,
      clock: this.clock,
    });
  }

  private layout(): SlotLayout {
    return slotLayout(this.config);
  }

  private readRegistry(): GlobalRegistry {
    return readDocument(this.paths.registry, RegistryDocumentSchema, "Registry");
  }

  private readAttestation(): Attestation {
    return readDocument(this.paths.attestation, AttestationDocumentSchema, "Attestation");
  }

  private readRoster(): ValidatorRoster {
    return ValidatorRoster.fromDocument(
      readDocument(this.paths.validators, ValidatorRosterSchema, "Validator roster"),
    );
  }

  /**
   * Summary of a registry that verifies.
   *
   * @throws IntegrityError otherwise; partial registries are never proposed
   */
  private assertRegistry(registry: GlobalRegistry): RegistrySummary {
    const check = verifyRegistry(registry, this.layout());
    if (!check.valid) {
      throw new IntegrityError("Registry fails verification", {
        violations: check.violations.length,
        first: check.violations[0]?.message,
      });
    }
    return summarizeRegistry(registry);
  }

  /** Archived copy of an attestation, relative to the ledger root */
  private async snapshotOf(attestation: Attestation): Promise<string | null> {
    if (this.archive === null) return null;
    const location = await this.archive.locate("attestation", attestation.message_hash);
    return location === null ? null : this.rel(location);
  }

  private refTo(attestation: Attestation, snapshot: string | null): AttestationRef {
    return attestationRef(attestation, this.rel(this.paths.attestation), snapshot);
  }

  /**
   * Loads the attestation an entry references: the archived snapshot
   * first, then the attestation path. Only a document whose message hash
   * matches the reference counts.
   */
  private resolver(): AttestationResolver {
    return async (ref) => {
      for (const candidate of [ref.snapshot_ref, ref.attestation_path]) {
        if (candidate === null) continue;
        const path = this.abs(candidate);
        if (!existsSync(path)) continue;

        const parsed = AttestationDocumentSchema.safeParse(parseJson(readFileSync(path, "utf8")));
        if (parsed.success && parsed.data.message_hash === ref.message_hash) return parsed.data;
      }
      return null;
    };
  }

  private rel(path: string): string {
    const r = relative(this.paths.root, path);
    return r === "" ? "." : r.split(sep).join("/");
  }

  private abs(path: string): string {
    return isAbsolute(path) ? path : resolve(this.paths.root, path);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // An unreadable document resolves to nothing
    return null;
  }
}
