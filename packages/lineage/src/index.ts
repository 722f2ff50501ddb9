/**
 * @compliance-ledger/lineage — Lineage Chain Manager.
 *
 * Append-only, hash-linked custody of registry snapshots: candidate
 * construction, change classification, locked appends with backup and
 * atomic write, and full-chain verification.
 */

export {
  computeEntryHash,
  verifyLineageChain,
  buildMetadata,
  emptyChain,
  lastEntry,
  entrySummary,
  CHAIN_VERSION,
} from "./hash-chain.js";
export { classifyChanges } from "./changes.js";
export type { ChangeSubject } from "./changes.js";
export {
  buildCandidateEntry,
  sealEntry,
  nextTimestamp,
  attestationRef,
} from "./candidate.js";
export type { CandidateSource } from "./candidate.js";
export { LineageChainManager, verifyLineage } from "./chain-manager.js";
export type {
  AppendOptions,
  AppendResult,
  AttestationResolver,
  VerifyOptions,
  LineageChainManagerOptions,
} from "./chain-manager.js";
export { InMemoryLineageStore, JsonFileLineageStore } from "./lineage-store.js";
export type { LineageStore, CommitResult, JsonFileLineageStoreOptions } from "./lineage-store.js";
export { withFileLock } from "./file-lock.js";
export type { FileLockOptions } from "./file-lock.js";
export { KeyedMutex } from "./mutex.js";
export { atomicWriteJson, serializeJson } from "./atomic-write.js";
export {
  NullAttributionProvider,
  StaticAttributionProvider,
  GitAttributionProvider,
} from "./attribution.js";
export type { AttributionProvider } from "./attribution.js";
export { LineageChainSchema, LineageEntrySchema, describeIssues } from "./schema.js";
