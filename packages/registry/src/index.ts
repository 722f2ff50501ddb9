/**
 * @compliance-ledger/registry — Merkle Registry Builder.
 *
 * Aggregates manifestation slot hashes into rule, standard and global
 * Merkle roots; verifies stored registries; proves slot inclusion.
 */

export { MerkleTree, hashPair } from "./merkle-tree.js";
export { sha256, MISSING_SLOT_HASH } from "./hashing.js";
export {
  buildRegistry,
  buildStandard,
  buildRule,
  aggregateRoots,
  compareIds,
  leafHash,
  ruleStatus,
} from "./builder.js";
export type { BuildOptions } from "./builder.js";
export { summarizeRegistry, ruleRoots, ruleKey } from "./summary.js";
export { verifyRegistry } from "./verify.js";
export { proveManifestation, verifyManifestationProof } from "./proof.js";
export { FileManifestationScanner } from "./scanner.js";
export type {
  ManifestationScanner,
  ManifestationCatalog,
  CatalogStandard,
  CatalogRule,
} from "./scanner.js";
export { DEFAULT_SLOT_LAYOUT, DEFAULT_SLOT_ROLES } from "./types.js";
export type {
  SlotLayout,
  MerkleProof,
  MerkleProofStep,
  RegistryViolation,
  RegistryViolationKind,
  RegistryReport,
  ManifestationProof,
} from "./types.js";
