/**
 * @compliance-ledger/attestation — Attestation Signing Interface.
 *
 * Canonical registry messages, pluggable signer backends, attestation
 * verification, and the immutable archival sink.
 */

export { canonicalSummary, messageBytes, messageHash, toHex, fromHex } from "./canonical.js";
export {
  PlaceholderSigner,
  PlaceholderVerifier,
  Ed25519Signer,
  Ed25519Verifier,
  createSigner,
  createVerifier,
} from "./signer.js";
export type { Signer, Verifier, SignerOptions, SignerBackendName } from "./signer.js";
export {
  signRegistry,
  verifyAttestation,
  assertAttestation,
  ATTESTATION_VERSION,
} from "./attestor.js";
export type { SignOptions } from "./attestor.js";
export {
  FileArchivalSink,
  InMemoryArchivalSink,
  archiveName,
  compactTimestamp,
} from "./archive.js";
export type { ArchivalSink } from "./archive.js";
