/**
 * Attestation Types
 *
 * An attestation is a signature over the canonical serialization of a
 * RegistrySummary. The message hash is stored beside the signature so
 * drift can be detected without the signer backend.
 */

import type { HexHash, RegistrySummary } from "./registry.js";

export interface AttestationSignature {
  readonly algorithm: string;
  readonly backend: string;

  /** Hex-encoded signature bytes */
  readonly signature_bytes: string;

  /** Signature length in bytes */
  readonly size: number;

  readonly created_at: string;
}

export interface AttestationPublicKey {
  readonly algorithm: string;
  readonly backend: string;

  /** Hex-encoded public key bytes */
  readonly key_bytes: string;

  readonly created_at: string;
}

/**
 * The attestation document as persisted and archived.
 */
export interface Attestation {
  readonly version: string;
  readonly signed_at: string;
  readonly payload: RegistrySummary;
  readonly message_hash: HexHash;
  readonly signature: AttestationSignature;
  readonly public_key: AttestationPublicKey;
}

/**
 * Why an attestation failed verification.
 *
 * - registry_drift: the current registry no longer hashes to message_hash
 * - payload_tampered: the stored payload no longer hashes to message_hash
 * - backend_mismatch: the verifier cannot check this backend's signatures
 * - invalid_signature: the signature does not verify against the public key
 */
export type AttestationFailureReason =
  | "registry_drift"
  | "payload_tampered"
  | "backend_mismatch"
  | "invalid_signature";

export interface AttestationVerification {
  readonly valid: boolean;
  readonly reason?: AttestationFailureReason;
  readonly message: string;

  /** message_hash recomputed from the summary checked against */
  readonly recomputed_hash: HexHash;

  /** message_hash stored in the attestation */
  readonly stored_hash: HexHash;
}

/**
 * Receipt for a document mirrored into the immutable archive.
 */
export interface ArchiveReceipt {
  readonly kind: string;
  readonly snapshot_id: string;
  readonly location: string;
  readonly archived_at: string;
  readonly content_hash: HexHash;
}
