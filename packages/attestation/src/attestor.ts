/**
 * Attestor — signs registry summaries and re-verifies attestations.
 *
 * Verification order:
 * 1. Recompute message_hash from the summary being checked against
 *    (the current registry); mismatch is registry drift
 * 2. Recompute message_hash from the stored payload; mismatch is
 *    payload tampering
 * 3. Resolve a verifier for the stored backend
 * 4. Cryptographic verify over the canonical message
 *
 * Steps 1 and 2 need no signer backend, so drift is told apart from a
 * bad signature before any cryptography runs.
 */

import { IntegrityError } from "@compliance-ledger/types";
import type {
  Attestation,
  AttestationFailureReason,
  AttestationVerification,
  RegistrySummary,
} from "@compliance-ledger/types";
import { fromHex, messageBytes, messageHash, toHex } from "./canonical.js";
import { createVerifier } from "./signer.js";
import type { Signer, Verifier } from "./signer.js";

export const ATTESTATION_VERSION = "1.0";

export interface SignOptions {
  /** ISO-8601 signing time; defaults to now */
  readonly signedAt?: string;
}

/**
 * Sign a registry summary.
 *
 * @throws EvidenceMissingError from the signer when key material is absent
 */
export async function signRegistry(
  summary: RegistrySummary,
  signer: Signer,
  options: SignOptions = {},
): Promise<Attestation> {
  const signedAt = options.signedAt ?? new Date().toISOString();
  const message = messageBytes(summary);
  const signature = await signer.sign(message);
  const publicKey = await signer.publicKey();

  return {
    version: ATTESTATION_VERSION,
    signed_at: signedAt,
    payload: {
      global_merkle_root: summary.global_merkle_root,
      standard_merkle_roots: { ...summary.standard_merkle_roots },
      total_rules: summary.total_rules,
      total_manifestations: summary.total_manifestations,
      compliance_score: summary.compliance_score,
      version: summary.version,
      generated_at: summary.generated_at,
    },
    message_hash: messageHash(summary),
    signature: {
      algorithm: signer.algorithm,
      backend: signer.backend,
      signature_bytes: toHex(signature),
      size: signature.length,
      created_at: signedAt,
    },
    public_key: {
      algorithm: signer.algorithm,
      backend: signer.backend,
      key_bytes: toHex(publicKey),
      created_at: signedAt,
    },
  };
}

function fail(
  reason: AttestationFailureReason,
  message: string,
  recomputed: string,
  stored: string,
): AttestationVerification {
  return { valid: false, reason, message, recomputed_hash: recomputed, stored_hash: stored };
}

/**
 * Verify an attestation against the summary it should attest to.
 * Never throws for bad content; the reason says what failed.
 */
export async function verifyAttestation(
  attestation: Attestation,
  current: RegistrySummary,
  verifier: Verifier | null = createVerifier(attestation.signature.backend),
): Promise<AttestationVerification> {
  const stored = attestation.message_hash;
  const recomputed = messageHash(current);

  if (recomputed !== stored) {
    return fail(
      "registry_drift",
      "Registry has changed since it was signed",
      recomputed,
      stored,
    );
  }

  if (messageHash(attestation.payload) !== stored) {
    return fail(
      "payload_tampered",
      "Stored payload does not hash to the stored message hash",
      recomputed,
      stored,
    );
  }

  if (
    verifier === null ||
    verifier.backend !== attestation.signature.backend ||
    verifier.algorithm !== attestation.signature.algorithm ||
    attestation.public_key.backend !== attestation.signature.backend
  ) {
    return fail(
      "backend_mismatch",
      `No verifier for ${attestation.signature.algorithm} (${attestation.signature.backend})`,
      recomputed,
      stored,
    );
  }

  const signature = fromHex(attestation.signature.signature_bytes);
  const publicKey = fromHex(attestation.public_key.key_bytes);
  const ok =
    signature !== null &&
    publicKey !== null &&
    signature.length === attestation.signature.size &&
    (await verifier.verify(messageBytes(attestation.payload), signature, publicKey));

  if (!ok) {
    return fail(
      "invalid_signature",
      "Signature does not verify against the public key",
      recomputed,
      stored,
    );
  }

  return {
    valid: true,
    message: "Attestation verified",
    recomputed_hash: recomputed,
    stored_hash: stored,
  };
}

/**
 * verifyAttestation, throwing on failure.
 *
 * @throws IntegrityError carrying the failure reason
 */
export async function assertAttestation(
  attestation: Attestation,
  current: RegistrySummary,
  verifier?: Verifier | null,
): Promise<void> {
  const result = await verifyAttestation(attestation, current, verifier);
  if (!result.valid) {
    throw new IntegrityError(result.message, {
      reason: result.reason,
      recomputed_hash: result.recomputed_hash,
      stored_hash: result.stored_hash,
    });
  }
}
