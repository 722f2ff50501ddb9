/**
 * Signer backends.
 *
 * A Signer is chosen once at startup from configuration. Verification
 * needs only a Verifier, resolved from the backend name stored in the
 * attestation being checked.
 *
 * Backends:
 * - placeholder: SHA-256 keyed stand-in. Anyone holding the public key
 *   can forge it; it exists so pipelines run without key infrastructure
 * - ed25519: @noble/ed25519
 */

import { createHash, timingSafeEqual } from "node:crypto";
import * as ed from "@noble/ed25519";
import { EvidenceMissingError } from "@compliance-ledger/types";
import { fromHex } from "./canonical.js";

export type SignerBackendName = "placeholder" | "ed25519";

export interface Verifier {
  readonly algorithm: string;
  readonly backend: string;
  verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): Promise<boolean>;
}

export interface Signer extends Verifier {
  publicKey(): Promise<Uint8Array>;
  sign(message: Uint8Array): Promise<Uint8Array>;
}

export interface SignerOptions {
  readonly backend: SignerBackendName;

  /** Hex-encoded secret key material */
  readonly secretKey?: string | undefined;
}

function sha256Bytes(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash("sha256");
  for (const part of parts) hash.update(part);
  return new Uint8Array(hash.digest());
}

function decodeSecret(backend: string, secretKey: string | undefined, length?: number): Uint8Array {
  const bytes = secretKey === undefined || secretKey === "" ? null : fromHex(secretKey);
  if (bytes === null || bytes.length === 0) {
    throw new EvidenceMissingError(`No usable secret key for the ${backend} signer`, { backend });
  }
  if (length !== undefined && bytes.length !== length) {
    throw new EvidenceMissingError(
      `The ${backend} signer needs a ${length}-byte secret key, got ${bytes.length}`,
      { backend },
    );
  }
  return bytes;
}

// =============================================================================
// Placeholder
// =============================================================================

export class PlaceholderVerifier implements Verifier {
  readonly algorithm = "SHA256-KEYED";
  readonly backend = "placeholder";

  async verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): Promise<boolean> {
    const expected = sha256Bytes(publicKey, message);
    return signature.length === expected.length && timingSafeEqual(signature, expected);
  }
}

export class PlaceholderSigner extends PlaceholderVerifier implements Signer {
  private readonly pub: Uint8Array;

  constructor(secretKey: string | undefined) {
    super();
    this.pub = sha256Bytes(decodeSecret("placeholder", secretKey));
  }

  async publicKey(): Promise<Uint8Array> {
    return this.pub;
  }

  async sign(message: Uint8Array): Promise<Uint8Array> {
    return sha256Bytes(this.pub, message);
  }
}

// =============================================================================
// Ed25519
// =============================================================================

export class Ed25519Verifier implements Verifier {
  readonly algorithm = "Ed25519";
  readonly backend = "ed25519";

  async verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): Promise<boolean> {
    try {
      return await ed.verifyAsync(signature, message, publicKey);
    } catch {
      // Malformed points or lengths are invalid signatures, not faults
      return false;
    }
  }
}

export class Ed25519Signer extends Ed25519Verifier implements Signer {
  private readonly secret: Uint8Array;

  constructor(secretKey: string | undefined) {
    super();
    this.secret = decodeSecret("ed25519", secretKey, 32);
  }

  static generateSecretKey(): string {
    return Buffer.from(ed.utils.randomPrivateKey()).toString("hex");
  }

  publicKey(): Promise<Uint8Array> {
    return ed.getPublicKeyAsync(this.secret);
  }

  sign(message: Uint8Array): Promise<Uint8Array> {
    return ed.signAsync(message, this.secret);
  }
}

// =============================================================================
// Selection
// =============================================================================

/**
 * @throws EvidenceMissingError when the backend's key material is missing
 */
export function createSigner(options: SignerOptions): Signer {
  switch (options.backend) {
    case "placeholder":
      return new PlaceholderSigner(options.secretKey);
    case "ed25519":
      return new Ed25519Signer(options.secretKey);
  }
}

/**
 * Verifier for a stored backend name, or null when none is known.
 */
export function createVerifier(backend: string): Verifier | null {
  switch (backend) {
    case "placeholder":
      return new PlaceholderVerifier();
    case "ed25519":
      return new Ed25519Verifier();
    default:
      return null;
  }
}
