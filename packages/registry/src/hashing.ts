import { createHash } from "node:crypto";

/**
 * SHA-256 of a string (UTF-8) or bytes, lowercase hex.
 */
export function sha256(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Leaf value for a slot whose artifact is absent: SHA-256("MISSING").
 */
export const MISSING_SLOT_HASH: string = sha256("MISSING");
