import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/** Bytes of entropy in a generated passphrase */
export const PASSPHRASE_BYTES = 32;

/**
 * Random passphrase, base64url encoded (43 characters for 32 bytes)
 */
export function generateSecurePassphrase(byteLength: number = PASSPHRASE_BYTES): string {
  return randomBytes(byteLength).toString("base64url");
}

export function computeStringHash(content: string): string {
  const hash = createHash("sha256");
  hash.update(content);
  return hash.digest("hex");
}

/**
 * Constant-time comparison of two secrets
 */
export function secretsEqual(a: string, b: string): boolean {
  const left = Buffer.from(computeStringHash(a), "hex");
  const right = Buffer.from(computeStringHash(b), "hex");
  return timingSafeEqual(left, right);
}
