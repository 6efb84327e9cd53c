import { createHash, timingSafeEqual } from "node:crypto";

import type { PasswordHasherPort } from "@credential-core/contracts";

export interface SaltedSha256HasherOptions {
  readonly salt: string;
}

/**
 * `hex(sha256(plaintext + salt))` with one application-wide salt. Deterministic so that digests
 * written by existing deployments keep verifying; not a substitute for a per-record KDF.
 */
export const createSaltedSha256Hasher = (options: SaltedSha256HasherOptions): PasswordHasherPort => {
  if (!options.salt) {
    throw new Error("Password hasher requires a non-empty salt");
  }
  const salt = options.salt;

  const hash = (plaintext: string): string =>
    createHash("sha256").update(`${plaintext}${salt}`, "utf8").digest("hex");

  return {
    hash,
    matches(plaintext, digest) {
      const presented = Buffer.from(hash(plaintext), "utf8");
      const stored = Buffer.from(digest, "utf8");
      return presented.length === stored.length && timingSafeEqual(presented, stored);
    },
  };
};
