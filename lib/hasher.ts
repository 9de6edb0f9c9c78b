// ---------------------------------------------------------------------------
// clanker-guard secret hashing
// argon2id one-way digests for API keys and the admin credential
// ---------------------------------------------------------------------------

import crypto from "crypto";
import * as argon2 from "argon2";
import { MalformedDigestError } from "./errors";

const SECRET_BYTES = 32;
const ARGON2ID_PREFIX = "$argon2id$";

export interface SecretHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
  /** True if the digest was produced by this hasher's algorithm. */
  supports(digest: string): boolean;
  /** Throws MalformedDigestError if the digest cannot be parsed. */
  validate(digest: string): void;
}

export interface Argon2Options {
  memoryCost?: number;   // KiB
  timeCost?: number;
  parallelism?: number;
}

/**
 * argon2id hasher. Every call to hash() draws a fresh random salt, so two
 * digests of the same plaintext differ. Verification is constant-time.
 */
export class Argon2Hasher implements SecretHasher {
  private readonly options: Required<Argon2Options>;

  constructor(options: Argon2Options = {}) {
    this.options = {
      memoryCost: options.memoryCost ?? 65536,
      timeCost: options.timeCost ?? 3,
      parallelism: options.parallelism ?? 4,
    };
  }

  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, {
      type: argon2.argon2id,
      memoryCost: this.options.memoryCost,
      timeCost: this.options.timeCost,
      parallelism: this.options.parallelism,
    });
  }

  async verify(plaintext: string, digest: string): Promise<boolean> {
    assertWellFormed(digest);
    try {
      return await argon2.verify(digest, plaintext);
    } catch (err) {
      throw new MalformedDigestError(
        `Unreadable argon2 digest: ${err instanceof Error ? err.message : "verify failed"}`
      );
    }
  }

  supports(digest: string): boolean {
    return digest.startsWith(ARGON2ID_PREFIX);
  }

  validate(digest: string): void {
    assertWellFormed(digest);
  }
}

/**
 * Structural check of a PHC argon2id string:
 *   $argon2id$v=19$m=65536,t=3,p=4$<salt>$<hash>
 */
export function assertWellFormed(digest: string): void {
  const parts = digest.split("$");
  const ok =
    parts.length === 6 &&
    parts[0] === "" &&
    parts[1] === "argon2id" &&
    /^v=\d+$/.test(parts[2]) &&
    /^m=\d+,t=\d+,p=\d+$/.test(parts[3]) &&
    /^[A-Za-z0-9+/]+$/.test(parts[4]) &&
    /^[A-Za-z0-9+/]+$/.test(parts[5]);

  if (!ok) {
    throw new MalformedDigestError("Digest is not an argon2id PHC string");
  }
}

/**
 * Generate a URL-safe random secret suitable for an API key.
 */
export function generateSecret(bytes: number = SECRET_BYTES): string {
  return crypto.randomBytes(bytes).toString("base64url");
}
