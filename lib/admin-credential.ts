// ---------------------------------------------------------------------------
// clanker-guard admin credential
// Singleton store gating the key lifecycle routes
// ---------------------------------------------------------------------------

import { CredentialStore, type StoreOptions, isObject, readBaseRecord } from "./credential-store";
import { generateSecret } from "./hasher";
import { CorruptStoreError, DuplicateIdentityError, InvalidCredentialError } from "./errors";
import type { AdminRecord, Created } from "./types";

export const ADMIN_STORE_KEY = "admin";
export const DEFAULT_ADMIN_NAME = "admin";

export interface BootstrapOptions {
  name?: string;
  /** Replace an existing admin credential. */
  force?: boolean;
}

/**
 * Holds at most one admin record. Provisioned out of band through the CLI;
 * no HTTP route can mint or reveal it.
 */
export class AdminCredential extends CredentialStore<AdminRecord, Record<string, never>> {
  constructor(options: Omit<StoreOptions, "key"> & { key?: string }) {
    super({ ...options, key: options.key ?? ADMIN_STORE_KEY });
  }

  /**
   * Create the admin secret. Returns the plaintext once; only its digest is
   * kept, so losing it means bootstrapping again.
   */
  async bootstrap(options: BootstrapOptions = {}): Promise<Created<AdminRecord>> {
    this.assertOpen();
    const name = options.name ?? DEFAULT_ADMIN_NAME;
    const secret = generateSecret();

    if (options.force) {
      const hash = await this.hasher.hash(secret);
      const record = await this.mutate((records) => {
        records.clear();
        const created = this.build(name, hash);
        records.set(name, created);
        return created;
      });
      const { hash: _digest, ...safe } = record;
      return { record: safe, secret };
    }

    return this.create(name, secret, {});
  }

  /** Verify the admin secret. No identity is needed: there is only one. */
  async authenticate(secret: string): Promise<AdminRecord> {
    this.assertOpen();
    const [live] = this.liveRecords();
    if (!live) {
      throw new InvalidCredentialError("No admin credential is provisioned");
    }
    const record = await this.verifyNamed(live.name, secret);
    if (!record) {
      throw new InvalidCredentialError("Invalid admin key");
    }
    return record;
  }

  isProvisioned(): boolean {
    return this.countActive() > 0;
  }

  protected assertInsertable(_name: string, records: ReadonlyMap<string, AdminRecord>): void {
    const [existing] = records.keys();
    if (existing !== undefined) {
      throw new DuplicateIdentityError(existing);
    }
  }

  protected decode(raw: unknown): AdminRecord[] {
    if (!isObject(raw)) {
      throw new CorruptStoreError(`Admin document "${this.key}" must be a JSON object`);
    }
    if (Object.keys(raw).length === 0) return [];
    return [readBaseRecord(raw, `Admin document "${this.key}"`)];
  }

  protected encode(records: AdminRecord[]): unknown {
    const [record] = records;
    return record ?? {};
  }

  protected build(name: string, hash: string): AdminRecord {
    return {
      name,
      hash,
      created_at: this.now().toISOString(),
      revoked: false,
    };
  }
}
