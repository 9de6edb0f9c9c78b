// ---------------------------------------------------------------------------
// clanker-guard credential store
// Shared lifecycle, persistence and locking for the admin credential and
// the API key registry
// ---------------------------------------------------------------------------

import type { StorageBackend } from "./storage";
import type { SecretHasher } from "./hasher";
import { Mutex } from "./mutex";
import {
  CorruptStoreError,
  DuplicateIdentityError,
  InvalidInputError,
  MalformedDigestError,
  NotFoundError,
} from "./errors";
import type { CredentialRecord, Created, PublicRecord } from "./types";

const NAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

export interface StoreOptions {
  storage: StorageBackend;
  hasher: SecretHasher;
  /** Storage key of the persisted document. */
  key: string;
  now?: () => Date;
}

/**
 * A durable set of hashed credentials keyed by name.
 *
 * The whole document is held in memory after open(). Mutations are
 * serialized through one lock per instance and persisted before the
 * in-memory view changes, so a failed write leaves the store as it was.
 * Reads take a snapshot without the lock.
 */
export abstract class CredentialStore<T extends CredentialRecord, M> {
  protected readonly storage: StorageBackend;
  protected readonly hasher: SecretHasher;
  protected readonly key: string;
  protected readonly now: () => Date;
  protected readonly lock = new Mutex();

  private records = new Map<string, T>();
  private opened = false;

  constructor(options: StoreOptions) {
    this.storage = options.storage;
    this.hasher = options.hasher;
    this.key = options.key;
    this.now = options.now ?? (() => new Date());
  }

  // ---- subclass hooks ----

  /** Parse the persisted document. Throws CorruptStoreError on bad shape. */
  protected abstract decode(raw: unknown): T[];
  protected abstract encode(records: T[]): unknown;
  protected abstract build(name: string, hash: string, metadata: M): T;

  /** Throws if a record named `name` may not be inserted. */
  protected assertInsertable(name: string, records: ReadonlyMap<string, T>): void {
    if (records.has(name)) {
      throw new DuplicateIdentityError(name);
    }
  }

  // ---- lifecycle ----

  async open(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const raw = await this.storage.get(this.key);
      const loaded = new Map<string, T>();

      if (raw !== null) {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch {
          throw new CorruptStoreError(`Credential document "${this.key}" is not valid JSON`);
        }

        for (const record of this.decode(parsed)) {
          if (loaded.has(record.name)) {
            throw new CorruptStoreError(
              `Credential document "${this.key}" lists "${record.name}" twice`
            );
          }
          this.checkDigest(record);
          loaded.set(record.name, record);
        }
      }

      this.records = loaded;
      this.opened = true;
    });
  }

  /**
   * Wait for in-flight mutations and detach. Every mutation is already
   * persisted, and another process (the CLI) may have written the document
   * since open(), so nothing is flushed here.
   */
  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.opened = false;
      this.records = new Map();
    });
  }

  get isOpen(): boolean {
    return this.opened;
  }

  // ---- operations ----

  /**
   * Create a credential. The plaintext secret is returned here and never
   * again. Identities are not recycled, revoked or not.
   */
  async create(name: string, secret: string, metadata: M): Promise<Created<T>> {
    this.assertOpen();
    validateName(name);
    if (!secret) {
      throw new InvalidInputError("Secret must not be empty");
    }

    // Hash outside the lock so slow hashing does not block other writers.
    const hash = await this.hasher.hash(secret);

    const record = await this.mutate((records) => {
      this.assertInsertable(name, records);
      const created = this.build(name, hash, metadata);
      records.set(name, created);
      return created;
    });

    return { record: toPublic(record), secret };
  }

  async findByIdentity(name: string): Promise<PublicRecord<T>> {
    this.assertOpen();
    const record = this.records.get(name);
    if (!record) {
      throw new NotFoundError(name);
    }
    return toPublic(record);
  }

  async list(): Promise<PublicRecord<T>[]> {
    this.assertOpen();
    return Array.from(this.records.values(), toPublic);
  }

  /**
   * Permanently revoke a credential. Revoking an unknown or already
   * revoked identity raises NotFoundError.
   */
  async revoke(name: string): Promise<PublicRecord<T>> {
    this.assertOpen();
    const record = await this.mutate((records) => {
      const current = records.get(name);
      if (!current || current.revoked) {
        throw new NotFoundError(name);
      }
      const revoked: T = { ...current, revoked: true, revoked_at: this.now().toISOString() };
      records.set(name, revoked);
      return revoked;
    });
    return toPublic(record);
  }

  /** Record a successful authentication. Unknown or revoked names are ignored. */
  async touch(name: string): Promise<void> {
    this.assertOpen();
    await this.mutate((records) => {
      const current = records.get(name);
      if (!current || current.revoked) return;
      records.set(name, { ...current, last_used: this.now().toISOString() });
    });
  }

  /** Number of live (non-revoked) credentials. */
  countActive(): number {
    let n = 0;
    for (const record of this.records.values()) {
      if (!record.revoked) n += 1;
    }
    return n;
  }

  // ---- internal helpers ----

  /**
   * Verify `secret` against the named record. The snapshot is re-read after
   * the (slow) verify so a revocation acknowledged in the meantime wins.
   */
  protected async verifyNamed(name: string, secret: string): Promise<T | null> {
    const snapshot = this.records.get(name);
    if (!snapshot || snapshot.revoked || !this.hasher.supports(snapshot.hash)) {
      return null;
    }
    if (!(await this.hasher.verify(secret, snapshot.hash))) {
      return null;
    }
    const current = this.records.get(name);
    if (!current || current.revoked || current.hash !== snapshot.hash) {
      return null;
    }
    return current;
  }

  protected liveRecords(): T[] {
    return Array.from(this.records.values()).filter((r) => !r.revoked);
  }

  /**
   * Apply `fn` to a copy of the records under the lock, persist the copy,
   * then swap it in.
   */
  protected async mutate<R>(fn: (records: Map<string, T>) => R): Promise<R> {
    return this.lock.runExclusive(async () => {
      this.assertOpen();
      const draft = new Map(this.records);
      const result = fn(draft);
      await this.persist(draft);
      this.records = draft;
      return result;
    });
  }

  private async persist(records: ReadonlyMap<string, T>): Promise<void> {
    const document = this.encode(Array.from(records.values()));
    await this.storage.set(this.key, JSON.stringify(document, null, 2));
  }

  private checkDigest(record: T): void {
    if (!this.hasher.supports(record.hash)) {
      throw new CorruptStoreError(
        `Credential "${record.name}" in "${this.key}" uses an unsupported hash algorithm`
      );
    }
    try {
      this.hasher.validate(record.hash);
    } catch (err) {
      if (err instanceof MalformedDigestError) {
        throw new CorruptStoreError(
          `Credential "${record.name}" in "${this.key}" has a malformed digest`
        );
      }
      throw err;
    }
  }

  protected assertOpen(): void {
    if (!this.opened) {
      throw new Error(`Credential store "${this.key}" is not open`);
    }
  }
}

export function validateName(name: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidInputError(
      "Name must be 1-64 chars: letters, digits, dots, hyphens, underscores"
    );
  }
}

function toPublic<T extends CredentialRecord>(record: T): PublicRecord<T> {
  const { hash, ...safe } = record;
  return safe;
}

// ---------------------------------------------------------------------------
// Document decoding helpers shared by the concrete stores
// ---------------------------------------------------------------------------

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(
  item: Record<string, unknown>,
  field: string,
  where: string
): string {
  const value = item[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new CorruptStoreError(`${where}: field "${field}" must be a non-empty string`);
  }
  return value;
}

export function readOptionalString(
  item: Record<string, unknown>,
  field: string,
  where: string
): string | undefined {
  const value = item[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new CorruptStoreError(`${where}: field "${field}" must be a string`);
  }
  return value;
}

export function readBaseRecord(item: Record<string, unknown>, where: string): CredentialRecord {
  const revoked = item.revoked ?? false;
  if (typeof revoked !== "boolean") {
    throw new CorruptStoreError(`${where}: field "revoked" must be a boolean`);
  }

  const record: CredentialRecord = {
    name: readString(item, "name", where),
    hash: readString(item, "hash", where),
    created_at: readString(item, "created_at", where),
    revoked,
  };

  const revokedAt = readOptionalString(item, "revoked_at", where);
  if (revokedAt !== undefined) record.revoked_at = revokedAt;
  const lastUsed = readOptionalString(item, "last_used", where);
  if (lastUsed !== undefined) record.last_used = lastUsed;
  return record;
}
