// ---------------------------------------------------------------------------
// clanker-guard storage backends
// Abstraction layer with in-memory (tests), file (self-hosted) and
// Vercel KV (hosted) backends
// ---------------------------------------------------------------------------

import crypto from "crypto";
import { promises as fs } from "fs";
import path from "path";

// ---------------------------------------------------------------------------
// Storage interface
// ---------------------------------------------------------------------------

export interface StorageBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  del(key: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// In-memory backend (development / testing)
// ---------------------------------------------------------------------------

export class MemoryStorage implements StorageBackend {
  private store = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  /** Testing helper: whether a key is present */
  has(key: string): boolean {
    return this.store.has(key);
  }
}

// ---------------------------------------------------------------------------
// File backend: one JSON document per key inside a directory
// ---------------------------------------------------------------------------

export class FileStorage implements StorageBackend {
  constructor(private readonly dir: string) {}

  async get(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(key), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /**
   * Write to a temp file beside the target, then rename over it. A crash
   * mid-write leaves the previous document intact.
   */
  async set(key: string, value: string): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.pathFor(key);
    const tmp = `${target}.${crypto.randomBytes(6).toString("hex")}.tmp`;

    const handle = await fs.open(tmp, "w", 0o600);
    try {
      await handle.writeFile(value, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  async del(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    return path.join(this.dir, `${encodeURIComponent(key)}.json`);
  }
}

export function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// Vercel KV backend (hosted deployments)
// ---------------------------------------------------------------------------

export class VercelKVStorage implements StorageBackend {
  private kv: typeof import("@vercel/kv").kv | null = null;

  private async getKV() {
    if (!this.kv) {
      const mod = await import("@vercel/kv");
      this.kv = mod.kv;
    }
    return this.kv;
  }

  async get(key: string): Promise<string | null> {
    const kv = await this.getKV();
    const value = await kv.get<unknown>(key);
    if (value === null || value === undefined) return null;
    // KV decodes JSON strings on read; re-encode so callers always get text
    return typeof value === "string" ? value : JSON.stringify(value);
  }

  async set(key: string, value: string): Promise<void> {
    const kv = await this.getKV();
    await kv.set(key, value);
  }

  async del(key: string): Promise<void> {
    const kv = await this.getKV();
    await kv.del(key);
  }
}
