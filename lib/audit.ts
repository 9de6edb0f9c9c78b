// ---------------------------------------------------------------------------
// clanker-guard audit logging
// Append-only log of authorization rejections and key lifecycle events
// ---------------------------------------------------------------------------

import crypto from "crypto";
import { Mutex } from "./mutex";
import type { Logger } from "./logger";
import type { StorageBackend } from "./storage";
import type { AuditEntry } from "./types";

const AUDIT_PREFIX = "audit:";
const AUDIT_INDEX = "audit_index:";
const MAX_INDEX_ENTRIES = 10000;

/** Audit bucket for rejections that never resolved to a key. */
export const ANONYMOUS = "anonymous";

interface IndexEntry {
  id: string;
  ts: number;
}

export interface AuditStats {
  total_events: number;
  rejections: number;
  last_event: number | null;
}

export interface AuditLogOptions {
  /** Entries kept per name; older ones are deleted from storage. */
  maxEntries?: number;
}

export class AuditLog {
  private readonly indexLock = new Mutex();
  private readonly maxEntries: number;

  constructor(private storage: StorageBackend, options: AuditLogOptions = {}) {
    this.maxEntries = options.maxEntries ?? MAX_INDEX_ENTRIES;
  }

  /**
   * Record an event against a credential name.
   */
  async record(entry: Omit<AuditEntry, "id">): Promise<AuditEntry> {
    const id = this.generateId();
    const full: AuditEntry = { id, ...entry };

    await this.storage.set(`${AUDIT_PREFIX}${entry.name}:${id}`, JSON.stringify(full));
    await this.appendToIndex(entry.name, id, entry.timestamp);

    return full;
  }

  /**
   * Retrieve entries for a name within a time range, most recent first.
   */
  async query(
    name: string,
    opts: { since?: number; until?: number; limit?: number } = {}
  ): Promise<AuditEntry[]> {
    const { since = 0, until = Date.now(), limit = 100 } = opts;

    const index = await this.readIndex(name);
    const filtered = index
      .filter((e) => e.ts >= since && e.ts <= until)
      .sort((a, b) => b.ts - a.ts)
      .slice(0, limit);

    const entries: AuditEntry[] = [];
    for (const { id } of filtered) {
      const raw = await this.storage.get(`${AUDIT_PREFIX}${name}:${id}`);
      if (raw) {
        entries.push(JSON.parse(raw));
      }
    }

    return entries;
  }

  async stats(name: string, since?: number): Promise<AuditStats> {
    const entries = await this.query(name, {
      since: since ?? Date.now() - 24 * 60 * 60 * 1000,
      limit: this.maxEntries,
    });

    if (entries.length === 0) {
      return { total_events: 0, rejections: 0, last_event: null };
    }

    return {
      total_events: entries.length,
      rejections: entries.filter((e) => e.event === "rejected").length,
      last_event: entries[0].timestamp,
    };
  }

  // ---- internal ----

  private generateId(): string {
    return crypto.randomBytes(8).toString("hex");
  }

  private async readIndex(name: string): Promise<IndexEntry[]> {
    const raw = await this.storage.get(AUDIT_INDEX + name);
    return raw ? JSON.parse(raw) : [];
  }

  private async appendToIndex(name: string, id: string, ts: number): Promise<void> {
    await this.indexLock.runExclusive(async () => {
      const index = await this.readIndex(name);
      index.push({ id, ts });

      const overflow = Math.max(0, index.length - this.maxEntries);
      const kept = index.slice(overflow);
      await this.storage.set(AUDIT_INDEX + name, JSON.stringify(kept));

      // Drop evicted entries only once the index no longer points at them
      for (const evicted of index.slice(0, overflow)) {
        await this.storage.del(`${AUDIT_PREFIX}${name}:${evicted.id}`);
      }
    });
  }
}

/**
 * Record an entry without failing the caller; audit storage errors are
 * logged instead. Used on request paths where the response must not depend
 * on the audit write.
 */
export async function recordQuietly(
  audit: AuditLog,
  logger: Logger,
  entry: Omit<AuditEntry, "id">
): Promise<void> {
  try {
    await audit.record(entry);
  } catch (err) {
    logger.error("Failed to write audit entry", {
      name: entry.name,
      event: entry.event,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
