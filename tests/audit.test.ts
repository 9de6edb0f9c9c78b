import { AuditLog, recordQuietly } from "../lib/audit";
import { createLogger } from "../lib/logger";
import { MemoryStorage, type StorageBackend } from "../lib/storage";
import type { AuditEntry } from "../lib/types";

function entry(overrides: Partial<Omit<AuditEntry, "id">> = {}): Omit<AuditEntry, "id"> {
  return {
    name: "svc",
    event: "rejected",
    path: "/ai",
    reason: "invalid_credential",
    caller: "127.0.0.1",
    timestamp: 1_000,
    ...overrides,
  };
}

describe("AuditLog", () => {
  let audit: AuditLog;

  beforeEach(() => {
    audit = new AuditLog(new MemoryStorage());
  });

  it("should record entries with an id", async () => {
    const recorded = await audit.record(entry());
    expect(recorded.id).toMatch(/^[0-9a-f]{16}$/);
    expect(recorded.name).toBe("svc");
  });

  it("should return entries for one name, most recent first", async () => {
    await audit.record(entry({ timestamp: 1_000 }));
    await audit.record(entry({ timestamp: 3_000, event: "revoked" }));
    await audit.record(entry({ timestamp: 2_000, event: "created" }));
    await audit.record(entry({ name: "other", timestamp: 2_500 }));

    const entries = await audit.query("svc", { until: 10_000 });
    expect(entries.map((e) => e.timestamp)).toEqual([3_000, 2_000, 1_000]);
  });

  it("should filter by time range and limit", async () => {
    for (const timestamp of [1_000, 2_000, 3_000, 4_000]) {
      await audit.record(entry({ timestamp }));
    }

    const entries = await audit.query("svc", { since: 2_000, until: 4_000, limit: 2 });
    expect(entries.map((e) => e.timestamp)).toEqual([4_000, 3_000]);
  });

  it("should keep every entry written concurrently", async () => {
    await Promise.all([1, 2, 3, 4, 5].map((n) => audit.record(entry({ timestamp: n * 1_000 }))));
    await expect(audit.query("svc", { until: 10_000 })).resolves.toHaveLength(5);
  });

  it("should delete entries that fall out of the index", async () => {
    const storage = new MemoryStorage();
    const bounded = new AuditLog(storage, { maxEntries: 2 });

    const first = await bounded.record(entry({ name: "anonymous", timestamp: 1_000 }));
    const second = await bounded.record(entry({ name: "anonymous", timestamp: 2_000 }));
    const third = await bounded.record(entry({ name: "anonymous", timestamp: 3_000 }));

    expect(storage.has(`audit:anonymous:${first.id}`)).toBe(false);
    expect(storage.has(`audit:anonymous:${second.id}`)).toBe(true);
    expect(storage.has(`audit:anonymous:${third.id}`)).toBe(true);

    const entries = await bounded.query("anonymous", { until: 10_000 });
    expect(entries.map((e) => e.id)).toEqual([third.id, second.id]);
  });

  it("should summarize events since a point in time", async () => {
    await audit.record(entry({ timestamp: 1_000 }));
    await audit.record(entry({ timestamp: 2_000, event: "login" }));
    await audit.record(entry({ timestamp: 3_000 }));

    await expect(audit.stats("svc", 1_500)).resolves.toEqual({
      total_events: 2,
      rejections: 1,
      last_event: 3_000,
    });
    await expect(audit.stats("nobody", 0)).resolves.toEqual({
      total_events: 0,
      rejections: 0,
      last_event: null,
    });
  });
});

describe("recordQuietly", () => {
  it("should log a failed write instead of throwing", async () => {
    const failing: StorageBackend = {
      get: async () => null,
      set: async () => {
        throw new Error("disk full");
      },
      del: async () => undefined,
    };
    const lines: string[] = [];
    const logger = createLogger({ write: (_level, line) => lines.push(line) });

    await expect(recordQuietly(new AuditLog(failing), logger, entry())).resolves.toBeUndefined();

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "error",
      message: "Failed to write audit entry",
      name: "svc",
      event: "rejected",
      error: "disk full",
    });
  });
});
