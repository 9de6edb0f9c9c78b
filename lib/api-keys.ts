// ---------------------------------------------------------------------------
// clanker-guard API key registry
// Named, project-scoped API credentials
// ---------------------------------------------------------------------------

import {
  CredentialStore,
  type StoreOptions,
  isObject,
  readBaseRecord,
  readOptionalString,
} from "./credential-store";
import { ANONYMOUS } from "./audit";
import { CorruptStoreError, InvalidCredentialError, InvalidInputError } from "./errors";
import { ROLES, WILDCARD_PROJECT } from "./types";
import type { ApiKeyMetadata, ApiKeyRecord, Role } from "./types";

export const API_KEYS_STORE_KEY = "api_keys";

export class ApiKeyRegistry extends CredentialStore<ApiKeyRecord, ApiKeyMetadata> {
  constructor(options: Omit<StoreOptions, "key"> & { key?: string }) {
    super({ ...options, key: options.key ?? API_KEYS_STORE_KEY });
  }

  /**
   * Verify a presented secret against the claimed identity's record. An
   * unknown name, a revoked key and a wrong secret all fail the same way.
   */
  async authenticate(name: string, secret: string): Promise<ApiKeyRecord> {
    this.assertOpen();
    const record = await this.verifyNamed(name, secret);
    if (!record) {
      throw new InvalidCredentialError("Invalid API key");
    }
    return record;
  }

  /** "anonymous" names the audit bucket for unresolved callers. */
  protected assertInsertable(name: string, records: ReadonlyMap<string, ApiKeyRecord>): void {
    if (name.toLowerCase() === ANONYMOUS) {
      throw new InvalidInputError(`"${name}" is a reserved name`);
    }
    super.assertInsertable(name, records);
  }

  protected decode(raw: unknown): ApiKeyRecord[] {
    const where = `API key document "${this.key}"`;
    if (!isObject(raw) || !Array.isArray(raw.api_keys)) {
      throw new CorruptStoreError(`${where} must be an object with an "api_keys" array`);
    }

    const entries: unknown[] = raw.api_keys;
    return entries.map((item, i) => {
      const at = `${where}, entry ${i}`;
      if (!isObject(item)) {
        throw new CorruptStoreError(`${at} must be an object`);
      }
      const base = readBaseRecord(item, at);
      let projects: string[];
      try {
        projects = normalizeProjects(item.projects);
      } catch (err) {
        if (err instanceof InvalidInputError) {
          throw new CorruptStoreError(`${at}: ${err.message}`);
        }
        throw err;
      }
      const record: ApiKeyRecord = {
        ...base,
        role: normalizeRole(item.role),
        projects,
      };
      const notes = readOptionalString(item, "notes", at);
      if (notes !== undefined) record.notes = notes;
      return record;
    });
  }

  protected encode(records: ApiKeyRecord[]): unknown {
    return { api_keys: records };
  }

  protected build(name: string, hash: string, metadata: ApiKeyMetadata): ApiKeyRecord {
    const record: ApiKeyRecord = {
      name,
      hash,
      role: normalizeRole(metadata.role),
      projects: normalizeProjects(metadata.projects),
      created_at: this.now().toISOString(),
      revoked: false,
    };
    if (metadata.notes !== undefined && metadata.notes !== null && metadata.notes !== "") {
      if (typeof metadata.notes !== "string") {
        throw new InvalidInputError("notes must be a string");
      }
      record.notes = metadata.notes;
    }
    return record;
  }
}

/**
 * Whether a key may act on `project`. Unscoped keys (no projects, or the
 * wildcard) may act on anything. Scoped keys need a matching project;
 * matching ignores case.
 */
export function authorize(
  record: Pick<ApiKeyRecord, "projects">,
  project: string | null | undefined
): boolean {
  if (isUnscoped(record.projects)) return true;
  if (!project) return false;
  const wanted = project.trim().toLowerCase();
  return record.projects.some((p) => p.toLowerCase() === wanted);
}

export function isUnscoped(projects: readonly string[]): boolean {
  return projects.length === 0 || projects.includes(WILDCARD_PROJECT);
}

/**
 * Accepts a comma-separated string or an array of strings. Trims, drops
 * empties, de-duplicates ignoring case (first spelling wins). A wildcard
 * anywhere collapses the set to ["*"].
 */
export function normalizeProjects(value: unknown): string[] {
  if (value === undefined || value === null) return [];

  let candidates: unknown[];
  if (typeof value === "string") {
    candidates = value.split(",");
  } else if (Array.isArray(value)) {
    candidates = value;
  } else {
    throw new InvalidInputError("projects must be a string or an array of strings");
  }

  const out: string[] = [];
  const seen = new Set<string>();
  for (const item of candidates) {
    if (typeof item !== "string") {
      throw new InvalidInputError("projects must contain only strings");
    }
    const trimmed = item.trim();
    if (!trimmed) continue;
    if (trimmed === WILDCARD_PROJECT) return [WILDCARD_PROJECT];

    const lowered = trimmed.toLowerCase();
    if (seen.has(lowered)) continue;
    seen.add(lowered);
    out.push(trimmed);
  }
  return out;
}

/** Unknown or missing roles become "user". Roles are labels, not permissions. */
export function normalizeRole(value: unknown): Role {
  if (typeof value !== "string") return "user";
  const lowered = value.trim().toLowerCase();
  return ROLES.find((r) => r === lowered) ?? "user";
}
