// ---------------------------------------------------------------------------
// clanker-guard type definitions
// ---------------------------------------------------------------------------

export type Role = "user" | "service" | "admin";

export const ROLES: readonly Role[] = ["user", "service", "admin"];

export const WILDCARD_PROJECT = "*";

/** Fields every stored credential carries, admin or API key. */
export interface CredentialRecord {
  name: string;
  hash: string;                // argon2id digest (PHC string)
  created_at: string;          // ISO-8601
  revoked: boolean;
  revoked_at?: string;
  last_used?: string;
}

export interface ApiKeyRecord extends CredentialRecord {
  role: Role;
  projects: string[];          // [], ["*"], or specific project ids
  notes?: string;
}

export type AdminRecord = CredentialRecord;

/** A record as exposed by list(): never carries the digest. */
export type PublicRecord<T extends CredentialRecord> = Omit<T, "hash">;

export interface ApiKeyMetadata {
  role?: unknown;
  projects?: unknown;
  notes?: unknown;
}

export interface Created<T extends CredentialRecord> {
  record: PublicRecord<T>;
  secret: string;
}

export type RouteClass = "public" | "admin" | "key";

export type RejectReason =
  | "missing_credential"
  | "invalid_credential"
  | "project_scope_mismatch";

export interface Principal {
  name: string;
  role: Role;
  projects: string[];
  project: string | null;
}

export type AuthDecision =
  | { outcome: "admitted"; route: RouteClass; principal: Principal | null }
  | { outcome: "rejected"; route: RouteClass; reason: RejectReason; name: string | null };

export interface AuditEntry {
  id: string;
  name: string;                // credential identity, or "anonymous"
  event: "rejected" | "created" | "revoked" | "login";
  path: string;
  reason?: string;
  caller: string;              // client IP
  timestamp: number;
}

export interface HealthStatus {
  status: "ok" | "degraded";
  service: string;
  version: string;
  uptime_ms: number;
  storage: "connected" | "disconnected";
  keys_registered: number;
  endpoints: string[];
}

export interface Classification {
  spam: boolean;
  model: string;
  content: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ServiceConfig {
  port: number;
  data_dir: string;
  accept_query_param: boolean;
  log_level: LogLevel;
  argon2_memory_cost: number;
  argon2_time_cost: number;
  ollama_url: string;
  ollama_model: string;
  groupme_access_token: string | null;
  groupme_bot_id: string | null;
  groupme_group_id: string | null;
  ignored_users: string[];
}
