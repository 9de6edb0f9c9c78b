// ---------------------------------------------------------------------------
// clanker-guard library exports
// ---------------------------------------------------------------------------

export { Argon2Hasher, generateSecret, assertWellFormed } from "./hasher";
export type { SecretHasher, Argon2Options } from "./hasher";
export { MemoryStorage, FileStorage, VercelKVStorage } from "./storage";
export type { StorageBackend } from "./storage";
export { CredentialStore, validateName } from "./credential-store";
export type { StoreOptions } from "./credential-store";
export { AdminCredential } from "./admin-credential";
export { ApiKeyRegistry, authorize, normalizeProjects, normalizeRole } from "./api-keys";
export { Authorizer, classifyRoute, createAuthMiddleware, principalOf } from "./authorization";
export { AuditLog, recordQuietly } from "./audit";
export { OllamaClassifier } from "./classifier";
export type { Classifier, ClassifyOptions } from "./classifier";
export { GroupMeClient } from "./groupme";
export type { ModerationActions } from "./groupme";
export { MODERATION_STORE_KEY, Moderator, StrikeLedger } from "./moderation";
export type { ModerationOutcome, Offense } from "./moderation";
export { createApp } from "./app";
export { createContext, closeContext, depsFromConfig } from "./context";
export type { AppContext } from "./context";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { loadConfig, isKVAvailable } from "./config";
export * from "./errors";
export type {
  Role,
  CredentialRecord,
  ApiKeyRecord,
  AdminRecord,
  PublicRecord,
  Principal,
  AuthDecision,
  AuditEntry,
  HealthStatus,
  Classification,
  ServiceConfig,
} from "./types";
