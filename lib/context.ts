// ---------------------------------------------------------------------------
// clanker-guard service context
// Everything a route handler needs, built once at startup and injected
// ---------------------------------------------------------------------------

import { AdminCredential } from "./admin-credential";
import { ApiKeyRegistry } from "./api-keys";
import { AuditLog } from "./audit";
import { Authorizer } from "./authorization";
import { OllamaClassifier, type Classifier } from "./classifier";
import { isKVAvailable } from "./config";
import { GroupMeClient, type ModerationActions } from "./groupme";
import { Argon2Hasher, type SecretHasher } from "./hasher";
import type { Logger } from "./logger";
import { Moderator, StrikeLedger } from "./moderation";
import { FileStorage, VercelKVStorage, type StorageBackend } from "./storage";
import type { ServiceConfig } from "./types";

export const SERVICE_NAME = "clanker-guard";
export const VERSION = "0.1.0";

export interface AppContext {
  admin: AdminCredential;
  apiKeys: ApiKeyRegistry;
  audit: AuditLog;
  authorizer: Authorizer;
  classifier: Classifier;
  /** Null when GroupMe credentials are not configured. */
  moderator: Moderator | null;
  logger: Logger;
  ignoredUsers: string[];
  startedAt: number;
}

export interface ContextDeps {
  storage: StorageBackend;
  hasher: SecretHasher;
  classifier: Classifier;
  moderation: ModerationActions | null;
  logger: Logger;
  acceptQueryParam?: boolean;
  ignoredUsers?: string[];
}

/**
 * Wire the stores and collaborators together and open both credential
 * stores. A corrupt credential document fails here, before any request.
 */
export async function createContext(deps: ContextDeps): Promise<AppContext> {
  const admin = new AdminCredential({ storage: deps.storage, hasher: deps.hasher });
  const apiKeys = new ApiKeyRegistry({ storage: deps.storage, hasher: deps.hasher });
  await admin.open();
  await apiKeys.open();

  return {
    admin,
    apiKeys,
    audit: new AuditLog(deps.storage),
    authorizer: new Authorizer({ admin, apiKeys, acceptQueryParam: deps.acceptQueryParam }),
    classifier: deps.classifier,
    moderator: deps.moderation
      ? new Moderator(
          deps.moderation,
          new StrikeLedger(deps.storage),
          deps.logger.child({ component: "moderation" })
        )
      : null,
    logger: deps.logger,
    ignoredUsers: deps.ignoredUsers ?? [],
    startedAt: Date.now(),
  };
}

export async function closeContext(ctx: AppContext): Promise<void> {
  await ctx.apiKeys.close();
  await ctx.admin.close();
}

export function storageFor(config: Pick<ServiceConfig, "data_dir">): StorageBackend {
  return isKVAvailable() ? new VercelKVStorage() : new FileStorage(config.data_dir);
}

export function hasherFor(config: Pick<ServiceConfig, "argon2_memory_cost" | "argon2_time_cost">): Argon2Hasher {
  return new Argon2Hasher({
    memoryCost: config.argon2_memory_cost,
    timeCost: config.argon2_time_cost,
  });
}

/** Production collaborators derived from configuration. */
export function depsFromConfig(config: ServiceConfig, logger: Logger): ContextDeps {
  const { groupme_access_token: token, groupme_bot_id: botId, groupme_group_id: groupId } = config;

  return {
    storage: storageFor(config),
    hasher: hasherFor(config),
    classifier: new OllamaClassifier({ baseUrl: config.ollama_url, model: config.ollama_model }),
    moderation:
      token && botId && groupId ? new GroupMeClient({ accessToken: token, botId, groupId }) : null,
    logger,
    acceptQueryParam: config.accept_query_param,
    ignoredUsers: config.ignored_users,
  };
}
