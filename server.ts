// ---------------------------------------------------------------------------
// clanker-guard server entry point
// ---------------------------------------------------------------------------

import { createApp } from "./lib/app";
import { loadConfig } from "./lib/config";
import { closeContext, createContext, depsFromConfig } from "./lib/context";
import { createLogger } from "./lib/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.log_level });

  const ctx = await createContext(depsFromConfig(config, logger));
  if (!ctx.admin.isProvisioned()) {
    logger.warn("No admin credential provisioned; admin routes will reject every request. Run `clanker-guard init-admin`, then restart the service.");
  }
  if (!ctx.moderator) {
    logger.warn("GroupMe is not configured; flagged messages will not be removed");
  }

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    logger.info("Listening", {
      port: config.port,
      api_keys: ctx.apiKeys.countActive(),
      query_credentials: config.accept_query_param,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => {
      closeContext(ctx)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Failed to close credential stores", {
            error: err instanceof Error ? err.message : String(err),
          });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
