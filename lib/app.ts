// ---------------------------------------------------------------------------
// clanker-guard HTTP application
// Authorization runs ahead of body parsing and every route handler
// ---------------------------------------------------------------------------

import express, { type NextFunction, type Request, type Response } from "express";
import createAiHandler from "../api/ai";
import createAuditHandler from "../api/admin/audit";
import createGenerateKeyHandler from "../api/admin/generate-key";
import createListKeysHandler from "../api/admin/list-keys";
import createRevokeKeyHandler from "../api/admin/revoke-key";
import createLoginHandler from "../api/auth/login";
import createStatusHandler from "../api/status";
import createWebhookHandler from "../api/webhook";
import { createAuthMiddleware } from "./authorization";
import type { AppContext } from "./context";
import { toErrorResponse } from "./errors";

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", true);
  // Route matching must agree with classifyRoute, which folds case
  app.set("case sensitive routing", true);

  app.use(
    createAuthMiddleware({
      authorizer: ctx.authorizer,
      apiKeys: ctx.apiKeys,
      audit: ctx.audit,
      logger: ctx.logger,
    })
  );
  app.use(express.json({ limit: "256kb" }));

  app.all("/status", createStatusHandler(ctx));
  app.all("/kill-da-clanker", createWebhookHandler(ctx));
  app.all("/ai", createAiHandler(ctx));
  app.all("/auth/login", createLoginHandler(ctx));
  app.all("/admin/generate-key", createGenerateKeyHandler(ctx));
  app.all("/admin/list-keys", createListKeysHandler(ctx));
  app.all("/admin/revoke-key", createRevokeKeyHandler(ctx));
  app.all("/admin/audit", createAuditHandler(ctx));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }
    const { status, body } = toErrorResponse(err);
    ctx.logger.error("Unhandled request error", {
      path: req.path,
      method: req.method,
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(status).json(body);
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    (err.type === "entity.parse.failed" || err.type === "entity.too.large")
  );
}
