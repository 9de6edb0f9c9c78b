// ---------------------------------------------------------------------------
// GET /status
//
// Uptime check. Reports storage connectivity, version, and the number of
// live API keys. Needs no credentials.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { SERVICE_NAME, VERSION, type AppContext } from "../lib/context";
import { clientIp } from "../lib/request";
import type { HealthStatus } from "../lib/types";

export default function createStatusHandler(ctx: AppContext) {
  return (req: Request, res: Response) => {
    if (req.method !== "GET") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const connected = ctx.apiKeys.isOpen && ctx.admin.isOpen;
    ctx.logger.debug("Status check", { caller: clientIp(req) });

    const health: HealthStatus = {
      status: connected ? "ok" : "degraded",
      service: SERVICE_NAME,
      version: VERSION,
      uptime_ms: Date.now() - ctx.startedAt,
      storage: connected ? "connected" : "disconnected",
      keys_registered: connected ? ctx.apiKeys.countActive() : 0,
      endpoints: ["/kill-da-clanker", "/ai", "/auth/login", "/admin/list-keys"],
    };

    return res.status(connected ? 200 : 503).json(health);
  };
}
