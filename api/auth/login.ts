// ---------------------------------------------------------------------------
// POST /auth/login
//
// Lets a client check its API key. The authorization middleware has already
// verified the key; this reports what the key is allowed to do.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { recordQuietly } from "../../lib/audit";
import { principalOf } from "../../lib/authorization";
import type { AppContext } from "../../lib/context";
import { clientIp } from "../../lib/request";

export default function createLoginHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const principal = principalOf(res);
    if (!principal) {
      return res.status(401).json({ error: "Unauthorized" });
    }

    const caller = clientIp(req);
    ctx.logger.info("Login succeeded", { name: principal.name, role: principal.role, caller });
    await recordQuietly(ctx.audit, ctx.logger, {
      name: principal.name,
      event: "login",
      path: req.path,
      caller,
      timestamp: Date.now(),
    });

    return res.status(200).json({
      status: "ok",
      name: principal.name,
      role: principal.role,
      projects: principal.projects,
    });
  };
}
