// ---------------------------------------------------------------------------
// POST /admin/revoke-key
//
// Permanently revoke an API key. Body: { name }. The record is kept for
// audit; its name can never be reused.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { recordQuietly } from "../../lib/audit";
import { isObject } from "../../lib/credential-store";
import type { AppContext } from "../../lib/context";
import { toErrorResponse } from "../../lib/errors";
import { clientIp } from "../../lib/request";

export default function createRevokeKeyHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const body: unknown = req.body;
    const caller = clientIp(req);

    const name = isObject(body) ? body.name : undefined;
    if (!isObject(body) || typeof name !== "string" || !name) {
      return res.status(400).json({ error: "Missing required field: name" });
    }

    try {
      const record = await ctx.apiKeys.revoke(name);

      ctx.logger.info("API key revoked", { name, caller });
      await recordQuietly(ctx.audit, ctx.logger, {
        name,
        event: "revoked",
        path: req.path,
        caller,
        timestamp: Date.now(),
      });

      return res.status(200).json({ status: "revoked", name, revoked_at: record.revoked_at });
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      ctx.logger.warn("revoke-key failed", { name, caller, status, error: errorBody.error });
      return res.status(status).json(errorBody);
    }
  };
}
