// ---------------------------------------------------------------------------
// GET /admin/list-keys
//
// List every API key with metadata, revoked ones included. Digests and
// secrets are never part of the listing.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import type { AppContext } from "../../lib/context";
import { toErrorResponse } from "../../lib/errors";
import { clientIp } from "../../lib/request";

export default function createListKeysHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "GET") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    try {
      const keys = await ctx.apiKeys.list();
      ctx.logger.info("API keys listed", { count: keys.length, caller: clientIp(req) });

      return res.status(200).json({
        count: keys.length,
        keys: keys.map((k) => ({
          name: k.name,
          role: k.role,
          projects: k.projects,
          notes: k.notes ?? null,
          created_at: k.created_at,
          revoked: k.revoked,
          revoked_at: k.revoked_at ?? null,
          last_used: k.last_used ?? null,
        })),
      });
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      return res.status(status).json(body);
    }
  };
}
