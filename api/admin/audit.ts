// ---------------------------------------------------------------------------
// GET /admin/audit?name=xxx&since=timestamp&limit=50
//
// Query audit entries for a credential name ("anonymous" holds rejections
// that never resolved to a key). Returns events and summary stats.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import type { AppContext } from "../../lib/context";
import { toErrorResponse } from "../../lib/errors";
import { queryValue } from "../../lib/request";

export default function createAuditHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "GET") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const name = queryValue(req.query, "name");
    if (!name) {
      return res.status(400).json({ error: "Missing required query parameter: name" });
    }

    const sinceRaw = queryValue(req.query, "since");
    const limitRaw = queryValue(req.query, "limit");
    const since = sinceRaw ? Number(sinceRaw) : undefined;
    const limit = limitRaw ? Number(limitRaw) : 50;

    if ((since !== undefined && !Number.isFinite(since)) || !Number.isInteger(limit) || limit <= 0) {
      return res.status(400).json({ error: "since and limit must be numbers" });
    }

    try {
      const [entries, stats] = await Promise.all([
        ctx.audit.query(name, { since, limit }),
        ctx.audit.stats(name, since),
      ]);

      return res.status(200).json({
        name,
        stats,
        entries: entries.map((e) => ({
          id: e.id,
          event: e.event,
          path: e.path,
          reason: e.reason ?? null,
          caller: e.caller,
          timestamp: new Date(e.timestamp).toISOString(),
        })),
      });
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      return res.status(status).json(body);
    }
  };
}
