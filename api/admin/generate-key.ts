// ---------------------------------------------------------------------------
// POST /admin/generate-key
//
// Mint a new API key. Body: { name, projects?, role?, notes? }.
// The plaintext secret appears in this response and nowhere else.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { recordQuietly } from "../../lib/audit";
import { isObject } from "../../lib/credential-store";
import type { AppContext } from "../../lib/context";
import { toErrorResponse } from "../../lib/errors";
import { generateSecret } from "../../lib/hasher";
import { clientIp } from "../../lib/request";

export default function createGenerateKeyHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const body: unknown = req.body;
    const caller = clientIp(req);

    const name = isObject(body) ? body.name : undefined;
    if (!isObject(body) || typeof name !== "string" || !name) {
      ctx.logger.warn("generate-key rejected: missing name", { caller });
      return res.status(400).json({ error: "Missing required field: name" });
    }

    try {
      const { record, secret } = await ctx.apiKeys.create(name, generateSecret(), {
        projects: body.projects,
        role: body.role,
        notes: body.notes,
      });

      ctx.logger.info("API key created", { name, role: record.role, projects: record.projects, caller });
      await recordQuietly(ctx.audit, ctx.logger, {
        name,
        event: "created",
        path: req.path,
        caller,
        timestamp: Date.now(),
      });

      return res.status(201).json({
        ...record,
        secret,
        message: `API key "${name}" created. Store the secret now; it will not be shown again.`,
      });
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      ctx.logger.warn("generate-key failed", { name, caller, status, error: errorBody.error });
      return res.status(status).json(errorBody);
    }
  };
}
