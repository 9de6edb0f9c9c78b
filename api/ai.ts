// ---------------------------------------------------------------------------
// POST /ai
//
// Direct classification call for API key holders.
// Body: { text, system_message?, examples?, think? }
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { principalOf } from "../lib/authorization";
import type { ChatMessage } from "../lib/classifier";
import { isObject } from "../lib/credential-store";
import type { AppContext } from "../lib/context";
import { toErrorResponse } from "../lib/errors";
import { clientIp } from "../lib/request";

export default function createAiHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const body: unknown = req.body;
    if (!isObject(body)) {
      return res.status(400).json({ error: "Missing required field: text" });
    }
    const { text, system_message: systemMessage } = body;
    if (typeof text !== "string" || !text.trim()) {
      return res.status(400).json({ error: "Missing required field: text" });
    }
    if (systemMessage !== undefined && typeof systemMessage !== "string") {
      return res.status(400).json({ error: "system_message must be a string" });
    }
    const examples = parseExamples(body.examples);
    if (examples === null) {
      return res.status(400).json({ error: "examples must be a list of {role, content} messages" });
    }

    const principal = principalOf(res);
    const log = ctx.logger.child({
      caller: clientIp(req),
      name: principal?.name ?? null,
      project: principal?.project ?? "*",
    });

    try {
      const result = await ctx.classifier.classify(text, {
        systemMessage,
        examples,
        think: body.think === true,
      });
      log.info("Classification served", { spam: result.spam, model: result.model });
      return res.status(200).json(result);
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      log.error("Classification failed", { status, error: errorBody.error });
      return res.status(status).json(errorBody);
    }
  };
}

function parseExamples(value: unknown): ChatMessage[] | null {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return null;

  const out: ChatMessage[] = [];
  for (const item of value) {
    if (!isObject(item) || typeof item.content !== "string") return null;
    const role = item.role;
    if (role !== "user" && role !== "assistant" && role !== "system") return null;
    out.push({ role, content: item.content });
  }
  return out;
}
