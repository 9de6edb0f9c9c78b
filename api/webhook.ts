// ---------------------------------------------------------------------------
// POST /kill-da-clanker
//
// GroupMe bot callback. Each posted message is classified; spam earns the
// sender a strike, and a repeat offense removes them from the group.
// Public: the caller is GroupMe, not a key holder.
// ---------------------------------------------------------------------------

import type { Request, Response } from "express";
import { isObject } from "../lib/credential-store";
import type { AppContext } from "../lib/context";
import { toErrorResponse } from "../lib/errors";
import { clientIp } from "../lib/request";

interface GroupMeMessage {
  id: string | null;
  userId: string;
  name: string;
  text: string;
  senderType: string;
}

export default function createWebhookHandler(ctx: AppContext) {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      return res.status(405).json({ error: "Method not allowed" });
    }

    const message = parseMessage(req.body);
    if (!message) {
      return res.status(400).json({ error: "Invalid callback payload" });
    }

    // Our own posts and system notices come back through the callback too
    if (message.senderType !== "user" || message.userId === "0") {
      return res.status(200).json({ status: "ignored" });
    }

    const log = ctx.logger.child({ caller: clientIp(req), user_id: message.userId });
    log.info("Message received", { from: message.name, message_id: message.id });

    if (ctx.ignoredUsers.includes(message.name.toLowerCase())) {
      await ctx.moderator?.acknowledge(message.id);
      return res.status(200).json({ status: "ignored" });
    }

    if (!message.text.trim()) {
      return res.status(200).json({ status: "ok" });
    }

    try {
      const verdict = await ctx.classifier.classify(message.text);
      if (!verdict.spam) {
        return res.status(200).json({ status: "ok" });
      }

      log.warn("Spam detected", { from: message.name, message_id: message.id });
      const action = ctx.moderator
        ? await ctx.moderator.reckon({
            name: message.name,
            userId: message.userId,
            messageId: message.id,
          })
        : "none";
      return res.status(200).json({ status: "processed", action });
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      log.error("Moderation failed", { status, error: body.error });
      return res.status(status).json(body);
    }
  };
}

function parseMessage(body: unknown): GroupMeMessage | null {
  if (!isObject(body)) return null;
  const userId = body.user_id;
  const id = body.id;
  return {
    id: typeof id === "string" && id ? id : null,
    userId: typeof userId === "string" || typeof userId === "number" ? String(userId) : "",
    name: typeof body.name === "string" ? body.name : "Unknown",
    text: typeof body.text === "string" ? body.text : "",
    senderType: typeof body.sender_type === "string" ? body.sender_type : "user",
  };
}
