import type { NextFunction, Request, Response } from "express";
import type { ModerationActions } from "../lib/groupme";
import { Argon2Hasher } from "../lib/hasher";

/** Cheap argon2id parameters so the suite runs quickly. */
export function fastHasher(): Argon2Hasher {
  return new Argon2Hasher({ memoryCost: 1024, timeCost: 2, parallelism: 1 });
}

export interface MockRequestInit {
  method?: string;
  path?: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
}

export function mockRequest(init: MockRequestInit = {}): Request {
  const req = {
    method: init.method ?? "GET",
    path: init.path ?? "/",
    headers: init.headers ?? {},
    query: init.query ?? {},
    body: init.body,
    ip: "127.0.0.1",
    socket: { remoteAddress: "127.0.0.1" },
  };
  return req as unknown as Request;
}

export interface MockResponse {
  statusCode: number;
  body: unknown;
  locals: Record<string, unknown>;
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
  onSend?: () => void;
}

export function mockResponse(): MockResponse {
  const res: MockResponse = {
    statusCode: 200,
    body: undefined,
    locals: {},
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(body) {
      res.body = body;
      res.onSend?.();
      return res;
    },
  };
  return res;
}

export function asResponse(res: MockResponse): Response {
  return res as unknown as Response;
}

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

/**
 * Run an Express middleware to completion. Resolves with "next" when the
 * middleware passes the request on, "sent" when it responds, or the error
 * it forwards.
 */
export function runMiddleware(mw: Middleware, req: Request, res: MockResponse): Promise<unknown> {
  return new Promise((resolve) => {
    res.onSend = () => resolve("sent");
    mw(req, asResponse(res), (err?: unknown) => resolve(err ?? "next"));
  });
}

/** Records every GroupMe action in call order. */
export class FakeModeration implements ModerationActions {
  readonly calls: Array<[string, ...string[]]> = [];
  /** user id to membership id */
  members: Record<string, string> = {};
  failBan = false;
  failLike = false;

  async findMembership(userId: string): Promise<string | null> {
    this.calls.push(["findMembership", userId]);
    return this.members[userId] ?? null;
  }

  async removeMember(membershipId: string): Promise<void> {
    this.calls.push(["removeMember", membershipId]);
  }

  async banMember(membershipId: string): Promise<void> {
    this.calls.push(["banMember", membershipId]);
    if (this.failBan) throw new Error("ban refused");
  }

  async sendDm(userId: string, text: string): Promise<void> {
    this.calls.push(["sendDm", userId, text]);
  }

  async postBotMessage(text: string): Promise<void> {
    this.calls.push(["postBotMessage", text]);
  }

  async likeMessage(messageId: string): Promise<void> {
    this.calls.push(["likeMessage", messageId]);
    if (this.failLike) throw new Error("like refused");
  }

  actions(): string[] {
    return this.calls.map(([action]) => action);
  }
}
