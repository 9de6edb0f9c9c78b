import createAiHandler from "../api/ai";
import createAuditHandler from "../api/admin/audit";
import createGenerateKeyHandler from "../api/admin/generate-key";
import createListKeysHandler from "../api/admin/list-keys";
import createRevokeKeyHandler from "../api/admin/revoke-key";
import createLoginHandler from "../api/auth/login";
import createStatusHandler from "../api/status";
import createWebhookHandler from "../api/webhook";
import type { Classifier, ClassifyOptions } from "../lib/classifier";
import { closeContext, createContext, type AppContext } from "../lib/context";
import { UpstreamError } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import { MemoryStorage } from "../lib/storage";
import type { Classification } from "../lib/types";
import {
  asResponse,
  fastHasher,
  FakeModeration,
  mockRequest,
  mockResponse,
  type MockRequestInit,
} from "./helpers";

class FakeClassifier implements Classifier {
  readonly model = "test-model";
  readonly calls: Array<{ text: string; options?: ClassifyOptions }> = [];
  verdict: boolean | Error = false;

  async classify(text: string, options?: ClassifyOptions): Promise<Classification> {
    this.calls.push({ text, options });
    if (this.verdict instanceof Error) throw this.verdict;
    return { spam: this.verdict, model: this.model, content: this.verdict ? "Yes" : "No" };
  }
}

type Handler = (req: ReturnType<typeof mockRequest>, res: ReturnType<typeof asResponse>) => unknown;

async function call(handler: Handler, init: MockRequestInit, locals: Record<string, unknown> = {}) {
  const res = mockResponse();
  Object.assign(res.locals, locals);
  await handler(mockRequest(init), asResponse(res));
  return res;
}

describe("route handlers", () => {
  let ctx: AppContext;
  let classifier: FakeClassifier;
  let moderation: FakeModeration;

  beforeEach(async () => {
    classifier = new FakeClassifier();
    moderation = new FakeModeration();
    ctx = await createContext({
      storage: new MemoryStorage(),
      hasher: fastHasher(),
      classifier,
      moderation,
      logger: silentLogger,
      ignoredUsers: ["trusted bot"],
    });
  });

  describe("GET /status", () => {
    it("should report health without credentials", async () => {
      await ctx.apiKeys.create("svc", "test-secret", {});
      const res = await call(createStatusHandler(ctx), { path: "/status" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        status: "ok",
        service: "clanker-guard",
        version: "0.1.0",
        storage: "connected",
        keys_registered: 1,
      });
    });

    it("should report degraded once the stores are closed", async () => {
      await closeContext(ctx);
      const res = await call(createStatusHandler(ctx), { path: "/status" });

      expect(res.statusCode).toBe(503);
      expect(res.body).toMatchObject({ status: "degraded", storage: "disconnected", keys_registered: 0 });
    });

    it("should refuse other methods", async () => {
      const res = await call(createStatusHandler(ctx), { method: "POST", path: "/status" });
      expect(res.statusCode).toBe(405);
      expect(res.body).toEqual({ error: "Method not allowed" });
    });
  });

  describe("POST /admin/generate-key", () => {
    const generate = (body: unknown) =>
      call(createGenerateKeyHandler(ctx), { method: "POST", path: "/admin/generate-key", body });

    it("should mint a key and show its secret once", async () => {
      const res = await generate({ name: "svc", projects: "alpha,beta", role: "service", notes: "ci" });

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({
        name: "svc",
        role: "service",
        projects: ["alpha", "beta"],
        notes: "ci",
        revoked: false,
        message: 'API key "svc" created. Store the secret now; it will not be shown again.',
      });
      expect(res.body).not.toHaveProperty("hash");
      expect(res.body).toHaveProperty("secret", expect.stringMatching(/^[A-Za-z0-9_-]{43}$/));

      const [created] = await ctx.audit.query("svc");
      expect(created).toMatchObject({ event: "created", path: "/admin/generate-key" });
    });

    it("should mint a secret that authenticates", async () => {
      const res = await generate({ name: "svc" });
      const body = res.body;
      const secret =
        typeof body === "object" && body !== null && "secret" in body ? body.secret : undefined;
      expect(typeof secret).toBe("string");
      await expect(ctx.apiKeys.authenticate("svc", String(secret))).resolves.toMatchObject({
        name: "svc",
      });
    });

    it("should require a name", async () => {
      const res = await generate({ projects: "alpha" });
      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "Missing required field: name" });
    });

    it("should answer 409 for a taken name", async () => {
      await generate({ name: "svc" });
      const res = await generate({ name: "svc" });

      expect(res.statusCode).toBe(409);
      expect(res.body).toEqual({ error: 'Credential "svc" already exists', code: "duplicate_identity" });
    });

    it("should answer 400 for an invalid name", async () => {
      const res = await generate({ name: "no spaces allowed" });
      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ code: "invalid_input" });
    });
  });

  describe("GET /admin/list-keys", () => {
    it("should list metadata for every key", async () => {
      await ctx.apiKeys.create("svc", "test-secret", { projects: ["alpha"] });
      const res = await call(createListKeysHandler(ctx), { path: "/admin/list-keys" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        count: 1,
        keys: [
          {
            name: "svc",
            role: "user",
            projects: ["alpha"],
            notes: null,
            created_at: expect.any(String),
            revoked: false,
            revoked_at: null,
            last_used: null,
          },
        ],
      });
    });
  });

  describe("POST /admin/revoke-key", () => {
    const revoke = (body: unknown) =>
      call(createRevokeKeyHandler(ctx), { method: "POST", path: "/admin/revoke-key", body });

    it("should revoke a live key", async () => {
      await ctx.apiKeys.create("svc", "test-secret", {});
      const res = await revoke({ name: "svc" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ status: "revoked", name: "svc", revoked_at: expect.any(String) });
      await expect(ctx.apiKeys.authenticate("svc", "test-secret")).rejects.toThrow("Invalid API key");
    });

    it("should answer 404 for unknown or already revoked keys", async () => {
      await ctx.apiKeys.create("svc", "test-secret", {});
      await revoke({ name: "svc" });
      const res = await revoke({ name: "svc" });

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ error: 'Credential "svc" not found', code: "not_found" });
    });

    it("should require a name", async () => {
      const res = await revoke({});
      expect(res.statusCode).toBe(400);
    });
  });

  describe("GET /admin/audit", () => {
    const audit = (query: Record<string, string>) =>
      call(createAuditHandler(ctx), { path: "/admin/audit", query });

    it("should return entries and stats for a name", async () => {
      await ctx.audit.record({
        name: "svc",
        event: "rejected",
        path: "/ai",
        reason: "invalid_credential",
        caller: "127.0.0.1",
        timestamp: Date.UTC(2026, 0, 1),
      });

      const res = await audit({ name: "svc", since: "0" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        name: "svc",
        stats: { total_events: 1, rejections: 1, last_event: Date.UTC(2026, 0, 1) },
        entries: [
          {
            id: expect.any(String),
            event: "rejected",
            path: "/ai",
            reason: "invalid_credential",
            caller: "127.0.0.1",
            timestamp: "2026-01-01T00:00:00.000Z",
          },
        ],
      });
    });

    it("should validate its query parameters", async () => {
      expect((await audit({})).statusCode).toBe(400);
      expect((await audit({ name: "svc", limit: "many" })).body).toEqual({
        error: "since and limit must be numbers",
      });
    });
  });

  describe("POST /auth/login", () => {
    it("should describe the authenticated key", async () => {
      const principal = { name: "svc", role: "service", projects: ["alpha"], project: "alpha" };
      const res = await call(
        createLoginHandler(ctx),
        { method: "POST", path: "/auth/login" },
        { principal }
      );

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ status: "ok", name: "svc", role: "service", projects: ["alpha"] });
    });

    it("should refuse a request without a principal", async () => {
      const res = await call(createLoginHandler(ctx), { method: "POST", path: "/auth/login" });
      expect(res.statusCode).toBe(401);
    });
  });

  describe("POST /ai", () => {
    const classify = (body: unknown) => call(createAiHandler(ctx), { method: "POST", path: "/ai", body });

    it("should return the classification", async () => {
      classifier.verdict = true;
      const res = await classify({
        text: "Free money",
        system_message: "Answer Yes or No.",
        examples: [{ role: "user", content: "hi" }],
        think: true,
      });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ spam: true, model: "test-model", content: "Yes" });
      expect(classifier.calls).toEqual([
        {
          text: "Free money",
          options: {
            systemMessage: "Answer Yes or No.",
            examples: [{ role: "user", content: "hi" }],
            think: true,
          },
        },
      ]);
    });

    it.each([
      [{}, "Missing required field: text"],
      [{ text: "hi", system_message: 3 }, "system_message must be a string"],
      [{ text: "hi", examples: [{ role: "robot", content: "x" }] }, "examples must be a list of {role, content} messages"],
    ])("should reject %p", async (body, error) => {
      const res = await classify(body);
      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error });
    });

    it("should answer 502 when the model is unavailable", async () => {
      classifier.verdict = new UpstreamError("Model endpoint returned 500");
      const res = await classify({ text: "hello" });

      expect(res.statusCode).toBe(502);
      expect(res.body).toEqual({ error: "Model endpoint returned 500", code: "upstream_error" });
    });
  });

  describe("POST /kill-da-clanker", () => {
    const deliver = (body: unknown) =>
      call(createWebhookHandler(ctx), { method: "POST", path: "/kill-da-clanker", body });

    const message = { id: "msg-1", user_id: "42", name: "Mallory", text: "Cheap tickets", sender_type: "user" };

    it("should warn a first offender by direct message", async () => {
      classifier.verdict = true;
      const res = await deliver(message);

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ status: "processed", action: "warned" });
      expect(moderation.actions()).toEqual(["sendDm"]);
      expect(moderation.calls[0][1]).toBe("42");
    });

    it("should remove and ban a repeat offender", async () => {
      classifier.verdict = true;
      moderation.members = { "42": "m-42" };
      await deliver(message);
      const res = await deliver({ ...message, id: "msg-2" });

      expect(res.body).toEqual({ status: "processed", action: "removed" });
      expect(moderation.actions()).toEqual([
        "sendDm",
        "findMembership",
        "removeMember",
        "postBotMessage",
        "sendDm",
        "banMember",
        "postBotMessage",
      ]);
    });

    it("should report no action when GroupMe is not configured", async () => {
      const bare = await createContext({
        storage: new MemoryStorage(),
        hasher: fastHasher(),
        classifier,
        moderation: null,
        logger: silentLogger,
      });
      classifier.verdict = true;
      const res = await call(createWebhookHandler(bare), { method: "POST", path: "/kill-da-clanker", body: message });

      expect(res.body).toEqual({ status: "processed", action: "none" });
    });

    it("should leave clean messages alone", async () => {
      const res = await deliver(message);
      expect(res.body).toEqual({ status: "ok" });
      expect(moderation.calls).toEqual([]);
    });

    it("should like messages from ignored users", async () => {
      const res = await deliver({ ...message, name: "Trusted Bot" });

      expect(res.body).toEqual({ status: "ignored" });
      expect(moderation.calls).toEqual([["likeMessage", "msg-1"]]);
    });

    it("should still ignore a trusted user when the like fails", async () => {
      moderation.failLike = true;
      const res = await deliver({ ...message, name: "Trusted Bot" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ status: "ignored" });
    });

    it.each([
      ["bot posts", { sender_type: "bot" }],
      ["system notices", { user_id: "0", sender_type: "system" }],
      ["ignored users", { name: "Trusted Bot" }],
    ])("should ignore %s", async (_case, overrides) => {
      classifier.verdict = true;
      const res = await deliver({ ...message, ...overrides });

      expect(res.body).toEqual({ status: "ignored" });
      expect(classifier.calls).toHaveLength(0);
    });

    it("should skip classification of empty text", async () => {
      const res = await deliver({ ...message, text: "  " });
      expect(res.body).toEqual({ status: "ok" });
      expect(classifier.calls).toHaveLength(0);
    });

    it("should reject a payload that is not an object", async () => {
      const res = await deliver("nope");
      expect(res.statusCode).toBe(400);
    });
  });
});
