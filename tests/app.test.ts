import { once } from "events";
import type { Server } from "http";
import { createApp } from "../lib/app";
import type { Classifier } from "../lib/classifier";
import { closeContext, createContext, type AppContext } from "../lib/context";
import { silentLogger } from "../lib/logger";
import { MemoryStorage } from "../lib/storage";
import type { Classification } from "../lib/types";
import { fastHasher } from "./helpers";

const quietClassifier: Classifier = {
  model: "test-model",
  async classify(): Promise<Classification> {
    return { spam: false, model: "test-model", content: "No" };
  },
};

describe("HTTP app", () => {
  let ctx: AppContext;
  let server: Server;
  let baseUrl: string;
  let adminSecret: string;

  const apiKeyHeaders = { "x-api-key-name": "svc", "x-api-key": "test-secret" };

  async function send(path: string, init: { method?: string; headers?: Record<string, string>; body?: string } = {}) {
    const res = await fetch(`${baseUrl}${path}`, {
      method: init.method ?? "GET",
      headers: { ...(init.body === undefined ? {} : { "content-type": "application/json" }), ...init.headers },
      body: init.body,
    });
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  beforeEach(async () => {
    ctx = await createContext({
      storage: new MemoryStorage(),
      hasher: fastHasher(),
      classifier: quietClassifier,
      moderation: null,
      logger: silentLogger,
    });
    ({ secret: adminSecret } = await ctx.admin.bootstrap());
    await ctx.apiKeys.create("svc", "test-secret", {});

    server = createApp(ctx).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    server.closeAllConnections();
    await once(server, "close");
    await closeContext(ctx);
  });

  it("should serve the public status route", async () => {
    const res = await send("/status");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", keys_registered: 1 });
  });

  it("should mint a key with the admin credential", async () => {
    const res = await send("/admin/generate-key", {
      method: "POST",
      headers: { "x-api-admin-key": adminSecret },
      body: JSON.stringify({ name: "bot" }),
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ name: "bot", role: "user", projects: [] });
  });

  it("should not let an API key mint keys through an upper-case admin path", async () => {
    const res = await send("/ADMIN/generate-key", {
      method: "POST",
      headers: apiKeyHeaders,
      body: JSON.stringify({ name: "escalated" }),
    });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: "Unauthorized" });
    await expect(ctx.apiKeys.findByIdentity("escalated")).rejects.toThrow();
  });

  it.each(["/Admin/list-keys", "/admin/list-keys/", "//admin/list-keys"])(
    "should require the admin key for %s",
    async (path) => {
      const res = await send(path, { headers: apiKeyHeaders });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "Unauthorized" });
    }
  );

  it("should serve an admin route with a trailing slash", async () => {
    const res = await send("/admin/list-keys/", { headers: { "x-api-admin-key": adminSecret } });
    expect(res.status).toBe(200);
  });

  it("should not route a case-changed path even for the admin", async () => {
    const res = await send("/ADMIN/list-keys", { headers: { "x-api-admin-key": adminSecret } });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });

  it("should hide unknown routes from callers without a key", async () => {
    const res = await send("/nope");
    expect(res.status).toBe(401);
  });

  it("should answer 404 for unknown routes once authenticated", async () => {
    const res = await send("/nope", { headers: apiKeyHeaders });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });

  it("should answer 400 for a malformed JSON body", async () => {
    const res = await send("/admin/generate-key", {
      method: "POST",
      headers: { "x-api-admin-key": adminSecret },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid JSON body" });
  });
});
