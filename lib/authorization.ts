// ---------------------------------------------------------------------------
// clanker-guard request authorization
// Classifies each route and admits or rejects the request before any
// handler runs. No state is kept between requests.
// ---------------------------------------------------------------------------

import type { NextFunction, Request, Response } from "express";
import type { AdminCredential } from "./admin-credential";
import { authorize, isUnscoped, type ApiKeyRegistry } from "./api-keys";
import { ANONYMOUS, recordQuietly, type AuditLog } from "./audit";
import {
  InvalidCredentialError,
  MissingCredentialError,
  ProjectScopeError,
  toErrorResponse,
} from "./errors";
import type { Logger } from "./logger";
import { clientIp, headerValue, queryValue, type HeaderBag } from "./request";
import type { AuthDecision, Principal, RejectReason, RouteClass } from "./types";
import { WILDCARD_PROJECT } from "./types";

export const HEADERS = {
  apiKey: "x-api-key",
  apiKeyName: "x-api-key-name",
  project: "x-api-project",
  adminKey: "x-api-admin-key",
} as const;

export const QUERY_PARAMS = {
  apiKey: "api_key",
  apiKeyName: "api_key_name",
  project: "project",
  adminKey: "admin_key",
} as const;

export interface RouteTable {
  /** Exact paths reachable without credentials. */
  public: readonly string[];
  /** Path prefixes that need the admin credential. */
  admin: readonly string[];
}

export const DEFAULT_ROUTES: RouteTable = {
  public: ["/", "/status", "/kill-da-clanker"],
  admin: ["/admin"],
};

/**
 * Public paths are listed explicitly; everything under an admin prefix
 * needs the admin key; anything else needs an API key. Matching ignores
 * case, repeated slashes and a trailing slash, so a path the router would
 * accept can never land in a weaker class.
 */
export function classifyRoute(path: string, routes: RouteTable = DEFAULT_ROUTES): RouteClass {
  const normalized = path.toLowerCase().replace(/\/{2,}/g, "/").replace(/\/+$/, "") || "/";
  if (routes.public.some((p) => p.toLowerCase() === normalized)) return "public";
  const isAdmin = routes.admin.some((prefix) => {
    const p = prefix.toLowerCase();
    return normalized === p || normalized.startsWith(`${p}/`);
  });
  return isAdmin ? "admin" : "key";
}

export interface CredentialRequest {
  path: string;
  headers: HeaderBag;
  query: Record<string, unknown>;
}

export interface AuthorizerOptions {
  admin: AdminCredential;
  apiKeys: ApiKeyRegistry;
  /** Also read credentials from query parameters. Headers always win. */
  acceptQueryParam?: boolean;
  routes?: RouteTable;
}

export class Authorizer {
  private readonly admin: AdminCredential;
  private readonly apiKeys: ApiKeyRegistry;
  private readonly acceptQueryParam: boolean;
  private readonly routes: RouteTable;

  constructor(options: AuthorizerOptions) {
    this.admin = options.admin;
    this.apiKeys = options.apiKeys;
    this.acceptQueryParam = options.acceptQueryParam ?? true;
    this.routes = options.routes ?? DEFAULT_ROUTES;
  }

  async evaluate(req: CredentialRequest): Promise<AuthDecision> {
    const route = classifyRoute(req.path, this.routes);

    switch (route) {
      case "public":
        return { outcome: "admitted", route, principal: null };
      case "admin":
        return this.evaluateAdmin(req);
      case "key":
        return this.evaluateKey(req);
    }
  }

  private async evaluateAdmin(req: CredentialRequest): Promise<AuthDecision> {
    const route = "admin";
    const secret = this.credential(req, HEADERS.adminKey, QUERY_PARAMS.adminKey);
    if (!secret) {
      return reject(route, "missing_credential", null);
    }

    try {
      const record = await this.admin.authenticate(secret);
      const principal: Principal = {
        name: record.name,
        role: "admin",
        projects: [WILDCARD_PROJECT],
        project: null,
      };
      return { outcome: "admitted", route, principal };
    } catch (err) {
      if (err instanceof InvalidCredentialError) {
        return reject(route, "invalid_credential", null);
      }
      throw err;
    }
  }

  private async evaluateKey(req: CredentialRequest): Promise<AuthDecision> {
    const route = "key";
    const name = this.credential(req, HEADERS.apiKeyName, QUERY_PARAMS.apiKeyName);
    const secret = this.credential(req, HEADERS.apiKey, QUERY_PARAMS.apiKey);
    if (!name || !secret) {
      return reject(route, "missing_credential", null);
    }

    const record = await this.apiKeys.authenticate(name, secret).catch((err: unknown) => {
      if (err instanceof InvalidCredentialError) return null;
      throw err;
    });
    if (!record) {
      return reject(route, "invalid_credential", null);
    }

    const project = this.credential(req, HEADERS.project, QUERY_PARAMS.project);
    if (!isUnscoped(record.projects) && !authorize(record, project)) {
      return reject(route, "project_scope_mismatch", record.name);
    }

    const principal: Principal = {
      name: record.name,
      role: record.role,
      projects: record.projects,
      project: project ? project.toLowerCase() : null,
    };
    return { outcome: "admitted", route, principal };
  }

  private credential(req: CredentialRequest, header: string, param: string): string | null {
    const fromHeader = headerValue(req.headers, header);
    if (fromHeader) return fromHeader;
    return this.acceptQueryParam ? queryValue(req.query, param) : null;
  }
}

function reject(route: RouteClass, reason: RejectReason, name: string | null): AuthDecision {
  return { outcome: "rejected", route, reason, name };
}

export function rejectionError(reason: RejectReason): Error {
  switch (reason) {
    case "missing_credential":
      return new MissingCredentialError("Missing credential");
    case "invalid_credential":
      return new InvalidCredentialError("Invalid credential");
    case "project_scope_mismatch":
      return new ProjectScopeError("Project not permitted for this API key");
  }
}

// ---------------------------------------------------------------------------
// Express adapter
// ---------------------------------------------------------------------------

export interface AuthMiddlewareOptions {
  authorizer: Authorizer;
  apiKeys: ApiKeyRegistry;
  audit: AuditLog;
  logger: Logger;
}

/**
 * Runs the Authorizer for every request. Admitted requests carry the
 * resolved principal in `res.locals.principal`; rejected requests end here.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions) {
  const { authorizer, apiKeys, audit, logger } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    void (async () => {
      const decision = await authorizer.evaluate({
        path: req.path,
        headers: req.headers,
        query: req.query,
      });

      if (decision.outcome === "admitted") {
        res.locals.principal = decision.principal;
        if (decision.route === "key" && decision.principal) {
          const { name } = decision.principal;
          await apiKeys.touch(name).catch((err: unknown) => {
            logger.warn("Failed to record key usage", { name, error: describe(err) });
          });
        }
        next();
        return;
      }

      const caller = clientIp(req);
      logger.warn("Request rejected", {
        path: req.path,
        method: req.method,
        reason: decision.reason,
        name: decision.name,
        caller,
      });
      await recordQuietly(audit, logger, {
        name: decision.name ?? ANONYMOUS,
        event: "rejected",
        path: req.path,
        reason: decision.reason,
        caller,
        timestamp: Date.now(),
      });

      const { status, body } = toErrorResponse(rejectionError(decision.reason));
      res.status(status).json(body);
    })().catch(next);
  };
}

export function principalOf(res: Response): Principal | null {
  const value: unknown = res.locals.principal;
  return isPrincipal(value) ? value : null;
}

function isPrincipal(value: unknown): value is Principal {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "role" in value &&
    "projects" in value &&
    Array.isArray(value.projects)
  );
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
