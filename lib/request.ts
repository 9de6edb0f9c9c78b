// ---------------------------------------------------------------------------
// clanker-guard request helpers
// ---------------------------------------------------------------------------

import type { Request } from "express";

export type HeaderBag = Record<string, string | string[] | undefined>;

/** First non-empty value of a header, matched case-insensitively. */
export function headerValue(headers: HeaderBag, name: string): string | null {
  const raw = headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : null;
}

/** A query parameter, only when it was given exactly once as text. */
export function queryValue(query: Record<string, unknown>, name: string): string | null {
  const value = query[name];
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function clientIp(req: Request): string {
  return (
    headerValue(req.headers, "x-forwarded-for")?.split(",")[0].trim() ||
    req.ip ||
    req.socket?.remoteAddress ||
    "unknown"
  );
}
