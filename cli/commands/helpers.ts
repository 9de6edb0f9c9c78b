import { Command } from "commander";

interface ApiResponse {
  error?: string;
  [key: string]: unknown;
}

type GlobalOptions = {
  endpoint?: string;
  adminKey?: string;
};

function globalOpts(cmd: Command): GlobalOptions {
  const parent = cmd.parent;
  return parent ? parent.opts<GlobalOptions>() : {};
}

export function getEndpoint(cmd: Command): string {
  return globalOpts(cmd).endpoint || "http://localhost:8000";
}

export function getAdminKey(cmd: Command): string {
  const key = globalOpts(cmd).adminKey;
  if (!key) {
    console.error("Error: --admin-key is required (or set CLANKER_GUARD_ADMIN_KEY env var)");
    process.exit(1);
  }
  return key;
}

export async function apiCall<T extends object>(
  endpoint: string,
  path: string,
  method: string,
  adminKey: string,
  body?: Record<string, unknown>
): Promise<T> {
  const url = `${endpoint}${path}`;

  const opts: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      "X-API-Admin-Key": adminKey,
    },
  };

  if (body && method !== "GET") {
    opts.body = JSON.stringify(body);
  }

  try {
    const res = await fetch(url, opts);
    const data = (await res.json()) as T & ApiResponse;

    if (!res.ok) {
      console.error(`Error (${res.status}): ${data.error || "Unknown error"}`);
      process.exit(1);
    }

    return data;
  } catch (err) {
    console.error(`Failed to connect to ${url}`);
    console.error(err instanceof Error ? err.message : "Connection failed");
    process.exit(1);
  }
}

export function formatTimestamp(iso: string | null, now: number = Date.now()): string {
  if (!iso) return "never";
  const diff = now - new Date(iso).getTime();

  if (diff < 60_000) return `${Math.round(diff / 1000)}s ago`;
  if (diff < 3_600_000) return `${Math.round(diff / 60_000)}m ago`;
  if (diff < 86_400_000) return `${Math.round(diff / 3_600_000)}h ago`;
  return `${Math.round(diff / 86_400_000)}d ago`;
}

export function parseDuration(s: string, now: number = Date.now()): number {
  const match = s.match(/^(\d+)(h|d|m)$/);
  if (!match) return now - 24 * 60 * 60 * 1000;

  const val = Number(match[1]);
  const unit = match[2];
  const ms = unit === "h" ? val * 3_600_000 : unit === "d" ? val * 86_400_000 : val * 60_000;

  return now - ms;
}
