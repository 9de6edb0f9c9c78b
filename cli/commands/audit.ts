import { Command } from "commander";
import { getEndpoint, getAdminKey, apiCall, parseDuration } from "./helpers";

interface AuditResponse {
  stats: { total_events: number; rejections: number };
  entries: Array<{ event: string; path: string; reason: string | null; caller: string; timestamp: string }>;
}

export const auditCommand = new Command("audit")
  .description("View audit events for a key name (use \"anonymous\" for unresolved rejections)")
  .argument("<name>", "Key name to audit")
  .option("--last <duration>", "Time window (e.g., 1h, 7d, 30m)", "24h")
  .option("--limit <number>", "Max entries to show", "20")
  .action(async (name: string, opts: { last: string; limit: string }, cmd: Command) => {
    const endpoint = getEndpoint(cmd);
    const adminKey = getAdminKey(cmd);

    const params = new URLSearchParams({
      name,
      since: parseDuration(opts.last).toString(),
      limit: opts.limit,
    });

    const data = await apiCall<AuditResponse>(endpoint, `/admin/audit?${params.toString()}`, "GET", adminKey);

    console.log(`\n  Audit Log: ${name}`);
    console.log(`  Period: last ${opts.last}\n`);
    console.log(`  Events:      ${data.stats.total_events}`);
    console.log(`  Rejections:  ${data.stats.rejections}`);
    console.log();

    if (data.entries.length === 0) {
      console.log("  No entries found in this period.\n");
      return;
    }

    console.log(
      "  " +
      "TIME".padEnd(14) +
      "EVENT".padEnd(10) +
      "PATH".padEnd(24) +
      "REASON".padEnd(26) +
      "CALLER"
    );
    console.log("  " + "-".repeat(86));

    for (const e of data.entries) {
      const time = new Date(e.timestamp).toLocaleTimeString();
      const path = e.path.length > 22 ? e.path.slice(0, 19) + "..." : e.path;

      console.log(
        "  " +
        time.padEnd(14) +
        e.event.padEnd(10) +
        path.padEnd(24) +
        (e.reason ?? "-").padEnd(26) +
        e.caller
      );
    }
    console.log();
  });
