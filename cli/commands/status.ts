import { Command } from "commander";
import { getEndpoint } from "./helpers";

interface StatusData {
  status: string;
  version: string;
  uptime_ms: number;
  storage: string;
  keys_registered: number;
}

export const statusCommand = new Command("status")
  .description("Check clanker-guard service health")
  .action(async (_opts: unknown, cmd: Command) => {
    const endpoint = getEndpoint(cmd);

    try {
      const res = await fetch(`${endpoint}/status`);
      const data = (await res.json()) as StatusData;

      console.log(`\n  clanker-guard Status`);
      console.log(`  Endpoint: ${endpoint}`);
      console.log(`  Status:   ${data.status === "ok" ? "OK" : "DEGRADED"}`);
      console.log(`  Version:  ${data.version}`);
      console.log(`  Uptime:   ${formatUptime(data.uptime_ms)}`);
      console.log(`  Storage:  ${data.storage}`);
      console.log(`  Keys:     ${data.keys_registered} active`);
      console.log();
    } catch (err) {
      console.error(`\n  Failed to reach ${endpoint}/status`);
      console.error(`  ${err instanceof Error ? err.message : "Connection failed"}\n`);
      process.exit(1);
    }
  });

export function formatUptime(ms: number): string {
  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  if (hours > 24) return `${Math.floor(hours / 24)}d ${hours % 24}h`;
  return `${hours}h ${minutes}m`;
}
