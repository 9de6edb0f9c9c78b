import { Command } from "commander";
import { getEndpoint, getAdminKey, apiCall, formatTimestamp } from "./helpers";

interface KeyInfo {
  name: string;
  role: string;
  projects: string[];
  revoked: boolean;
  last_used: string | null;
}

interface ListResponse {
  count: number;
  keys: KeyInfo[];
}

export const listCommand = new Command("list")
  .description("List all API keys")
  .action(async (_opts: unknown, cmd: Command) => {
    const endpoint = getEndpoint(cmd);
    const adminKey = getAdminKey(cmd);

    const data = await apiCall<ListResponse>(endpoint, "/admin/list-keys", "GET", adminKey);

    if (data.count === 0) {
      console.log("\n  No API keys. Use `clanker-guard generate` to create one.\n");
      return;
    }

    console.log(`\n  API Keys (${data.count}):\n`);
    console.log(
      "  " +
      "NAME".padEnd(24) +
      "ROLE".padEnd(10) +
      "PROJECTS".padEnd(28) +
      "STATE".padEnd(10) +
      "LAST USED"
    );
    console.log("  " + "-".repeat(84));

    for (const k of data.keys) {
      const projects = k.projects.length ? k.projects.join(",") : "*";
      const shown = projects.length > 26 ? projects.slice(0, 23) + "..." : projects;

      console.log(
        "  " +
        k.name.padEnd(24) +
        k.role.padEnd(10) +
        shown.padEnd(28) +
        (k.revoked ? "revoked" : "active").padEnd(10) +
        formatTimestamp(k.last_used)
      );
    }
    console.log();
  });
