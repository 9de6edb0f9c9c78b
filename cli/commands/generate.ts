import { Command } from "commander";
import { getEndpoint, getAdminKey, apiCall } from "./helpers";

interface GenerateResponse {
  name: string;
  role: string;
  projects: string[];
  secret: string;
}

export const generateCommand = new Command("generate")
  .description("Mint a new API key (the secret is shown once)")
  .argument("<name>", "Key name (e.g., groupme-bot, dashboard)")
  .option("--projects <list>", "Comma-separated projects the key may act on (default: all)")
  .option("--role <role>", "Advisory role: user, service or admin", "user")
  .option("--notes <text>", "Free-text notes")
  .action(async (name: string, opts: { projects?: string; role: string; notes?: string }, cmd: Command) => {
    const endpoint = getEndpoint(cmd);
    const adminKey = getAdminKey(cmd);

    const data = await apiCall<GenerateResponse>(endpoint, "/admin/generate-key", "POST", adminKey, {
      name,
      projects: opts.projects,
      role: opts.role,
      notes: opts.notes,
    });

    console.log(`\n  API key created`);
    console.log(`  Name:     ${data.name}`);
    console.log(`  Role:     ${data.role}`);
    console.log(`  Projects: ${data.projects.length ? data.projects.join(", ") : "*"}`);
    console.log(`  Secret:   ${data.secret}`);
    console.log(`\n  Store the secret now; it cannot be shown again.\n`);
  });
