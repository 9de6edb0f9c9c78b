import { Command } from "commander";
import { getEndpoint, getAdminKey, apiCall } from "./helpers";

interface RevokeResponse {
  name: string;
  revoked_at: string;
}

export const revokeCommand = new Command("revoke")
  .description("Permanently revoke an API key")
  .argument("<name>", "Key name to revoke")
  .action(async (name: string, _opts: unknown, cmd: Command) => {
    const endpoint = getEndpoint(cmd);
    const adminKey = getAdminKey(cmd);

    const data = await apiCall<RevokeResponse>(endpoint, "/admin/revoke-key", "POST", adminKey, { name });

    console.log(`\n  Key revoked`);
    console.log(`  Name:       ${data.name}`);
    console.log(`  Revoked at: ${data.revoked_at}`);
    console.log();
  });
