#!/usr/bin/env node
// ---------------------------------------------------------------------------
// clanker-guard CLI
//
// Provisions the admin credential locally and manages API keys through a
// running service over HTTP.
// ---------------------------------------------------------------------------

import { Command } from "commander";
import { initAdminCommand } from "./commands/init-admin";
import { generateCommand } from "./commands/generate";
import { listCommand } from "./commands/list";
import { revokeCommand } from "./commands/revoke";
import { auditCommand } from "./commands/audit";
import { statusCommand } from "./commands/status";

const program = new Command();

program
  .name("clanker-guard")
  .description("Credential management for the clanker-guard moderation webhook")
  .version("0.1.0")
  .option(
    "--endpoint <url>",
    "clanker-guard service URL",
    process.env.CLANKER_GUARD_ENDPOINT || "http://localhost:8000"
  )
  .option(
    "--admin-key <key>",
    "Admin key secret",
    process.env.CLANKER_GUARD_ADMIN_KEY
  );

program.addCommand(initAdminCommand);
program.addCommand(generateCommand);
program.addCommand(listCommand);
program.addCommand(revokeCommand);
program.addCommand(auditCommand);
program.addCommand(statusCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
