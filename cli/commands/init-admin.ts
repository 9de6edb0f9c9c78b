import { Command } from "commander";
import { AdminCredential } from "../../lib/admin-credential";
import { loadConfig } from "../../lib/config";
import { hasherFor, storageFor } from "../../lib/context";
import { DuplicateIdentityError } from "../../lib/errors";

/**
 * Provision the admin credential directly in storage. This never goes over
 * HTTP: whoever runs it needs access to the service's data directory.
 */
export const initAdminCommand = new Command("init-admin")
  .description("Create the admin credential locally and print its secret once")
  .option("--data-dir <dir>", "Credential directory (defaults to DATA_DIR or ./data)")
  .option("--name <name>", "Admin credential name", "admin")
  .option("--force", "Replace an existing admin credential", false)
  .action(async (opts: { dataDir?: string; name: string; force: boolean }) => {
    const config = loadConfig();
    const admin = new AdminCredential({
      storage: storageFor({ data_dir: opts.dataDir ?? config.data_dir }),
      hasher: hasherFor(config),
    });

    await admin.open();
    try {
      const { secret } = await admin.bootstrap({ name: opts.name, force: opts.force });
      console.log("\n  Admin key generated. Save this secret somewhere safe. It will not be shown again.\n");
      console.log(secret);
      console.log();
    } catch (err) {
      if (err instanceof DuplicateIdentityError) {
        console.error(`Error: an admin credential ("${err.identity}") already exists. Use --force to replace it.`);
        process.exitCode = 1;
        return;
      }
      throw err;
    } finally {
      await admin.close();
    }
  });
