import { Command } from "commander";

import { DEFAULT_CONFIG_FILE } from "./config";
import { planCommand, syncCommand } from "./commands";

type SyncCliOptions = {
  config: string;
  dryRun?: boolean;
};

export function createProgram(): Command {
  const program = new Command();

  program
    .name("dirsync")
    .description("Two-way sync between local directories and a remote store, newest copy wins");

  program
    .command("sync")
    .description("Bring every configured pair up to date in both directions")
    .option("-c, --config <path>", "configuration file", DEFAULT_CONFIG_FILE)
    .option("--dry-run", "compute and print the plan without transferring anything")
    .action(async (options: SyncCliOptions) => {
      process.exitCode = await syncCommand(options);
    });

  program
    .command("plan")
    .description("Print what a sync would transfer")
    .option("-c, --config <path>", "configuration file", DEFAULT_CONFIG_FILE)
    .action(async (options: SyncCliOptions) => {
      process.exitCode = await planCommand(options);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
