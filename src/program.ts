import { Command, InvalidArgumentError, Option } from "commander";
import { initCommand } from "./commands/init.js";
import { listGamesCommand } from "./commands/list-games.js";
import { transferAction, type TransferCliOptions } from "./commands/transfer.js";
import { MISSING_DEST_POLICIES } from "./config.js";
import { clackPrompt } from "./prompt.js";
import type { ChoicePrompt } from "./select.js";

export const VERSION = "0.1.0";

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }
  return port;
}

export function createProgram(prompt: ChoicePrompt = clackPrompt): Command {
  const program = new Command();
  program
    .name("savehop")
    .description("Transfer game saves between Steam users on two devices")
    .version(VERSION, "-V, --version", "Output the version number")
    .option("-s, --source <host>", "Source device: hostname, IP, user@host, config alias, or 'local'")
    .option("-d, --dest <host>", "Destination device")
    .option("--source-user <name>", "Source Steam user (exact persona name)")
    .option("--dest-user <name>", "Destination Steam user (exact persona name)")
    .option("-u, --ssh-user <user>", "SSH username (default from config: deck)")
    .option("-p, --port <port>", "SSH port (default from config: 22)", parsePort)
    .option("-g, --game <name>", "Game to transfer (see list-games)")
    .option("--steam-root <path>", "Steam installation directory on both devices")
    .addOption(
      new Option("--on-missing-dest <policy>", "What to do when --dest-user is not found")
        .choices(MISSING_DEST_POLICIES),
    )
    .option("-c, --config <path>", "Config file to read")
    .option("-n, --dry-run", "Show what would be transferred without doing it")
    .option("-b, --backup", "Back up existing saves on the destination first")
    .option("-v, --verbose", "Verbose output")
    .option("--list-users", "List Steam users with save data on both devices and exit")
    .option("--non-interactive", "Fail instead of prompting when a user choice is needed")
    .action(async (opts: TransferCliOptions) => {
      process.exitCode = await transferAction(opts, prompt);
    });

  program.addCommand(initCommand);
  program.addCommand(listGamesCommand);

  return program;
}
