import { Command } from "commander";
import * as clack from "@clack/prompts";
import { cmd } from "../ui.js";
import {
  loadConfig,
  saveConfig,
  CONFIG_FILE,
  MISSING_DEST_POLICIES,
  type HostConfig,
  type MissingDestPolicy,
} from "../config.js";
import { GAMES } from "../games.js";

/** If an existing value is set, pre-fill the input; otherwise show a greyed-out placeholder. */
function textDefaults(existing: string | undefined, fallback: string) {
  return existing
    ? { initialValue: existing }
    : { placeholder: fallback };
}

function orCancel<T>(value: T | symbol): T {
  if (clack.isCancel(value)) {
    clack.cancel("Setup cancelled.");
    process.exit(0);
  }
  return value;
}

function validatePort(value: string): string | undefined {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) return "Port must be between 1 and 65535";
  return undefined;
}

const POLICY_LABELS: Record<MissingDestPolicy, string> = {
  fail: "Stop the transfer",
  "use-single": "Use the only destination user that has save data",
};

export const initCommand = new Command("init")
  .description("Interactive setup: SSH defaults, Steam location, game, and host aliases")
  .option("-c, --config <path>", "Config file to write", CONFIG_FILE)
  .action(async (opts: { config: string }) => {
    clack.intro("savehop setup");

    const config = loadConfig(opts.config);
    const { defaults } = config;

    const game = orCancel(
      await clack.select({
        message: "Which game's saves are we moving?",
        initialValue: defaults.game,
        options: Object.entries(GAMES).map(([name, g]) => ({
          value: name,
          label: `${g.title} (app ${g.app_id})`,
        })),
      }),
    );

    const sshUser = orCancel(
      await clack.text({
        message: "Default SSH user",
        ...textDefaults(defaults.ssh_user, "deck"),
        validate: (v) => (v.trim() ? undefined : "SSH user is required"),
      }),
    );

    const port = orCancel(
      await clack.text({
        message: "Default SSH port",
        initialValue: String(defaults.port),
        validate: validatePort,
      }),
    );

    const steamRoot = orCancel(
      await clack.text({
        message: "Steam installation directory on the devices",
        ...textDefaults(defaults.steam_root, "/home/deck/.local/share/Steam"),
        validate: (v) => (v.startsWith("/") ? undefined : "Use an absolute path"),
      }),
    );

    const onMissingDest = orCancel(
      await clack.select({
        message: "When --dest-user names nobody on the destination",
        initialValue: defaults.on_missing_dest,
        options: MISSING_DEST_POLICIES.map((policy) => ({
          value: policy,
          label: POLICY_LABELS[policy],
        })),
      }),
    );

    config.defaults = {
      ...defaults,
      game,
      ssh_user: sshUser.trim(),
      port: Number(port),
      steam_root: steamRoot,
      on_missing_dest: onMissingDest,
    };

    let addHost = orCancel(
      await clack.confirm({
        message: "Add a host alias (e.g. a Steam Deck's address)?",
        initialValue: Object.keys(config.hosts).length === 0,
      }),
    );

    while (addHost) {
      const name = orCancel(
        await clack.text({
          message: "Alias",
          placeholder: "steamdeck",
          validate: (v) => (/^[\w.-]+$/.test(v) ? undefined : "Letters, digits, '.', '_' and '-' only"),
        }),
      );
      const existing = config.hosts[name];
      const address = orCancel(
        await clack.text({
          message: "Hostname or IP",
          ...textDefaults(existing?.address, "10.0.0.42"),
          validate: (v) => (v.trim() ? undefined : "Address is required"),
        }),
      );

      const host: HostConfig = { name, address: address.trim() };
      if (existing?.user) host.user = existing.user;
      if (existing?.port) host.port = existing.port;
      if (existing?.steam_root) host.steam_root = existing.steam_root;
      config.hosts[name] = host;

      addHost = orCancel(
        await clack.confirm({ message: "Add another host?", initialValue: false }),
      );
    }

    saveConfig(config, opts.config);

    const aliases = Object.keys(config.hosts);
    const nextSteps = [
      `${cmd("savehop list-games")}                   — see supported games`,
      ...(aliases.length >= 2
        ? [`${cmd(`savehop -s ${aliases[0]} -d ${aliases[1]} --list-users`)}  — see who has saves`]
        : [`${cmd("savehop -s <host> -d <host> --list-users")}  — see who has saves`]),
    ];

    clack.outro(`Config saved to ${opts.config}. Next steps:\n\n${nextSteps.join("\n")}`);
  });
