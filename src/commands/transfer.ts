import { createAdapter, LOCAL_ADDRESS, type HostTarget } from "../adapters/index.js";
import { getHost, loadConfig, type Config, type MissingDestPolicy } from "../config.js";
import { TransferError } from "../errors.js";
import { getGame, type Game } from "../games.js";
import type { ChoicePrompt } from "../select.js";
import { exitCodeFor, runTransfer, type Endpoint } from "../transfer.js";
import { blank, debug, error, heading, info, setVerbose, styled, warn } from "../ui.js";

export interface TransferCliOptions {
  source?: string;
  dest?: string;
  sourceUser?: string;
  destUser?: string;
  sshUser?: string;
  port?: number;
  game?: string;
  steamRoot?: string;
  onMissingDest?: MissingDestPolicy;
  config?: string;
  dryRun?: boolean;
  backup?: boolean;
  verbose?: boolean;
  listUsers?: boolean;
  nonInteractive?: boolean;
}

export interface ResolvedHost {
  target: HostTarget;
  steamRoot: string;
}

/**
 * Turn a host argument into a target. A configured alias supplies its own
 * address, user, port and Steam root; `user@address` sets the user inline.
 * Flags override alias values, which override config defaults.
 */
export function resolveHost(spec: string, config: Config, opts: TransferCliOptions): ResolvedHost {
  const { defaults } = config;
  const alias = getHost(config, spec);
  if (alias) {
    return {
      target: {
        address: alias.address,
        user: opts.sshUser ?? alias.user ?? defaults.ssh_user,
        port: opts.port ?? alias.port ?? defaults.port,
      },
      steamRoot: opts.steamRoot ?? alias.steam_root ?? defaults.steam_root,
    };
  }

  const at = spec.indexOf("@");
  const inlineUser = at > 0 ? spec.slice(0, at) : undefined;
  const address = at >= 0 ? spec.slice(at + 1) : spec;
  if (!address) {
    throw new TransferError("usage", "InvalidArguments", `Invalid host: ${spec}`);
  }
  return {
    target: {
      address,
      user: inlineUser ?? opts.sshUser ?? defaults.ssh_user,
      port: opts.port ?? defaults.port,
    },
    steamRoot: opts.steamRoot ?? defaults.steam_root,
  };
}

function describeTarget(target: HostTarget): string {
  if (target.address === LOCAL_ADDRESS) return LOCAL_ADDRESS;
  return `${target.user}@${target.address}:${target.port}`;
}

function buildEndpoint(resolved: ResolvedHost, config: Config, game: Game): Endpoint {
  const remote = createAdapter(resolved.target, {
    connectTimeout: config.defaults.connect_timeout,
    commandTimeout: config.defaults.command_timeout,
  });
  return { host: resolved.target, remote, layout: { steamRoot: resolved.steamRoot, game } };
}

/** Run the transfer described by the CLI options. Resolves to the process exit code. */
export async function transferAction(opts: TransferCliOptions, prompt: ChoicePrompt): Promise<number> {
  setVerbose(opts.verbose === true);

  try {
    if (!opts.source || !opts.dest) {
      throw new TransferError("usage", "InvalidArguments", "Source and destination hosts are required (-s, -d)");
    }

    const config = loadConfig(opts.config);
    const gameName = opts.game ?? config.defaults.game;
    const game = getGame(gameName);
    if (!game) {
      throw new TransferError("usage", "InvalidArguments", `Unknown game '${gameName}'. Run: savehop list-games`);
    }

    const source = buildEndpoint(resolveHost(opts.source, config, opts), config, game);
    const dest = buildEndpoint(resolveHost(opts.dest, config, opts), config, game);

    heading(`${game.title} save transfer`);
    info(`Source: ${describeTarget(source.host)}`);
    info(`Destination: ${describeTarget(dest.host)}`);
    if (opts.dryRun) {
      warn("DRY RUN MODE - No changes will be made");
    }
    if (opts.sourceUser && opts.destUser) {
      info(`Non-interactive mode: '${opts.sourceUser}' ${styled("->", { color: "cyan" })} '${opts.destUser}'`);
    }
    blank();

    const report = await runTransfer(
      { source, dest, prompt },
      {
        sourceUser: opts.sourceUser,
        destUser: opts.destUser,
        dryRun: opts.dryRun === true,
        backup: opts.backup === true,
        listOnly: opts.listUsers === true,
        nonInteractive: opts.nonInteractive === true,
        onMissingDest: opts.onMissingDest ?? config.defaults.on_missing_dest,
      },
    );
    blank();
    return exitCodeFor(report);
  } catch (e) {
    if (e instanceof TransferError) {
      error(e.message);
      debug(`Stopped at ${e.stage ?? "startup"} (${e.reason})`);
      blank();
      return e.code;
    }
    throw e;
  }
}
