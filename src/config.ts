import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { TransferError } from "./errors.js";
import { DEFAULT_GAME } from "./games.js";
import { DEFAULT_STEAM_ROOT } from "./paths.js";

export const CONFIG_DIR = path.join(os.homedir(), ".config", "savehop");
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");
export const CONFIG_VERSION = 1;

export const MISSING_DEST_POLICIES = ["fail", "use-single"] as const;
export type MissingDestPolicy = (typeof MISSING_DEST_POLICIES)[number];

export interface Defaults {
  ssh_user: string;
  port: number;
  /** Seconds. */
  connect_timeout: number;
  /** Seconds. */
  command_timeout: number;
  steam_root: string;
  game: string;
  on_missing_dest: MissingDestPolicy;
}

export interface HostConfig {
  name: string;
  address: string;
  user?: string;
  port?: number;
  steam_root?: string;
}

export interface Config {
  version: number;
  defaults: Defaults;
  hosts: Record<string, HostConfig>;
}

export function defaultSettings(): Defaults {
  return {
    ssh_user: "deck",
    port: 22,
    connect_timeout: 10,
    command_timeout: 120,
    steam_root: DEFAULT_STEAM_ROOT,
    game: DEFAULT_GAME,
    on_missing_dest: "fail",
  };
}

export function emptyConfig(): Config {
  return { version: CONFIG_VERSION, defaults: defaultSettings(), hosts: {} };
}

function invalid(configPath: string, detail: string): TransferError {
  return new TransferError("config", "InvalidConfig", `Invalid config in ${configPath}: ${detail}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string, configPath: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(configPath, `${field} must be a non-empty string`);
  }
  return value;
}

function optionalPositiveInt(value: unknown, field: string, configPath: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw invalid(configPath, `${field} must be a positive integer`);
  }
  return value;
}

export function isMissingDestPolicy(value: unknown): value is MissingDestPolicy {
  return MISSING_DEST_POLICIES.some((policy) => policy === value);
}

export function getHost(config: Config, name: string): HostConfig | undefined {
  return config.hosts[name];
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? CONFIG_FILE;
  if (!fs.existsSync(p)) {
    return emptyConfig();
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(p, "utf-8"));
  } catch (e) {
    if (e instanceof SyntaxError) throw invalid(p, e.message);
    throw e;
  }
  if (!isRecord(data)) throw invalid(p, "expected a JSON object");

  const base = defaultSettings();
  const rawDefaults = data.defaults ?? {};
  if (!isRecord(rawDefaults)) throw invalid(p, "defaults must be an object");

  let onMissingDest = base.on_missing_dest;
  if (rawDefaults.on_missing_dest !== undefined) {
    if (!isMissingDestPolicy(rawDefaults.on_missing_dest)) {
      throw invalid(p, `defaults.on_missing_dest must be one of ${MISSING_DEST_POLICIES.join(", ")}`);
    }
    onMissingDest = rawDefaults.on_missing_dest;
  }

  const defaults: Defaults = {
    ssh_user: optionalString(rawDefaults.ssh_user, "defaults.ssh_user", p) ?? base.ssh_user,
    port: optionalPositiveInt(rawDefaults.port, "defaults.port", p) ?? base.port,
    connect_timeout:
      optionalPositiveInt(rawDefaults.connect_timeout, "defaults.connect_timeout", p) ?? base.connect_timeout,
    command_timeout:
      optionalPositiveInt(rawDefaults.command_timeout, "defaults.command_timeout", p) ?? base.command_timeout,
    steam_root: optionalString(rawDefaults.steam_root, "defaults.steam_root", p) ?? base.steam_root,
    game: optionalString(rawDefaults.game, "defaults.game", p) ?? base.game,
    on_missing_dest: onMissingDest,
  };

  const rawHosts = data.hosts ?? {};
  if (!isRecord(rawHosts)) throw invalid(p, "hosts must be an object");

  const hosts: Record<string, HostConfig> = {};
  for (const [hname, hconf] of Object.entries(rawHosts)) {
    if (!isRecord(hconf)) throw invalid(p, `hosts.${hname} must be an object`);
    const address = optionalString(hconf.address, `hosts.${hname}.address`, p);
    if (!address) throw invalid(p, `hosts.${hname}.address is required`);
    const user = optionalString(hconf.user, `hosts.${hname}.user`, p);
    const port = optionalPositiveInt(hconf.port, `hosts.${hname}.port`, p);
    const steamRoot = optionalString(hconf.steam_root, `hosts.${hname}.steam_root`, p);
    hosts[hname] = {
      name: hname,
      address,
      ...(user ? { user } : {}),
      ...(port ? { port } : {}),
      ...(steamRoot ? { steam_root: steamRoot } : {}),
    };
  }

  const version = optionalPositiveInt(data.version, "version", p) ?? CONFIG_VERSION;
  return { version, defaults, hosts };
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? CONFIG_FILE;
  fs.mkdirSync(path.dirname(p), { recursive: true });

  const hosts: Record<string, Omit<HostConfig, "name">> = {};
  for (const [hname, host] of Object.entries(config.hosts)) {
    hosts[hname] = {
      address: host.address,
      ...(host.user ? { user: host.user } : {}),
      ...(host.port ? { port: host.port } : {}),
      ...(host.steam_root ? { steam_root: host.steam_root } : {}),
    };
  }

  const data = { version: config.version, defaults: config.defaults, hosts };
  fs.writeFileSync(p, JSON.stringify(data, null, 2) + "\n");
}
