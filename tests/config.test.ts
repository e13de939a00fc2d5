import { describe, test, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  loadConfig,
  saveConfig,
  getHost,
  emptyConfig,
  isMissingDestPolicy,
  type Config,
} from "../src/config.js";
import { TransferError } from "../src/errors.js";
import { DEFAULT_STEAM_ROOT } from "../src/paths.js";
import { createTmpDir } from "./fixtures.js";

const tmpDirs: string[] = [];

function tmpDir(): string {
  const d = createTmpDir();
  tmpDirs.push(d);
  return d;
}

afterEach(() => {
  for (const d of tmpDirs) {
    fs.rmSync(d, { recursive: true, force: true });
  }
  tmpDirs.length = 0;
});

describe("loadConfig", () => {
  test("missing file gives defaults", () => {
    const config = loadConfig(path.join(tmpDir(), "nope.json"));
    expect(config).toEqual(emptyConfig());
    expect(config.defaults).toEqual({
      ssh_user: "deck",
      port: 22,
      connect_timeout: 10,
      command_timeout: 120,
      steam_root: DEFAULT_STEAM_ROOT,
      game: "slime-rancher",
      on_missing_dest: "fail",
    });
  });

  test("partial defaults are filled in", () => {
    const p = path.join(tmpDir(), "config.json");
    fs.writeFileSync(p, JSON.stringify({ defaults: { port: 2222, on_missing_dest: "use-single" } }));
    const config = loadConfig(p);
    expect(config.defaults.port).toBe(2222);
    expect(config.defaults.on_missing_dest).toBe("use-single");
    expect(config.defaults.ssh_user).toBe("deck");
    expect(config.hosts).toEqual({});
  });

  test("invalid JSON is a config error", () => {
    const p = path.join(tmpDir(), "config.json");
    fs.writeFileSync(p, "{ not json");
    expect(() => loadConfig(p)).toThrow(TransferError);
    try {
      loadConfig(p);
    } catch (e) {
      expect(e).toBeInstanceOf(TransferError);
      if (e instanceof TransferError) {
        expect(e.kind).toBe("config");
        expect(e.code).toBe(2);
        expect(e.message.startsWith(`Invalid config in ${p}: `)).toBe(true);
      }
    }
  });

  test.each([
    [{ defaults: { port: 0 } }, "defaults.port must be a positive integer"],
    [{ defaults: { port: "22" } }, "defaults.port must be a positive integer"],
    [{ defaults: { ssh_user: "" } }, "defaults.ssh_user must be a non-empty string"],
    [{ defaults: { on_missing_dest: "guess" } }, "defaults.on_missing_dest must be one of fail, use-single"],
    [{ hosts: { deck: { user: "deck" } } }, "hosts.deck.address is required"],
    [{ hosts: { deck: "10.0.0.42" } }, "hosts.deck must be an object"],
    [[], "expected a JSON object"],
  ])("rejects %j", (data, detail) => {
    const p = path.join(tmpDir(), "config.json");
    fs.writeFileSync(p, JSON.stringify(data));
    expect(() => loadConfig(p)).toThrow(`Invalid config in ${p}: ${detail}`);
  });
});

describe("saveConfig", () => {
  test("round-trips hosts and defaults", () => {
    const p = path.join(tmpDir(), "nested", "dir", "config.json");
    const config: Config = emptyConfig();
    config.defaults.ssh_user = "gamer";
    config.hosts.steamdeck = { name: "steamdeck", address: "10.0.0.42" };
    config.hosts.desktop = {
      name: "desktop",
      address: "192.168.1.10",
      user: "player",
      port: 2222,
      steam_root: "/home/player/.steam/steam",
    };

    saveConfig(config, p);
    expect(fs.existsSync(p)).toBe(true);
    expect(loadConfig(p)).toEqual(config);
  });

  test("host names are keys, not fields", () => {
    const p = path.join(tmpDir(), "config.json");
    const config = emptyConfig();
    config.hosts.steamdeck = { name: "steamdeck", address: "10.0.0.42" };
    saveConfig(config, p);

    const raw = fs.readFileSync(p, "utf-8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(JSON.parse(raw).hosts).toEqual({ steamdeck: { address: "10.0.0.42" } });
  });
});

test("getHost", () => {
  const config = emptyConfig();
  config.hosts.steamdeck = { name: "steamdeck", address: "10.0.0.42" };
  expect(getHost(config, "steamdeck")?.address).toBe("10.0.0.42");
  expect(getHost(config, "desktop")).toBeUndefined();
});

test("isMissingDestPolicy", () => {
  expect(isMissingDestPolicy("fail")).toBe(true);
  expect(isMissingDestPolicy("use-single")).toBe(true);
  expect(isMissingDestPolicy("skip")).toBe(false);
  expect(isMissingDestPolicy(undefined)).toBe(false);
});
