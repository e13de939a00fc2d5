import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { LocalRemote, type Remote } from "../src/adapters/index.js";
import { TransferError } from "../src/errors.js";
import { GAMES } from "../src/games.js";
import { steamId64 } from "../src/loginusers.js";
import type { SteamLayout } from "../src/paths.js";
import type { ChoicePrompt } from "../src/select.js";
import type { Endpoint } from "../src/transfer.js";

export const GAME = GAMES["slime-rancher"];
export const COMPAT_SAVE_DIR =
  "steamapps/compatdata/433340/pfx/drive_c/users/steamuser/AppData/LocalLow/Monomi Park/Slime Rancher";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "savehop-test-"));
}

export function writeFile(root: string, rel: string, content: string): void {
  const full = path.join(root, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
}

export interface FakeUser {
  id: number;
  persona?: string;
  /** Files under userdata/<id>/433340, keyed by relative path. */
  cloudFiles?: Record<string, string>;
  /** Create userdata/<id>/433340 even without files. */
  cloudDir?: boolean;
}

export interface FakeSteamOptions {
  users?: FakeUser[];
  /** Files under the Proton save directory, keyed by relative path. */
  compatFiles?: Record<string, string>;
  /** Raw loginusers.vdf; null leaves the file out. Generated from personas by default. */
  loginUsers?: string | null;
  /** Leave out userdata/ entirely. */
  noUserdata?: boolean;
}

export function loginUsersVdf(users: { id: number; persona: string }[]): string {
  const blocks = users.map(
    (u) =>
      `\t"${steamId64(u.id)}"\n\t{\n\t\t"AccountName"\t\t"acct_${u.id}"\n` +
      `\t\t"PersonaName"\t\t"${u.persona}"\n\t\t"RememberPassword"\t\t"1"\n\t}\n`,
  );
  return `"users"\n{\n${blocks.join("")}}\n`;
}

export function createSteamRoot(base: string, name: string, opts: FakeSteamOptions = {}): string {
  const root = path.join(base, name);
  fs.mkdirSync(root, { recursive: true });
  if (!opts.noUserdata) {
    fs.mkdirSync(path.join(root, "userdata"), { recursive: true });
  }

  const users = opts.users ?? [];
  for (const user of users) {
    const userDir = path.join(root, "userdata", String(user.id));
    fs.mkdirSync(userDir, { recursive: true });
    if (user.cloudDir || user.cloudFiles) {
      fs.mkdirSync(path.join(userDir, GAME.app_id), { recursive: true });
    }
    for (const [rel, content] of Object.entries(user.cloudFiles ?? {})) {
      writeFile(path.join(userDir, GAME.app_id), rel, content);
    }
  }

  for (const [rel, content] of Object.entries(opts.compatFiles ?? {})) {
    writeFile(path.join(root, COMPAT_SAVE_DIR), rel, content);
  }

  const loginUsers =
    opts.loginUsers === undefined
      ? loginUsersVdf(
          users.flatMap((u) => (u.persona === undefined ? [] : [{ id: u.id, persona: u.persona }])),
        )
      : opts.loginUsers;
  if (loginUsers !== null) {
    writeFile(root, "config/loginusers.vdf", loginUsers);
  }

  return root;
}

export function layoutFor(steamRoot: string): SteamLayout {
  return { steamRoot, game: GAME };
}

export function endpoint(steamRoot: string, address: string, remote: Remote = new LocalRemote()): Endpoint {
  return { host: { address, user: "deck", port: 22 }, remote, layout: layoutFor(steamRoot) };
}

/** Every file and directory under `dir`, with file contents. */
export function snapshotTree(dir: string): Record<string, string> {
  const tree: Record<string, string> = {};
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current).sort()) {
      const full = path.join(current, entry);
      const rel = path.relative(dir, full);
      if (fs.statSync(full).isDirectory()) {
        tree[`${rel}/`] = "<dir>";
        walk(full);
      } else {
        tree[rel] = fs.readFileSync(full, "utf-8");
      }
    }
  };
  walk(dir);
  return tree;
}

export class ScriptedPrompt implements ChoicePrompt {
  readonly calls: { message: string; choices: string[] }[] = [];
  private answers: (string | null)[];

  constructor(answers: (string | null)[] = []) {
    this.answers = [...answers];
  }

  async ask(message: string, choices: string[]): Promise<string | null> {
    this.calls.push({ message, choices });
    if (this.answers.length === 0) {
      throw new Error(`unexpected prompt: ${message}`);
    }
    const [next, ...rest] = this.answers;
    this.answers = rest;
    return next;
  }
}

export class OfflineRemote extends LocalRemote {
  isAvailable(): boolean {
    return false;
  }
}

/** Drops the connection while writing the named files. */
export class DroppingRemote extends LocalRemote {
  constructor(private readonly dropped: string[]) {
    super();
  }

  writeFile(filePath: string, data: Buffer): boolean {
    if (this.dropped.includes(path.basename(filePath))) {
      throw new TransferError("unreachable", "HostUnreachable", `Connection reset while writing ${filePath}`);
    }
    return super.writeFile(filePath, data);
  }
}

/** Reports every write as successful without storing anything. */
export class BlackHoleRemote extends LocalRemote {
  writeFile(): boolean {
    return true;
  }
}
