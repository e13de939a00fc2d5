import type { ConnectionSettings, HostTarget, Remote } from "./base.js";
import { LocalRemote } from "./local.js";
import { SshRemote } from "./ssh.js";
import { isTransferError } from "../errors.js";

export { Remote, hasExtension } from "./base.js";
export type { ConnectionSettings, HostTarget, RunResult } from "./base.js";
export { LocalRemote } from "./local.js";
export { SshRemote, shellQuote } from "./ssh.js";

export const LOCAL_ADDRESS = "local";

export function createAdapter(target: HostTarget, settings: ConnectionSettings): Remote {
  if (target.address === LOCAL_ADDRESS) {
    return new LocalRemote();
  }
  return new SshRemote(target, settings);
}

export type CopyResult = { ok: true; bytes: number } | { ok: false; reason: string };

/**
 * Copy one file between two hosts, relaying the bytes through this process.
 * The destination's parent directory must already exist.
 */
export function copyBetween(
  source: Remote,
  sourcePath: string,
  dest: Remote,
  destPath: string,
): CopyResult {
  try {
    const data = source.readFile(sourcePath);
    if (data === null) {
      return { ok: false, reason: `could not read ${sourcePath} on ${source.displayName}` };
    }
    if (!dest.writeFile(destPath, data)) {
      return { ok: false, reason: `could not write ${destPath} on ${dest.displayName}` };
    }
    return { ok: true, bytes: data.length };
  } catch (e) {
    if (isTransferError(e, "unreachable")) {
      return { ok: false, reason: e.message };
    }
    throw e;
  }
}
