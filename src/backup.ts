import type { Remote } from "./adapters/index.js";
import { isTransferError } from "./errors.js";
import { STORAGE_KINDS, type StorageKind } from "./manifest.js";
import type { StoragePaths } from "./paths.js";

export type BackupStatus = "created" | "skipped" | "failed";

export interface BackupOutcome {
  kind: StorageKind;
  source: string;
  status: BackupStatus;
  backupPath?: string;
  error?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYYMMDD_HHMMSS. */
export function backupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function backupPathFor(source: string, date: Date): string {
  return `${source}.backup.${backupTimestamp(date)}`;
}

/**
 * Copy each existing storage path to a timestamped sibling on the same host.
 * Each path is attempted on its own; a failure on one never stops the other.
 */
export function backupProfile(remote: Remote, paths: StoragePaths, now: Date): BackupOutcome[] {
  const outcomes: BackupOutcome[] = [];

  for (const kind of STORAGE_KINDS) {
    const source = paths[kind];
    const backupPath = backupPathFor(source, now);
    try {
      if (!remote.isDirectory(source)) {
        outcomes.push({ kind, source, status: "skipped" });
      } else if (remote.copyTree(source, backupPath)) {
        outcomes.push({ kind, source, status: "created", backupPath });
      } else {
        outcomes.push({ kind, source, status: "failed", backupPath, error: `copy to ${backupPath} failed` });
      }
    } catch (e) {
      if (!isTransferError(e, "unreachable")) throw e;
      outcomes.push({ kind, source, status: "failed", backupPath, error: e.message });
    }
  }

  return outcomes;
}
