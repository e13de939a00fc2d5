import * as path from "path";
import type { Remote } from "./adapters/index.js";
import type { StoragePaths } from "./paths.js";

export type StorageKind = "cloud" | "compat";

export const STORAGE_KINDS: readonly StorageKind[] = ["cloud", "compat"];

export interface ManifestEntry {
  path: string;
  kind: StorageKind;
  /** Storage path the file was found under. */
  root: string;
}

export type FileManifest = readonly ManifestEntry[];

/**
 * Save, config and preference files for one profile: cloud-store files first,
 * then the Proton prefix, each group sorted. Missing directories contribute nothing.
 */
export function enumerateFiles(
  remote: Remote,
  paths: StoragePaths,
  extensions: string[],
): FileManifest {
  const entries: ManifestEntry[] = [];
  for (const kind of STORAGE_KINDS) {
    const root = paths[kind];
    for (const file of remote.findFiles(root, extensions).sort()) {
      entries.push({ path: file, kind, root });
    }
  }
  return entries;
}

export function relativePath(entry: ManifestEntry): string {
  return path.posix.relative(entry.root, entry.path);
}

/** Where an entry lands under another profile's storage, chosen by its kind alone. */
export function destinationFor(entry: ManifestEntry, dest: StoragePaths): string {
  return path.posix.join(dest[entry.kind], relativePath(entry));
}

export function summarizeManifest(manifest: FileManifest): Record<StorageKind, number> {
  const counts: Record<StorageKind, number> = { cloud: 0, compat: 0 };
  for (const entry of manifest) {
    counts[entry.kind]++;
  }
  return counts;
}
