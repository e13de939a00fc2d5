import * as path from "path";
import { TransferError } from "./errors.js";
import type { Game } from "./games.js";

export const DEFAULT_STEAM_ROOT = "/home/deck/.local/share/Steam";

const USERDATA_DIR = "userdata";
const COMPATDATA_DIR = "steamapps/compatdata";
const LOGIN_USERS_FILE = "config/loginusers.vdf";

/** Steam installation on one host, plus the game whose saves are being moved. */
export interface SteamLayout {
  steamRoot: string;
  game: Game;
}

export interface StoragePaths {
  /** Per-profile cloud-synced store, userdata/<id>/<app_id>. */
  cloud: string;
  /** Save folder inside the game's Proton prefix, shared by every profile on the host. */
  compat: string;
}

export function userdataRoot(layout: SteamLayout): string {
  return path.posix.join(layout.steamRoot, USERDATA_DIR);
}

export function loginUsersPath(layout: SteamLayout): string {
  return path.posix.join(layout.steamRoot, LOGIN_USERS_FILE);
}

export function compatAppRoot(layout: SteamLayout): string {
  return path.posix.join(layout.steamRoot, COMPATDATA_DIR, layout.game.app_id);
}

export function compatSaveRoot(layout: SteamLayout): string {
  return path.posix.join(compatAppRoot(layout), layout.game.compat_save_path);
}

export function resolveStoragePaths(layout: SteamLayout, profileId: number): StoragePaths {
  if (!Number.isSafeInteger(profileId) || profileId < 0) {
    throw new TransferError(
      "usage",
      "InvalidProfileId",
      `Profile id must be a non-negative integer, got ${profileId}`,
    );
  }
  return {
    cloud: path.posix.join(userdataRoot(layout), String(profileId), layout.game.app_id),
    compat: compatSaveRoot(layout),
  };
}
