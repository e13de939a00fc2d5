import type { Remote } from "./adapters/index.js";
import { TransferError } from "./errors.js";
import { displayNameFor, parseLoginUsers, personaNameFor, type LoginRecords } from "./loginusers.js";
import {
  compatAppRoot,
  compatSaveRoot,
  loginUsersPath,
  resolveStoragePaths,
  userdataRoot,
  type SteamLayout,
} from "./paths.js";
import { debug } from "./ui.js";

export interface Profile {
  /** Steam account id, the directory name under userdata/. */
  id: number;
  name: string;
  nameSource: "login-record" | "synthetic";
  hasCloudData: boolean;
  hasCompatData: boolean;
}

export function readLoginRecords(remote: Remote, layout: SteamLayout): LoginRecords {
  const file = remote.readFile(loginUsersPath(layout));
  if (file === null) {
    return { status: "unparseable", reason: "loginusers.vdf could not be read" };
  }
  return parseLoginUsers(file.toString("utf-8"));
}

/** The Proton prefix is shared, so one probe answers for every profile on the host. */
function probeCompatData(remote: Remote, layout: SteamLayout): boolean {
  if (!remote.isDirectory(compatAppRoot(layout))) return false;
  return remote.findFiles(compatSaveRoot(layout), [layout.game.save_extension]).length > 0;
}

/**
 * Profiles on a host that hold save data for the layout's game, by ascending id.
 * An empty result means the host has no candidates; it is not an error.
 */
export function discoverProfiles(remote: Remote, layout: SteamLayout): Profile[] {
  const root = userdataRoot(layout);
  const entries = remote.listDirectory(root);
  if (entries === null) {
    throw new TransferError(
      "not-found",
      "LibraryMissing",
      `No Steam userdata directory at ${root} on ${remote.displayName}`,
    );
  }

  const ids = entries
    .filter((name) => /^\d+$/.test(name))
    .map((name) => Number(name))
    .filter((id) => Number.isSafeInteger(id))
    .sort((a, b) => a - b);

  if (ids.length === 0) {
    debug(`No Steam accounts under ${root} on ${remote.displayName}`);
    return [];
  }

  const records = readLoginRecords(remote, layout);
  if (records.status === "unparseable") {
    debug(`Login records on ${remote.displayName} unusable (${records.reason}), using account ids`);
  }

  const hasCompatData = probeCompatData(remote, layout);
  const profiles: Profile[] = [];

  for (const id of ids) {
    const hasCloudData = remote.isDirectory(resolveStoragePaths(layout, id).cloud);
    if (!hasCloudData && !hasCompatData) continue;

    const profile: Profile = {
      id,
      name: displayNameFor(records, id),
      nameSource: personaNameFor(records, id)?.trim() ? "login-record" : "synthetic",
      hasCloudData,
      hasCompatData,
    };
    debug(
      `Found ${profile.name} (ID: ${id}) - Cloud: ${hasCloudData}, Proton: ${hasCompatData}`,
    );
    profiles.push(profile);
  }

  return profiles;
}

export function describeStorage(profile: Profile): string {
  const kinds: string[] = [];
  if (profile.hasCloudData) kinds.push("Cloud");
  if (profile.hasCompatData) kinds.push("Saves");
  return kinds.join(" ");
}

export function describeProfile(profile: Profile): string {
  return `${profile.name} (ID: ${profile.id}) [${describeStorage(profile)}]`;
}
