import * as path from "path";
import { copyBetween, type CopyResult, type HostTarget, type Remote } from "./adapters/index.js";
import { backupPathFor, backupProfile, type BackupOutcome } from "./backup.js";
import type { MissingDestPolicy } from "./config.js";
import { describeProfile, describeStorage, discoverProfiles, type Profile } from "./discover.js";
import { ExitCodes, TransferError, isTransferError } from "./errors.js";
import {
  destinationFor,
  enumerateFiles,
  relativePath,
  summarizeManifest,
  type FileManifest,
  type ManifestEntry,
} from "./manifest.js";
import { resolveStoragePaths, type SteamLayout, type StoragePaths } from "./paths.js";
import { selectProfile, type ChoicePrompt, type SelectionMode } from "./select.js";
import { blank, debug, error, heading, info, isVerbose, success, warn } from "./ui.js";

export type TransferStage =
  | "init"
  | "connectivity"
  | "discover-source"
  | "discover-dest"
  | "list"
  | "select-source"
  | "select-dest"
  | "enumerate-source"
  | "dry-run"
  | "backup-dest"
  | "copy"
  | "verify"
  | "done";

export interface Endpoint {
  host: HostTarget;
  remote: Remote;
  layout: SteamLayout;
}

export interface TransferContext {
  source: Endpoint;
  dest: Endpoint;
  prompt: ChoicePrompt;
  clock?: () => Date;
}

export interface TransferOptions {
  sourceUser?: string;
  destUser?: string;
  dryRun: boolean;
  backup: boolean;
  listOnly: boolean;
  nonInteractive: boolean;
  onMissingDest: MissingDestPolicy;
}

export interface PlanSide {
  readonly host: HostTarget;
  readonly profile: Profile;
  readonly paths: StoragePaths;
}

/** Everything a run decided before touching the destination. Built once, never modified. */
export interface TransferPlan {
  readonly source: PlanSide;
  readonly dest: PlanSide;
  readonly manifest: FileManifest;
}

export interface CopyFailure {
  entry: ManifestEntry;
  destination: string;
  reason: string;
}

export interface TransferReport {
  outcome: "completed" | "dry-run" | "listed";
  stage: TransferStage;
  plan: TransferPlan | null;
  listing: { source: Profile[]; dest: Profile[] } | null;
  copied: number;
  failures: CopyFailure[];
  backups: BackupOutcome[];
  verifiedFiles: number;
}

const SOURCE_LABEL = "source device";
const DEST_LABEL = "destination device";

export function createPlan(source: PlanSide, dest: PlanSide, manifest: FileManifest): TransferPlan {
  return Object.freeze({
    source: Object.freeze({ ...source }),
    dest: Object.freeze({ ...dest }),
    manifest: Object.freeze([...manifest]),
  });
}

export function exitCodeFor(report: TransferReport): number {
  return report.failures.length > 0 ? ExitCodes.PartialCopy : ExitCodes.Success;
}

function emptyReport(outcome: TransferReport["outcome"], stage: TransferStage): TransferReport {
  return {
    outcome,
    stage,
    plan: null,
    listing: null,
    copied: 0,
    failures: [],
    backups: [],
    verifiedFiles: 0,
  };
}

function storageLabel(entry: ManifestEntry): string {
  return entry.kind === "cloud" ? "Cloud" : "Proton";
}

function checkConnectivity(endpoint: Endpoint, label: string): void {
  info(`Testing connection to ${label} (${endpoint.remote.displayName})...`);
  if (!endpoint.remote.isAvailable()) {
    throw new TransferError(
      "unreachable",
      "HostUnreachable",
      `Failed to connect to ${label} (${endpoint.remote.displayName})`,
    );
  }
  success(`Connected to ${label}`);
}

function discover(endpoint: Endpoint, label: string): Profile[] {
  info(`Discovering Steam users on ${label}...`);
  const profiles = discoverProfiles(endpoint.remote, endpoint.layout);
  if (profiles.length === 0) {
    warn(`No Steam users with ${endpoint.layout.game.title} data found on ${label}`);
  }
  return profiles;
}

function printListing(label: string, address: string, profiles: Profile[]): void {
  heading(`${label} (${address})`);
  if (profiles.length === 0) {
    info("  (none)");
    return;
  }
  for (const profile of profiles) {
    info(`  - ${describeProfile(profile)}`);
  }
}

function printManifest(manifest: FileManifest, label: string, profile: Profile): void {
  const counts = summarizeManifest(manifest);
  success(
    `Found ${manifest.length} save/config files for user '${profile.name}' on ${label} ` +
      `(${counts.cloud} cloud, ${counts.compat} proton)`,
  );
  if (isVerbose()) {
    for (const entry of manifest) {
      debug(`  - ${relativePath(entry)} (${storageLabel(entry)})`);
    }
  }
}

function reportBackups(outcomes: BackupOutcome[], profile: Profile): void {
  for (const outcome of outcomes) {
    const label = outcome.kind === "cloud" ? "Cloud" : "Proton";
    if (outcome.status === "created" && outcome.backupPath) {
      success(`${label} backup created: ${path.posix.basename(outcome.backupPath)}`);
    } else if (outcome.status === "failed") {
      warn(`${label} backup failed: ${outcome.error ?? "unknown error"}`);
    } else {
      debug(`${label} data absent at ${outcome.source}, nothing to back up`);
    }
  }
  if (outcomes.every((o) => o.status === "skipped")) {
    warn(`No existing data to back up for user '${profile.name}'`);
  }
}

function copyEntry(
  plan: TransferPlan,
  entry: ManifestEntry,
  source: Remote,
  dest: Remote,
  createdDirs: Set<string>,
): CopyResult {
  const target = destinationFor(entry, plan.dest.paths);
  const parent = path.posix.dirname(target);

  if (!createdDirs.has(parent)) {
    let created: boolean;
    try {
      created = dest.makeDirectory(parent);
    } catch (e) {
      if (!isTransferError(e, "unreachable")) throw e;
      return { ok: false, reason: e.message };
    }
    if (!created) {
      return { ok: false, reason: `could not create ${parent} on ${dest.displayName}` };
    }
    createdDirs.add(parent);
  }

  return copyBetween(source, entry.path, dest, target);
}

/**
 * Move one profile's saves from the source host to a profile on the destination host.
 *
 * Stages run strictly in order:
 * connectivity, discovery and selection on each side, enumeration of the source,
 * optional backup of the destination, copy, verification. A fatal error stops the
 * run where it happened and carries that stage. Per-file copy failures do not
 * stop the run; they come back in the report.
 */
export async function runTransfer(
  context: TransferContext,
  options: TransferOptions,
): Promise<TransferReport> {
  const { source, dest, prompt } = context;
  const clock = context.clock ?? (() => new Date());
  const progress: { stage: TransferStage } = { stage: "init" };

  const enter = (stage: TransferStage): void => {
    progress.stage = stage;
    debug(`[${stage}]`);
  };

  try {
    enter("connectivity");
    checkConnectivity(source, SOURCE_LABEL);
    checkConnectivity(dest, DEST_LABEL);

    heading("User discovery");
    enter("discover-source");
    const sourceProfiles = discover(source, SOURCE_LABEL);
    enter("discover-dest");
    const destProfiles = discover(dest, DEST_LABEL);

    if (options.listOnly) {
      enter("list");
      heading(`Steam users with ${source.layout.game.title} data`);
      printListing("Source device", source.host.address, sourceProfiles);
      printListing("Destination device", dest.host.address, destProfiles);
      blank();
      return { ...emptyReport("listed", "list"), listing: { source: sourceProfiles, dest: destProfiles } };
    }

    enter("select-source");
    const sourceMode: SelectionMode = options.sourceUser
      ? { kind: "exact", name: options.sourceUser }
      : { kind: "count", interactive: !options.nonInteractive };
    const sourceProfile = await selectProfile(sourceProfiles, sourceMode, prompt, SOURCE_LABEL);

    enter("select-dest");
    const destMode: SelectionMode = options.destUser
      ? { kind: "exact", name: options.destUser, fallbackToSingle: options.onMissingDest === "use-single" }
      : { kind: "count", interactive: !options.nonInteractive };
    const destProfile = await selectProfile(destProfiles, destMode, prompt, DEST_LABEL);

    heading("File operations");
    enter("enumerate-source");
    const sourcePaths = resolveStoragePaths(source.layout, sourceProfile.id);
    const destPaths = resolveStoragePaths(dest.layout, destProfile.id);
    info(`Listing save files for user '${sourceProfile.name}' on ${SOURCE_LABEL}...`);
    const manifest = enumerateFiles(source.remote, sourcePaths, source.layout.game.extensions);
    if (manifest.length === 0) {
      throw new TransferError(
        "not-found",
        "NoSourceFiles",
        `No save files found for user '${sourceProfile.name}' on ${SOURCE_LABEL}`,
      );
    }
    printManifest(manifest, SOURCE_LABEL, sourceProfile);

    const plan = createPlan(
      { host: source.host, profile: sourceProfile, paths: sourcePaths },
      { host: dest.host, profile: destProfile, paths: destPaths },
      manifest,
    );

    if (options.dryRun) {
      enter("dry-run");
      printDryRun(plan, options.backup, clock());
      return { ...emptyReport("dry-run", "dry-run"), plan };
    }

    const report: TransferReport = { ...emptyReport("completed", "done"), plan };

    if (options.backup) {
      enter("backup-dest");
      info(`Creating backup for user '${destProfile.name}' on ${DEST_LABEL}...`);
      report.backups = backupProfile(dest.remote, plan.dest.paths, clock());
      reportBackups(report.backups, destProfile);
    }

    enter("copy");
    info(
      `Transferring ${plan.manifest.length} files from '${sourceProfile.name}' to '${destProfile.name}'...`,
    );
    const createdDirs = new Set<string>();
    for (const entry of plan.manifest) {
      const name = path.posix.basename(entry.path);
      debug(`Transferring ${name} (${storageLabel(entry)})...`);
      const result = copyEntry(plan, entry, source.remote, dest.remote, createdDirs);
      if (result.ok) {
        report.copied++;
      } else {
        error(`Failed to transfer ${name}: ${result.reason}`);
        report.failures.push({
          entry,
          destination: destinationFor(entry, plan.dest.paths),
          reason: result.reason,
        });
      }
    }
    if (report.failures.length > 0) {
      warn(`${report.failures.length} of ${plan.manifest.length} files failed to transfer`);
    } else {
      success("Transfer completed");
    }

    enter("verify");
    info("Verifying transfer...");
    const destManifest = enumerateFiles(dest.remote, plan.dest.paths, dest.layout.game.extensions);
    if (destManifest.length === 0) {
      throw new TransferError(
        "verification-failed",
        "VerificationFailed",
        `Transfer verification failed - no files found for user '${destProfile.name}' on ${DEST_LABEL}`,
      );
    }
    report.verifiedFiles = destManifest.length;
    success(`Transfer verification completed (${destManifest.length} files at destination)`);

    enter("done");
    blank();
    success(`From: '${sourceProfile.name}' on ${source.host.address}`);
    success(`To: '${destProfile.name}' on ${dest.host.address}`);
    return report;
  } catch (e) {
    if (e instanceof TransferError && e.stage === null) {
      e.stage = progress.stage;
    }
    throw e;
  }
}

function printDryRun(plan: TransferPlan, backup: boolean, now: Date): void {
  const { dest } = plan;
  info("[DRY RUN] Would create directories:");
  info(`  Cloud: ${dest.paths.cloud}`);
  info(`  Proton: ${dest.paths.compat}`);

  if (backup) {
    info("[DRY RUN] Would back up existing destination data to:");
    info(`  ${backupPathFor(dest.paths.cloud, now)}`);
    info(`  ${backupPathFor(dest.paths.compat, now)}`);
  }

  info("[DRY RUN] Would transfer the following files:");
  for (const entry of plan.manifest) {
    info(`  - ${relativePath(entry)} (${storageLabel(entry)}) -> ${destinationFor(entry, dest.paths)}`);
  }

  blank();
  success("Dry run completed successfully");
  info(
    `Would transfer from '${plan.source.profile.name}' [${describeStorage(plan.source.profile)}] ` +
      `to '${dest.profile.name}'`,
  );
}
