import { describeProfile, type Profile } from "./discover.js";
import { TransferError } from "./errors.js";
import { success, warn } from "./ui.js";

/** Obtains one answer to a numbered list. Swapped for a scripted source in tests. */
export interface ChoicePrompt {
  /** Resolves to the raw answer, or null when the operator backed out. */
  ask(message: string, choices: string[]): Promise<string | null>;
}

export type SelectionMode =
  | { kind: "exact"; name: string; fallbackToSingle?: boolean }
  | { kind: "count"; interactive: boolean };

function parseChoice(answer: string, count: number): number | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const choice = Number(trimmed);
  if (choice < 1 || choice > count) return null;
  return choice;
}

/** Resolve a discovered profile set to exactly one profile, or throw. */
export async function selectProfile(
  profiles: readonly Profile[],
  mode: SelectionMode,
  prompt: ChoicePrompt,
  side: string,
): Promise<Profile> {
  if (mode.kind === "exact") {
    const matches = profiles.filter((p) => p.name === mode.name);
    const match = matches[0];
    if (match) {
      if (matches.length > 1) {
        warn(
          `${matches.length} users named '${mode.name}' on ${side} (IDs: ${matches.map((p) => p.id).join(", ")}); ` +
            `taking the lowest ID`,
        );
      }
      success(`${capitalize(side)} user: ${match.name} (ID: ${match.id})`);
      return match;
    }
    if (mode.fallbackToSingle && profiles.length === 1) {
      const only = profiles[0];
      warn(`User '${mode.name}' not found on ${side}; using the only profile with data: ${only.name} (ID: ${only.id})`);
      return only;
    }
    throw new TransferError("not-found", "ProfileNotFound", `User '${mode.name}' not found on ${side}`);
  }

  if (profiles.length === 0) {
    throw new TransferError("not-found", "NoCandidates", `No Steam users with save data on ${side}`);
  }

  if (profiles.length === 1) {
    const only = profiles[0];
    success(`Single ${side} user found: ${only.name} (ID: ${only.id})`);
    return only;
  }

  if (!mode.interactive) {
    throw new TransferError(
      "ambiguous",
      "AmbiguousSelection",
      `Multiple ${side} users found (${profiles.map((p) => p.name).join(", ")}) but non-interactive mode specified`,
    );
  }

  const answer = await prompt.ask(
    `Select ${side} user number (1-${profiles.length})`,
    profiles.map(describeProfile),
  );
  const choice = answer === null ? null : parseChoice(answer, profiles.length);
  if (choice === null) {
    throw new TransferError(
      "ambiguous",
      "InvalidSelection",
      answer === null ? `No ${side} user selected` : `Invalid selection: ${answer}`,
    );
  }

  const picked = profiles[choice - 1];
  success(`${capitalize(side)} user: ${picked.name} (ID: ${picked.id})`);
  return picked;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
