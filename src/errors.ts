export type ErrorKind =
  | "usage"
  | "config"
  | "unreachable"
  | "not-found"
  | "ambiguous"
  | "verification-failed";

export type FailureReason =
  | "InvalidArguments"
  | "InvalidConfig"
  | "InvalidProfileId"
  | "HostUnreachable"
  | "LibraryMissing"
  | "NoCandidates"
  | "ProfileNotFound"
  | "NoSourceFiles"
  | "AmbiguousSelection"
  | "InvalidSelection"
  | "VerificationFailed";

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Unreachable: 3,
  NotFound: 4,
  Ambiguous: 5,
  VerificationFailed: 6,
  PartialCopy: 7,
} as const;

const KIND_EXIT_CODES: Record<ErrorKind, number> = {
  usage: ExitCodes.Usage,
  config: ExitCodes.Usage,
  unreachable: ExitCodes.Unreachable,
  "not-found": ExitCodes.NotFound,
  ambiguous: ExitCodes.Ambiguous,
  "verification-failed": ExitCodes.VerificationFailed,
};

export class TransferError extends Error {
  public readonly kind: ErrorKind;
  public readonly reason: FailureReason;
  public readonly code: number;
  /** Orchestrator stage the run stopped at, filled in when it propagates through a run. */
  public stage: string | null = null;

  constructor(kind: ErrorKind, reason: FailureReason, message: string) {
    super(message);
    this.name = "TransferError";
    this.kind = kind;
    this.reason = reason;
    this.code = KIND_EXIT_CODES[kind];
  }
}

export function isTransferError(error: unknown, kind?: ErrorKind): error is TransferError {
  return error instanceof TransferError && (kind === undefined || error.kind === kind);
}
