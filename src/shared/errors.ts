export type SyncErrorKind =
  | "NetworkError"
  | "LockConflict"
  | "Unauthorized"
  | "IoError"
  | "ImportError"
  | "SerializationError"
  | "NotFound"
  | "Busy"
  | "Precondition"
  | "LaunchError";

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
    this.kind = kind;
  }
}

export function isSyncError(err: unknown, kind?: SyncErrorKind): err is SyncError {
  return err instanceof SyncError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize anything thrown into a SyncError, defaulting to `fallback`. */
export function toSyncError(err: unknown, fallback: SyncErrorKind = "IoError"): SyncError {
  if (err instanceof SyncError) return err;
  return new SyncError(fallback, errorMessage(err), { cause: err });
}
