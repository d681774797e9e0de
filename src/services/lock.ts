import type { LockState } from "../shared/types.js";
import { SyncError, isSyncError } from "../shared/errors.js";
import type { RemoteClient } from "./remote.js";
import { getLogger } from "./logger.js";

const log = getLogger("lock");

const UNLOCKED: LockState = { kind: "unlocked" };

interface LockEntry {
  state: LockState;
  /** Logical time of the last transition; older observations are stale. */
  changedAt: number;
}

export interface ObserveResult {
  changed: boolean;
  /** We believed we held the lock and the server no longer says so. */
  lost: boolean;
}

export interface RemoteLockOptions {
  /** Extra release attempts after a transient network failure. */
  releaseRetries?: number;
}

/**
 * Per-project view of the remote mutex.
 *
 *   unlocked --acquire ok-------> lockedByMe
 *   unlocked --acquire conflict-> lockedByOther
 *   lockedByMe --release-------> unlocked   (whatever the server answers)
 *   lockedByOther --poll clear-> unlocked
 *
 * Acquire is never retried here. Release is retried on network failure.
 */
export class RemoteLockClient {
  private readonly entries = new Map<string, LockEntry>();
  private clock = 0;
  private identity: string | null = null;

  constructor(
    private readonly remote: RemoteClient,
    private readonly opts: RemoteLockOptions = {}
  ) {}

  setIdentity(user: string | null): void {
    this.identity = user;
  }

  /** Stamp to pass to `observe` for a remote read that starts now. */
  mark(): number {
    return ++this.clock;
  }

  state(projectId: string): LockState {
    return this.entries.get(projectId)?.state ?? UNLOCKED;
  }

  heldByMe(): string[] {
    return [...this.entries]
      .filter(([, e]) => e.state.kind === "lockedByMe")
      .map(([id]) => id);
  }

  private set(projectId: string, state: LockState, at = ++this.clock): void {
    this.entries.set(projectId, { state, changedAt: at });
  }

  forget(projectId: string): void {
    this.entries.delete(projectId);
  }

  reset(): void {
    this.entries.clear();
  }

  async acquire(projectId: string): Promise<LockState> {
    const current = this.state(projectId);
    if (current.kind === "lockedByMe" && current.token !== null) return current;

    try {
      const token = await this.remote.acquireLock(projectId);
      const next: LockState = { kind: "lockedByMe", token };
      this.set(projectId, next);
      log.info("Lock acquired", { projectId });
      return next;
    } catch (err) {
      if (isSyncError(err, "LockConflict")) {
        const holder = current.kind === "lockedByOther" ? current.holder : "another user";
        this.set(projectId, { kind: "lockedByOther", holder });
        log.info("Lock held elsewhere", { projectId, holder });
      }
      // NetworkError: outcome unknown, state left as it was.
      throw err;
    }
  }

  /** Idempotent. Releasing a lock we do not hold does nothing. */
  async release(projectId: string): Promise<void> {
    const current = this.state(projectId);
    if (current.kind !== "lockedByMe") return;
    this.set(projectId, UNLOCKED);

    const retries = this.opts.releaseRetries ?? 1;
    for (let attempt = 0; ; attempt++) {
      try {
        await this.remote.releaseLock(projectId, current.token);
        log.info("Lock released", { projectId });
        return;
      } catch (err) {
        if (isSyncError(err, "NotFound") || isSyncError(err, "LockConflict")) {
          log.info("Lock already cleared on server", { projectId });
          return;
        }
        if (isSyncError(err, "NetworkError") && attempt < retries) {
          log.warn("Release failed, retrying", { projectId, attempt: attempt + 1 });
          continue;
        }
        throw isSyncError(err) ? err : new SyncError("NetworkError", `Release of ${projectId} failed`, { cause: err });
      }
    }
  }

  /** Fold a slow-tick observation of the server's lock holder into local state. */
  observe(projectId: string, holder: string | null, observedAt: number): ObserveResult {
    const entry = this.entries.get(projectId);
    if (entry && entry.changedAt > observedAt) return { changed: false, lost: false };

    const current = entry?.state ?? UNLOCKED;
    const mine =
      holder !== null &&
      this.identity !== null &&
      holder.toLowerCase() === this.identity.toLowerCase();

    let next: LockState;
    if (holder === null) next = UNLOCKED;
    else if (mine) next = current.kind === "lockedByMe" ? current : { kind: "lockedByMe", token: null };
    else next = { kind: "lockedByOther", holder };

    const lost = current.kind === "lockedByMe" && next.kind !== "lockedByMe";
    const changed = !sameLockState(current, next);
    if (changed) {
      this.set(projectId, next, observedAt);
      if (lost) log.warn("Lock cleared on server while held locally", { projectId, holder });
    }
    return { changed, lost };
  }
}

export function sameLockState(a: LockState, b: LockState): boolean {
  if (a.kind === "unlocked") return b.kind === "unlocked";
  if (a.kind === "lockedByMe") return b.kind === "lockedByMe" && a.token === b.token;
  return b.kind === "lockedByOther" && a.holder === b.holder;
}
