import type {
  AppSnapshot,
  EditorSession,
  LoadingState,
  LockLostNotice,
  LockState,
  LocalProjectStatus,
  OperationKind,
  Project,
  ProjectSnapshot,
  UserInfo,
} from "../shared/types.js";
import { Mutex } from "./mutex.js";
import { getLogger } from "./logger.js";

const log = getLogger("state");

const MAX_LOCK_LOST_NOTICES = 20;

export interface ProjectEntry {
  project: Project;
  status: LocalProjectStatus;
  busy: OperationKind | null;
  /** Bumped by every command that completes on this project. */
  generation: number;
}

/** The mutable aggregate. Only ever touched inside `AppStateStore.update`. */
export interface AppDraft {
  loadingState: LoadingState;
  user: UserInfo | null;
  activeProjectId: string | null;
  transientError: string | null;
  lockLost: LockLostNotice[];
  projects: Map<string, ProjectEntry>;
}

/** Lock and editor state live in their own components and are read at publish time. */
export interface StateReaders {
  lock(projectId: string): LockState;
  editor(projectId: string): EditorSession | null;
}

export type SnapshotListener = (snapshot: AppSnapshot) => void;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Single serialization point for application state.
 *
 * Mutators run one at a time and must not do I/O; callers compute outside and
 * merge inside. Every change that alters the visible state publishes a new
 * frozen snapshot to subscribers before `update` resolves.
 */
export class AppStateStore {
  private readonly mutex = new Mutex();
  private readonly listeners = new Set<SnapshotListener>();
  private readonly draft: AppDraft = {
    loadingState: "notStarted",
    user: null,
    activeProjectId: null,
    transientError: null,
    lockLost: [],
    projects: new Map(),
  };
  private current: AppSnapshot;
  private fingerprint = "";

  constructor(private readonly readers: StateReaders) {
    this.current = this.build(0);
    this.fingerprint = this.fingerprintOf(this.current);
  }

  snapshot(): AppSnapshot {
    return this.current;
  }

  generation(projectId: string): number {
    return this.draft.projects.get(projectId)?.generation ?? 0;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update<T>(mutator: (draft: AppDraft) => T): Promise<T> {
    return this.mutex.run(() => {
      try {
        return mutator(this.draft);
      } finally {
        this.publish();
      }
    });
  }

  /** Re-read lock and editor state and publish if anything moved. */
  refresh(): Promise<void> {
    return this.update(() => undefined);
  }

  private build(version: number): AppSnapshot {
    const projects: Record<string, ProjectSnapshot> = {};
    for (const [id, entry] of this.draft.projects) {
      projects[id] = {
        project: { ...entry.project },
        status: entry.status,
        lock: { ...this.readers.lock(id) },
        busy: entry.busy,
        editor: this.copyEditor(id),
      };
    }
    return deepFreeze({
      version,
      loadingState: this.draft.loadingState,
      user: this.draft.user ? { ...this.draft.user } : null,
      activeProjectId: this.draft.activeProjectId,
      transientError: this.draft.transientError,
      lockLost: this.draft.lockLost.map((n) => ({ ...n })),
      projects,
    });
  }

  private copyEditor(projectId: string): EditorSession | null {
    const session = this.readers.editor(projectId);
    return session ? { ...session } : null;
  }

  private fingerprintOf(snapshot: AppSnapshot): string {
    const { version: _version, ...rest } = snapshot;
    return JSON.stringify(rest);
  }

  private publish(): void {
    if (this.draft.lockLost.length > MAX_LOCK_LOST_NOTICES) {
      this.draft.lockLost.splice(0, this.draft.lockLost.length - MAX_LOCK_LOST_NOTICES);
    }
    const next = this.build(this.current.version + 1);
    const fingerprint = this.fingerprintOf(next);
    if (fingerprint === this.fingerprint) return;

    this.current = next;
    this.fingerprint = fingerprint;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (err) {
        log.error("Snapshot listener failed", { error: String(err) });
      }
    }
  }
}
