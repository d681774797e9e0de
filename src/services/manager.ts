import type {
  AppSnapshot,
  FileSet,
  LocalProjectStatus,
  LockLostNotice,
  NewProjectMetadata,
  OperationKind,
  Project,
} from "../shared/types.js";
import { SyncError, errorMessage, isSyncError } from "../shared/errors.js";
import { pack, unpack } from "./archive.js";
import type { CredentialStore, LoginInput, SavedCredentials } from "./credentials.js";
import { parseLoginInput } from "./credentials.js";
import type { EditorSupervisor } from "./editor.js";
import type { RemoteLockClient } from "./lock.js";
import type { Credentials, RemoteClient } from "./remote.js";
import type { AppStateStore } from "./state.js";
import { computeStatus, isDirty, type ImportResult, type LocalProjectStore } from "./store.js";
import { getLogger } from "./logger.js";

const log = getLogger("manager");

export interface ProjectManagerDeps<Doc> {
  remote: RemoteClient;
  store: LocalProjectStore<Doc>;
  locks: RemoteLockClient;
  editor: EditorSupervisor;
  state: AppStateStore;
  credentials: CredentialStore;
  instance: string;
}

export interface OpenOptions {
  /** Start the editor (or reveal the folder) once the lock is held. */
  launch?: boolean;
}

export interface DownloadOptions {
  /** Replace a working copy that has local changes. */
  overwrite?: boolean;
}

export interface CommitResult {
  outcome: "saved" | "noChanges";
  revision: string | null;
}

/**
 * Orchestrates every per-project command against the remote service, the lock
 * client, the local store and the editor supervisor.
 *
 * Commands on one project are exclusive: a second one fails with `Busy`.
 * Status is never set by a command; it is recomputed from disk after each
 * command and published before the command's promise settles.
 */
export class ProjectManager<Doc> {
  private readonly remote: RemoteClient;
  private readonly store: LocalProjectStore<Doc>;
  private readonly locks: RemoteLockClient;
  private readonly editor: EditorSupervisor;
  private readonly state: AppStateStore;
  private readonly credentials: CredentialStore;
  private readonly instance: string;

  constructor(deps: ProjectManagerDeps<Doc>) {
    this.remote = deps.remote;
    this.store = deps.store;
    this.locks = deps.locks;
    this.editor = deps.editor;
    this.state = deps.state;
    this.credentials = deps.credentials;
    this.instance = deps.instance;
  }

  snapshot(): AppSnapshot {
    return this.state.snapshot();
  }

  // ============================================================
  // Session
  // ============================================================

  /** Restore a saved session, if any, and load the project list. */
  async start(): Promise<void> {
    await this.state.update((d) => {
      d.loadingState = "loadingCredentials";
    });

    let saved: SavedCredentials | null;
    try {
      saved = await this.credentials.load();
    } catch (err) {
      await this.fail(err);
      return;
    }
    if (!saved) {
      await this.state.update((d) => {
        d.loadingState = "unauthenticated";
      });
      return;
    }

    try {
      await this.signIn({ kind: "token", token: saved.token }, false);
    } catch (err) {
      if (isSyncError(err, "Unauthorized")) {
        log.warn("Saved session rejected, sign in again");
        await this.state.update((d) => {
          d.loadingState = "unauthenticated";
          d.transientError = errorMessage(err);
        });
        return;
      }
      await this.fail(err);
      return;
    }
    await this.loadProjects();
  }

  async login(input: LoginInput): Promise<void> {
    const credentials = parseLoginInput(input);
    await this.signIn(credentials, true);
    await this.loadProjects();
  }

  async logout(): Promise<void> {
    await this.releaseHeldLocks();
    this.editor.endAll();
    this.remote.signOut();
    this.locks.setIdentity(null);
    this.locks.reset();
    await this.credentials.forget();
    await this.state.update((d) => {
      d.user = null;
      d.loadingState = "unauthenticated";
      d.activeProjectId = null;
      d.transientError = null;
      d.lockLost = [];
      d.projects.clear();
    });
    log.info("Signed out");
  }

  /** Release every lock this process holds. Called on exit. */
  async shutdown(): Promise<void> {
    await this.releaseHeldLocks();
    this.editor.endAll();
  }

  private async signIn(credentials: Credentials, persist: boolean): Promise<void> {
    const auth = await this.remote.authenticate(credentials);
    if (persist) {
      await this.credentials.save({ instance: this.instance, token: auth.token, user: auth.user });
    }
    this.locks.setIdentity(auth.user);
    await this.state.update((d) => {
      d.user = { email: auth.user, instance: this.instance };
      d.transientError = null;
    });
    log.info("Signed in", { user: auth.user, instance: this.instance });
  }

  private async loadProjects(): Promise<void> {
    await this.state.update((d) => {
      d.loadingState = "loadingProjects";
    });
    try {
      await this.refreshRemoteList();
    } catch (err) {
      if (!isSyncError(err, "Unauthorized")) await this.fail(err);
    }
  }

  private async fail(err: unknown): Promise<void> {
    log.error("Startup failed", { error: errorMessage(err) });
    await this.state.update((d) => {
      d.loadingState = "failed";
      d.transientError = errorMessage(err);
    });
  }

  private async releaseHeldLocks(): Promise<void> {
    for (const projectId of this.locks.heldByMe()) {
      try {
        await this.locks.release(projectId);
      } catch (err) {
        log.error("Could not release lock", { projectId, error: errorMessage(err) });
      }
    }
    await this.state.refresh();
  }

  // ============================================================
  // Reconciliation
  // ============================================================

  /** Slow tick: refresh the list when signed in, retry a failed startup otherwise. */
  async syncRemote(): Promise<void> {
    const { user, loadingState } = this.state.snapshot();
    if (user) {
      await this.refreshRemoteList();
    } else if (loadingState === "failed") {
      await this.start();
    }
  }

  /**
   * Fetch the project list and merge it. On failure the last list is kept and
   * the error recorded; `Unauthorized` drops back to signed-out.
   */
  async refreshRemoteList(): Promise<void> {
    const observedAt = this.locks.mark();
    let projects: Project[];
    try {
      projects = await this.remote.fetchProjectList();
    } catch (err) {
      const unauthorized = isSyncError(err, "Unauthorized");
      await this.state.update((d) => {
        d.transientError = errorMessage(err);
        if (unauthorized) {
          d.loadingState = "unauthenticated";
          d.user = null;
        } else if (d.loadingState === "loadingProjects") {
          d.loadingState = "failed";
        }
      });
      throw err;
    }

    const notices: LockLostNotice[] = [];
    for (const project of projects) {
      const { lost } = this.locks.observe(project.id, project.lockHolder, observedAt);
      if (lost) notices.push({ projectId: project.id, at: new Date().toISOString(), holder: project.lockHolder });
    }

    const computed = await this.computeStatuses(projects);

    const vanished: string[] = [];
    await this.state.update((d) => {
      const seen = new Set<string>();
      for (const project of projects) {
        seen.add(project.id);
        const result = computed.get(project.id);
        const existing = d.projects.get(project.id);
        if (!existing) {
          d.projects.set(project.id, {
            project,
            status: result?.status ?? "RemoteOnly",
            busy: null,
            generation: 0,
          });
          continue;
        }
        existing.project = project;
        if (result && !existing.busy && existing.generation === result.generation) {
          existing.status = result.status;
        }
      }
      for (const [id, entry] of d.projects) {
        if (seen.has(id) || entry.busy) continue;
        d.projects.delete(id);
        vanished.push(id);
        if (d.activeProjectId === id) d.activeProjectId = null;
      }
      d.lockLost.push(...notices);
      d.loadingState = "ready";
      d.transientError = null;
    });
    for (const id of vanished) await this.forgetLock(id);
    log.debug("Project list refreshed", { count: projects.length });
  }

  /** Fast tick: recompute every project's status from disk. */
  async refreshLocal(): Promise<void> {
    const snapshot = this.state.snapshot();
    const projects = Object.values(snapshot.projects)
      .filter((p) => p.busy === null)
      .map((p) => p.project);
    const computed = await this.computeStatuses(projects);
    const failures = projects.length - computed.size;

    await this.state.update((d) => {
      for (const [id, result] of computed) {
        const entry = d.projects.get(id);
        if (!entry || entry.busy || entry.generation !== result.generation) continue;
        entry.status = result.status;
      }
      if (failures > 0) d.transientError = `Could not read ${failures} local project(s)`;
    });
  }

  private async computeStatuses(
    projects: Project[]
  ): Promise<Map<string, { status: LocalProjectStatus; generation: number }>> {
    const results = new Map<string, { status: LocalProjectStatus; generation: number }>();
    for (const project of projects) {
      const generation = this.state.generation(project.id);
      try {
        results.set(project.id, { status: await this.store.status(project.id, project.revision), generation });
      } catch (err) {
        log.warn("Status check failed", { projectId: project.id, error: errorMessage(err) });
      }
    }
    return results;
  }

  // ============================================================
  // Commands
  // ============================================================

  private entry(projectId: string): Project {
    const snap = this.state.snapshot().projects[projectId];
    if (!snap) throw new SyncError("NotFound", `Unknown project ${projectId}`);
    return snap.project;
  }

  /**
   * Run `fn` as the only command in flight for `projectId`. The recomputed
   * status is published before this resolves or rejects.
   */
  private async exclusive<T>(projectId: string, op: OperationKind, fn: () => Promise<T>): Promise<T> {
    await this.state.update((d) => {
      const entry = d.projects.get(projectId);
      if (!entry) throw new SyncError("NotFound", `Unknown project ${projectId}`);
      if (entry.busy) throw new SyncError("Busy", `${entry.busy} already in progress for ${entry.project.name}`);
      entry.busy = op;
    });

    try {
      const result = await fn();
      await this.settle(projectId);
      return result;
    } catch (err) {
      if (isSyncError(err, "NotFound")) {
        await this.drop(projectId);
      } else {
        await this.settle(projectId);
      }
      log.warn(`${op} failed`, { projectId, error: errorMessage(err) });
      throw err;
    }
  }

  private async settle(projectId: string): Promise<void> {
    let status: LocalProjectStatus | null = null;
    try {
      status = await this.store.status(projectId, this.entry(projectId).revision);
    } catch (err) {
      log.warn("Status check after command failed", { projectId, error: errorMessage(err) });
    }
    await this.state.update((d) => {
      const entry = d.projects.get(projectId);
      if (!entry) return;
      if (status) entry.status = status;
      entry.busy = null;
      entry.generation++;
    });
  }

  /** The remote project vanished: forget it locally and let the next poll confirm. */
  private async drop(projectId: string): Promise<void> {
    this.editor.end(projectId);
    await this.forgetLock(projectId);
    await this.state.update((d) => {
      d.projects.delete(projectId);
      if (d.activeProjectId === projectId) d.activeProjectId = null;
    });
  }

  /** Drop the lock entry of a project that left the list, releasing it first if we hold it. */
  private async forgetLock(projectId: string): Promise<void> {
    try {
      await this.locks.release(projectId);
    } catch (err) {
      log.error("Could not release lock of a vanished project", { projectId, error: errorMessage(err) });
    }
    this.locks.forget(projectId);
  }

  private async setProject(project: Project): Promise<void> {
    await this.state.update((d) => {
      const entry = d.projects.get(project.id);
      if (entry) entry.project = project;
    });
  }

  private async setActive(projectId: string | null, onlyIf?: string): Promise<void> {
    await this.state.update((d) => {
      if (onlyIf === undefined || d.activeProjectId === onlyIf) d.activeProjectId = projectId;
    });
  }

  private requireNotLockedByOther(projectId: string, action: string): void {
    const lock = this.locks.state(projectId);
    if (lock.kind === "lockedByOther") {
      throw new SyncError("LockConflict", `Cannot ${action}: ${lock.holder} is editing this project`);
    }
  }

  private requireLockedByMe(projectId: string, action: string): void {
    this.requireNotLockedByOther(projectId, action);
    if (this.locks.state(projectId).kind !== "lockedByMe") {
      throw new SyncError("Precondition", `Cannot ${action}: open the project first to take the lock`);
    }
  }

  /** Acquire the lock, make the project active, then start the editor. */
  async open(projectId: string, opts: OpenOptions = {}): Promise<void> {
    const launch = opts.launch ?? true;
    await this.exclusive(projectId, "open", async () => {
      try {
        await this.locks.acquire(projectId);
      } finally {
        await this.state.refresh();
      }
      await this.setActive(projectId);

      if (!launch || this.editor.isRunning(projectId)) return;
      const target = await this.store.editorTarget(projectId);
      if (!target) return;
      try {
        await this.editor.launch(projectId, target, this.store.workingPath(projectId));
      } catch (err) {
        await this.rollbackLock(projectId);
        throw err;
      }
    });
  }

  private async rollbackLock(projectId: string): Promise<void> {
    try {
      await this.locks.release(projectId);
    } catch (err) {
      log.error("Could not roll back lock after failed launch", { projectId, error: errorMessage(err) });
    }
    await this.setActive(null, projectId);
  }

  /**
   * Fetch the remote project and replace both local copies. Nothing on disk
   * changes unless every step before the final swap succeeds.
   */
  async download(projectId: string, opts: DownloadOptions = {}): Promise<void> {
    await this.exclusive(projectId, "download", async () => {
      this.requireNotLockedByOther(projectId, "download");

      const local = await this.store.load(projectId);
      const status = computeStatus(local, this.entry(projectId).revision);
      if (isDirty(status) && !opts.overwrite) {
        throw new SyncError("Precondition", "Working copy has local changes; discard or commit them, or download with overwrite");
      }

      const project = await this.remote.fetchProject(projectId);
      const archive = await this.remote.downloadProject(projectId);
      const files: FileSet = archive ? unpack(archive) : new Map();
      this.store.validateFiles(files);

      await this.store.install(projectId, files, archive ? project.revision : null);
      await this.setProject(project);
      log.info("Downloaded project", { projectId, files: files.size, revision: project.revision });
    });
  }

  /** Upload the working copy under our lock and make it the new index. */
  async commit(projectId: string, message: string): Promise<CommitResult> {
    return this.exclusive(projectId, "commit", async () => {
      this.requireLockedByMe(projectId, "commit");
      if (!message.trim()) throw new SyncError("Precondition", "Commit message must not be empty");

      const files = await this.store.readWorkingCopy(projectId);
      this.store.validateFiles(files);
      const outcome = await this.remote.uploadProject(projectId, pack(files), message.trim());

      let revision: string | null = null;
      try {
        const project = await this.remote.fetchProject(projectId);
        revision = project.revision;
        await this.setProject(project);
      } catch (err) {
        log.warn("Uploaded, but could not read the new revision", { projectId, error: errorMessage(err) });
        await this.state.update((d) => {
          d.transientError = `Uploaded ${projectId}; revision will refresh on the next poll`;
        });
      }
      await this.store.promoteIndex(projectId, files, revision);
      log.info("Committed project", { projectId, outcome, revision });
      return { outcome, revision };
    });
  }

  /** Reset the working copy to the index. Local only, no lock needed. */
  async discard(projectId: string): Promise<void> {
    await this.exclusive(projectId, "discard", async () => {
      this.requireNotLockedByOther(projectId, "discard changes");
      if (!(await this.store.exists(projectId))) {
        throw new SyncError("Precondition", "Nothing to discard: project has no local copy");
      }
      await this.store.discardChanges(projectId);
    });
  }

  /** Reseed the working copy from the editor's own files. Needs the lock. */
  async reimport(projectId: string, projectFilePath: string): Promise<ImportResult> {
    return this.exclusive(projectId, "reimport", async () => {
      this.requireLockedByMe(projectId, "import");
      return this.store.importProject(projectId, projectFilePath);
    });
  }

  /** Explicit release. Ends the editor session and clears the active project. */
  async release(projectId: string): Promise<void> {
    await this.exclusive(projectId, "release", async () => {
      this.editor.end(projectId);
      try {
        await this.locks.release(projectId);
      } finally {
        await this.setActive(null, projectId);
      }
    });
  }

  async onEditorExited(projectId: string): Promise<void> {
    await this.exclusive(projectId, "editorExited", async () => {
      this.editor.end(projectId);
      try {
        await this.locks.release(projectId);
      } finally {
        await this.setActive(null, projectId);
      }
    });
  }

  /** Create the remote project and an empty local folder for it. */
  async create(seed: string | undefined, metadata: NewProjectMetadata): Promise<Project> {
    if (!metadata.name.trim()) throw new SyncError("Precondition", "Project name must not be empty");
    if (!metadata.country.trim()) throw new SyncError("Precondition", "Country must not be empty");

    const project = await this.remote.createProject(metadata, seed);
    await this.store.ensureProjectDirs(project.id);
    const status = await this.store.status(project.id, project.revision);
    await this.state.update((d) => {
      d.projects.set(project.id, { project, status, busy: null, generation: 0 });
    });
    log.info("Created project", { projectId: project.id, name: project.name });
    return project;
  }
}
