/**
 * In-memory project service for tests.
 *
 * One `FakeProjectService` holds the server-side truth (projects, archives,
 * revisions, mutex holders). Each `FakeRemoteClient` is one signed-in actor,
 * so two clients on the same service can race for a lock.
 */

import { randomUUID } from "crypto";

import type { NewProjectMetadata, Project, ProjectKind } from "../shared/types.js";
import { SyncError } from "../shared/errors.js";
import { bytesEqual } from "../services/archive.js";
import type { AuthResult, Credentials, RemoteClient, UploadOutcome } from "../services/remote.js";

type Operation = Exclude<keyof RemoteClient, "signOut">;

interface ServerProject {
  id: string;
  name: string;
  description: string;
  kind: ProjectKind;
  revision: string | null;
  holder: string | null;
  archive: Uint8Array | null;
  commits: Array<{ revision: string; message: string; author: string }>;
}

export class FakeProjectService {
  readonly projects = new Map<string, ServerProject>();
  private readonly tokens = new Map<string, string>();
  private readonly passwords = new Map<string, string>();
  private revisionCounter = 0;
  private lockCounter = 0;

  addUser(email: string, token: string, password?: string): void {
    this.tokens.set(token, email);
    if (password) this.passwords.set(email, password);
  }

  userForToken(token: string): string | null {
    return this.tokens.get(token) ?? null;
  }

  login(email: string, password: string): string | null {
    if (this.passwords.get(email) !== password) return null;
    for (const [token, user] of this.tokens) if (user === email) return token;
    return null;
  }

  addProject(init: Partial<Omit<ServerProject, "commits">> & { name: string }): ServerProject {
    const project: ServerProject = {
      id: init.id ?? randomUUID(),
      name: init.name,
      description: init.description ?? "",
      kind: init.kind ?? "COMPASS",
      revision: init.revision ?? null,
      holder: init.holder ?? null,
      archive: init.archive ?? null,
      commits: [],
    };
    this.projects.set(project.id, project);
    return project;
  }

  get(id: string): ServerProject {
    const project = this.projects.get(id);
    if (!project) throw new SyncError("NotFound", `No project ${id}`);
    return project;
  }

  nextRevision(): string {
    return `rev-${++this.revisionCounter}`;
  }

  nextLockToken(): string {
    return `lock-${++this.lockCounter}`;
  }

  /** Administrator override: clear the mutex no matter who holds it. */
  forceClearLock(id: string): void {
    this.get(id).holder = null;
  }

  toProject(p: ServerProject): Project {
    return {
      id: p.id,
      name: p.name,
      description: p.description,
      kind: p.kind,
      revision: p.revision,
      lockHolder: p.holder,
      permission: "READ_AND_WRITE",
    };
  }
}

export class FakeRemoteClient implements RemoteClient {
  readonly calls: Operation[] = [];
  private user: string | null = null;
  private readonly failures = new Map<Operation, SyncError[]>();
  private readonly gates = new Map<Operation, Promise<void>>();

  constructor(readonly service: FakeProjectService) {}

  /** The next call(s) to `op` reject with `error`. */
  failNext(op: Operation, error: SyncError, times = 1): void {
    const queue = this.failures.get(op) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(op, queue);
  }

  /** The next call to `op` waits until the returned function is called. */
  hold(op: Operation): () => void {
    let open: () => void = () => undefined;
    this.gates.set(op, new Promise<void>((resolve) => {
      open = resolve;
    }));
    return () => open();
  }

  private async enter(op: Operation): Promise<void> {
    this.calls.push(op);
    const gate = this.gates.get(op);
    if (gate) {
      this.gates.delete(op);
      await gate;
    }
    const failure = this.failures.get(op)?.shift();
    if (failure) throw failure;
  }

  private me(): string {
    if (!this.user) throw new SyncError("Unauthorized", "Not signed in");
    return this.user;
  }

  async authenticate(credentials: Credentials): Promise<AuthResult> {
    await this.enter("authenticate");
    const token =
      credentials.kind === "token"
        ? credentials.token
        : this.service.login(credentials.email, credentials.password);
    const user = token ? this.service.userForToken(token) : null;
    if (!token || !user) throw new SyncError("Unauthorized", "Sign in rejected");
    this.user = user;
    return { token, user };
  }

  signOut(): void {
    this.user = null;
  }

  async fetchProjectList(): Promise<Project[]> {
    await this.enter("fetchProjectList");
    this.me();
    return [...this.service.projects.values()]
      .filter((p) => p.kind === "COMPASS")
      .map((p) => this.service.toProject(p));
  }

  async fetchProject(projectId: string): Promise<Project> {
    await this.enter("fetchProject");
    this.me();
    return this.service.toProject(this.service.get(projectId));
  }

  async createProject(metadata: NewProjectMetadata, seed?: string): Promise<Project> {
    await this.enter("createProject");
    this.me();
    const project = this.service.addProject({
      id: seed && /^[0-9a-f-]{36}$/.test(seed) ? seed : undefined,
      name: metadata.name,
      description: metadata.description,
    });
    return this.service.toProject(project);
  }

  async uploadProject(projectId: string, archive: Uint8Array, message: string): Promise<UploadOutcome> {
    await this.enter("uploadProject");
    const user = this.me();
    const project = this.service.get(projectId);
    if (project.holder !== user) throw new SyncError("LockConflict", "Lock not held");
    if (project.archive && bytesEqual(project.archive, archive)) return "noChanges";
    project.archive = archive;
    project.revision = this.service.nextRevision();
    project.commits.push({ revision: project.revision, message, author: user });
    return "saved";
  }

  async downloadProject(projectId: string): Promise<Uint8Array | null> {
    await this.enter("downloadProject");
    this.me();
    return this.service.get(projectId).archive;
  }

  async acquireLock(projectId: string): Promise<string> {
    await this.enter("acquireLock");
    const user = this.me();
    const project = this.service.get(projectId);
    if (project.holder !== null && project.holder !== user) {
      throw new SyncError("LockConflict", `Locked by ${project.holder}`);
    }
    project.holder = user;
    return this.service.nextLockToken();
  }

  async releaseLock(projectId: string, _token: string | null): Promise<void> {
    await this.enter("releaseLock");
    const user = this.me();
    const project = this.service.get(projectId);
    if (project.holder === null) throw new SyncError("NotFound", "Lock not held");
    if (project.holder !== user) throw new SyncError("LockConflict", `Locked by ${project.holder}`);
    project.holder = null;
  }
}
