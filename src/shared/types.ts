export type ProjectKind = "COMPASS" | "ARIANE";

// Server permission names: ADMIN, READ_AND_WRITE, READ_ONLY, WEB_VIEWER.
export type Permission = string;

/** Remote project metadata, observed only. */
export interface Project {
  id: string;
  name: string;
  description: string;
  kind: ProjectKind;
  revision: string | null;
  lockHolder: string | null;
  permission: Permission;
}

/** Relative POSIX path -> file bytes. */
export type FileSet = Map<string, Uint8Array>;

export interface LocalProjectRecord {
  exists: boolean;
  index: FileSet | null;
  workingCopy: FileSet | null;
  lastSyncedRevision: string | null;
}

export type LocalProjectStatus =
  | "RemoteOnly"
  | "EmptyLocal"
  | "UpToDate"
  | "OutOfDate"
  | "Dirty"
  | "DirtyAndOutOfDate";

export type LockState =
  | { kind: "unlocked" }
  | { kind: "lockedByMe"; token: string | null }
  | { kind: "lockedByOther"; holder: string };

export type LoadingState =
  | "notStarted"
  | "loadingCredentials"
  | "unauthenticated"
  | "loadingProjects"
  | "ready"
  | "failed";

export type OperationKind =
  | "open"
  | "download"
  | "commit"
  | "discard"
  | "reimport"
  | "release"
  | "create"
  | "editorExited";

export type EditorSession =
  | { mode: "process"; pid: number | null; startedAt: string }
  | { mode: "manual"; startedAt: string };

export interface ProjectSnapshot {
  project: Project;
  status: LocalProjectStatus;
  lock: LockState;
  busy: OperationKind | null;
  editor: EditorSession | null;
}

export interface UserInfo {
  email: string;
  instance: string;
}

export interface LockLostNotice {
  projectId: string;
  at: string;
  holder: string | null;
}

export interface AppSnapshot {
  version: number;
  loadingState: LoadingState;
  user: UserInfo | null;
  activeProjectId: string | null;
  transientError: string | null;
  lockLost: LockLostNotice[];
  projects: Record<string, ProjectSnapshot>;
}

export interface NewProjectMetadata {
  name: string;
  description: string;
  country: string;
  latitude?: string;
  longitude?: string;
}
