import { join } from "path";
import { SyncError } from "../shared/errors.js";

export const PROJECTS_DIR = "projects";
export const INDEX_DIR = "index";
export const WORKING_DIR = "working_copy";
export const REVISION_FILE = ".revision.json";
export const CREDENTIALS_FILE = "credentials.json";
export const MANIFEST_FILE = "cavesync.json";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isProjectId(id: string): boolean {
  return UUID_RE.test(id);
}

/** Every project path is derived from a validated id so it cannot escape the home. */
export function projectDir(home: string, projectId: string): string {
  if (!isProjectId(projectId)) {
    throw new SyncError("NotFound", `Not a project id: ${projectId}`);
  }
  return join(home, PROJECTS_DIR, projectId.toLowerCase());
}

export function indexDir(home: string, projectId: string): string {
  return join(projectDir(home, projectId), INDEX_DIR);
}

export function workingDir(home: string, projectId: string): string {
  return join(projectDir(home, projectId), WORKING_DIR);
}

export function revisionFile(home: string, projectId: string): string {
  return join(projectDir(home, projectId), REVISION_FILE);
}

export function credentialsFile(home: string): string {
  return join(home, CREDENTIALS_FILE);
}
