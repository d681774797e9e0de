import { mkdir, readFile, readdir, writeFile } from "fs/promises";
import { basename, dirname, join, posix, relative, resolve, sep } from "path";
import { z } from "zod";

import type { FileSet, LocalProjectRecord, LocalProjectStatus } from "../shared/types.js";
import { SyncError, errorMessage, isSyncError } from "../shared/errors.js";
import { isErrno, pathExists, recoverDirectory, recoverSwap, swapDirectories, swapDirectory } from "./atomic.js";
import { fileSetsEqual, isSafeMemberPath, sortedPaths } from "./archive.js";
import { verifyRoundTrip, type ProjectCodec } from "./codec.js";
import { RevisionLedger } from "./ledger.js";
import { KeyedMutex } from "./mutex.js";
import { MANIFEST_FILE, indexDir, projectDir, workingDir } from "./paths.js";
import { getLogger } from "./logger.js";

const log = getLogger("store");

// --- Status projection ---

function isEmpty(files: FileSet | null): boolean {
  return files === null || files.size === 0;
}

/**
 * Pure projection of local state against the remote revision.
 * A missing ledger marker only matches a project with no remote revision.
 */
export function computeStatus(
  record: LocalProjectRecord,
  remoteRevision: string | null
): LocalProjectStatus {
  if (!record.exists) return "RemoteOnly";
  if (isEmpty(record.index) && isEmpty(record.workingCopy) && record.lastSyncedRevision === null) {
    return "EmptyLocal";
  }
  const dirty = !fileSetsEqual(record.index ?? new Map(), record.workingCopy ?? new Map());
  const current = record.lastSyncedRevision === remoteRevision;
  if (dirty) return current ? "Dirty" : "DirtyAndOutOfDate";
  return current ? "UpToDate" : "OutOfDate";
}

export function isDirty(status: LocalProjectStatus): boolean {
  return status === "Dirty" || status === "DirtyAndOutOfDate";
}

// --- Manifest ---

const ManifestSchema = z.object({
  format: z.literal("compass"),
  projectId: z.string(),
  projectFile: z.string(),
  surveyFiles: z.array(z.string()),
});
export type ProjectManifest = z.infer<typeof ManifestSchema>;

function parseManifest(raw: string): ProjectManifest | null {
  try {
    const parsed = ManifestSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// --- Tree I/O ---

async function readTree(root: string): Promise<FileSet | null> {
  if (!(await pathExists(root))) return null;
  const files: FileSet = new Map();

  async function walk(dir: string): Promise<void> {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile()) {
        const rel = relative(root, full).split(sep).join(posix.sep);
        files.set(rel, new Uint8Array(await readFile(full)));
      }
    }
  }

  await walk(root);
  return new Map(sortedPaths(files).map((p) => [p, files.get(p) ?? new Uint8Array()]));
}

async function writeTree(root: string, files: FileSet): Promise<void> {
  for (const path of sortedPaths(files)) {
    if (!isSafeMemberPath(path)) {
      throw new SyncError("SerializationError", `Refusing to write unsafe path: ${path}`);
    }
    const data = files.get(path);
    if (!data) continue;
    const target = join(root, ...path.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
  }
}

function asIoError(err: unknown, what: string): SyncError {
  if (isSyncError(err)) return err;
  return new SyncError("IoError", `${what}: ${errorMessage(err)}`, { cause: err });
}

export interface ImportResult {
  projectFile: string;
  surveyFiles: string[];
}

// --- Store ---

/**
 * Owns `<home>/projects/<id>/{index,working_copy}`.
 *
 * `index` is the last-synchronized snapshot; `working_copy` is what the editor
 * edits. Both are only ever replaced whole through a directory swap, and every
 * read or swap for one project runs under that project's guard.
 */
export class LocalProjectStore<Doc> {
  private readonly guard = new KeyedMutex();

  constructor(
    private readonly home: string,
    private readonly codec: ProjectCodec<Doc>,
    readonly ledger: RevisionLedger = new RevisionLedger(home)
  ) {}

  projectPath(projectId: string): string {
    return projectDir(this.home, projectId);
  }

  workingPath(projectId: string): string {
    return workingDir(this.home, projectId);
  }

  async exists(projectId: string): Promise<boolean> {
    return pathExists(this.projectPath(projectId));
  }

  async load(projectId: string): Promise<LocalProjectRecord> {
    return this.guard.run(projectId, async () => {
      const dir = this.projectPath(projectId);
      if (!(await pathExists(dir))) {
        return { exists: false, index: null, workingCopy: null, lastSyncedRevision: null };
      }
      try {
        if (await recoverSwap(dir)) {
          log.warn("Rolled back an interrupted download", { projectId });
        }
        await recoverDirectory(indexDir(this.home, projectId));
        await recoverDirectory(workingDir(this.home, projectId));
        const [index, workingCopy, lastSyncedRevision] = await Promise.all([
          readTree(indexDir(this.home, projectId)),
          readTree(workingDir(this.home, projectId)),
          this.ledger.read(projectId),
        ]);
        return { exists: true, index, workingCopy, lastSyncedRevision };
      } catch (err) {
        throw asIoError(err, `Reading project ${projectId}`);
      }
    });
  }

  async status(projectId: string, remoteRevision: string | null): Promise<LocalProjectStatus> {
    return computeStatus(await this.load(projectId), remoteRevision);
  }

  async readWorkingCopy(projectId: string): Promise<FileSet> {
    return this.guard.run(projectId, async () => {
      try {
        return (await readTree(workingDir(this.home, projectId))) ?? new Map();
      } catch (err) {
        throw asIoError(err, `Reading working copy of ${projectId}`);
      }
    });
  }

  async ensureProjectDirs(projectId: string): Promise<void> {
    await this.guard.run(projectId, async () => {
      try {
        await mkdir(indexDir(this.home, projectId), { recursive: true });
        await mkdir(workingDir(this.home, projectId), { recursive: true });
      } catch (err) {
        throw asIoError(err, `Creating project folder for ${projectId}`);
      }
    });
  }

  /**
   * Replace the working copy with the editor project at `projectFilePath` and
   * the survey files it references. Never touches `index`.
   */
  async importProject(projectId: string, projectFilePath: string): Promise<ImportResult> {
    const source = resolve(projectFilePath);
    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await readFile(source));
    } catch (err) {
      throw new SyncError("ImportError", `Cannot read project file ${source}: ${errorMessage(err)}`, { cause: err });
    }

    let doc: Doc;
    try {
      doc = verifyRoundTrip(this.codec, bytes);
    } catch (err) {
      throw new SyncError("ImportError", `Cannot parse ${basename(source)}: ${errorMessage(err)}`, { cause: err });
    }

    const files: FileSet = new Map();
    const projectFile = basename(source);
    files.set(projectFile, bytes);

    const surveyFiles: string[] = [];
    for (const ref of this.codec.referencedFiles(doc)) {
      if (!isSafeMemberPath(ref)) {
        throw new SyncError("ImportError", `Referenced file is outside the project folder: ${ref}`);
      }
      try {
        files.set(ref, new Uint8Array(await readFile(join(dirname(source), ...ref.split("/")))));
      } catch (err) {
        if (isErrno(err, "ENOENT")) {
          throw new SyncError("ImportError", `Referenced survey file not found: ${ref}`, { cause: err });
        }
        throw new SyncError("ImportError", `Cannot read ${ref}: ${errorMessage(err)}`, { cause: err });
      }
      surveyFiles.push(ref);
    }

    const manifest: ProjectManifest = { format: "compass", projectId, projectFile, surveyFiles };
    files.set(MANIFEST_FILE, Buffer.from(JSON.stringify(manifest, null, 2) + "\n", "utf-8"));

    await this.guard.run(projectId, async () => {
      try {
        await mkdir(indexDir(this.home, projectId), { recursive: true });
        await swapDirectory(workingDir(this.home, projectId), (staging) => writeTree(staging, files));
      } catch (err) {
        throw asIoError(err, `Replacing working copy of ${projectId}`);
      }
    });
    log.info("Imported project", { projectId, projectFile, surveyFiles: surveyFiles.length });
    return { projectFile, surveyFiles };
  }

  /** Download promotion: both trees replaced as a unit, then the ledger advanced. */
  async install(projectId: string, files: FileSet, revision: string | null): Promise<void> {
    await this.guard.run(projectId, async () => {
      try {
        await swapDirectories([
          { target: indexDir(this.home, projectId), populate: (staging) => writeTree(staging, files) },
          { target: workingDir(this.home, projectId), populate: (staging) => writeTree(staging, files) },
        ]);
        if (revision === null) {
          await this.ledger.clear(projectId);
        } else {
          await this.ledger.write(projectId, revision);
        }
      } catch (err) {
        throw asIoError(err, `Installing download for ${projectId}`);
      }
    });
  }

  /** After a successful upload the uploaded snapshot becomes the new index. */
  async promoteIndex(projectId: string, files: FileSet, revision: string | null): Promise<void> {
    await this.guard.run(projectId, async () => {
      try {
        await swapDirectory(indexDir(this.home, projectId), (staging) => writeTree(staging, files));
        if (revision !== null) await this.ledger.write(projectId, revision);
      } catch (err) {
        throw asIoError(err, `Promoting index for ${projectId}`);
      }
    });
  }

  async discardChanges(projectId: string): Promise<void> {
    await this.guard.run(projectId, async () => {
      try {
        const index = (await readTree(indexDir(this.home, projectId))) ?? new Map();
        await swapDirectory(workingDir(this.home, projectId), (staging) => writeTree(staging, index));
      } catch (err) {
        throw asIoError(err, `Discarding changes in ${projectId}`);
      }
    });
  }

  async readManifest(projectId: string): Promise<ProjectManifest | null> {
    try {
      return parseManifest(await readFile(join(workingDir(this.home, projectId), MANIFEST_FILE), "utf-8"));
    } catch {
      return null;
    }
  }

  /** Absolute path of the file the editor should open, or null if nothing is there yet. */
  async editorTarget(projectId: string): Promise<string | null> {
    const dir = workingDir(this.home, projectId);
    const manifest = await this.readManifest(projectId);
    if (manifest && (await pathExists(join(dir, manifest.projectFile)))) {
      return join(dir, manifest.projectFile);
    }
    if (!(await pathExists(dir))) return null;
    const candidates = (await readdir(dir))
      .filter((name) => name.toLowerCase().endsWith(this.codec.extension))
      .sort();
    return candidates.length > 0 ? join(dir, candidates[0]) : null;
  }

  /**
   * Check a project tree before it is installed or uploaded: the project file
   * named by the manifest (or the only top-level one) must survive a codec
   * round trip. Returns the project file path, or null for an empty tree.
   */
  validateFiles(files: FileSet): string | null {
    let projectFile: string | undefined;
    const manifestBytes = files.get(MANIFEST_FILE);
    if (manifestBytes) {
      const parsed = parseManifest(Buffer.from(manifestBytes).toString("utf-8"));
      if (!parsed) throw new SyncError("SerializationError", `${MANIFEST_FILE} is malformed`);
      projectFile = parsed.projectFile;
    } else {
      projectFile = sortedPaths(files).find(
        (p) => !p.includes("/") && p.toLowerCase().endsWith(this.codec.extension)
      );
    }
    if (!projectFile) return null;

    const bytes = files.get(projectFile);
    if (!bytes) {
      throw new SyncError("SerializationError", `Project file ${projectFile} is missing`);
    }
    verifyRoundTrip(this.codec, bytes);
    return projectFile;
  }
}
