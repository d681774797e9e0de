import { zipSync, unzipSync, type Zippable } from "fflate";
import { posix } from "path";
import type { FileSet } from "../shared/types.js";
import { SyncError, errorMessage } from "../shared/errors.js";

// Fixed member timestamp so identical trees always pack to identical bytes.
const MEMBER_MTIME = new Date(1980, 0, 1);

export function sortedPaths(files: FileSet): string[] {
  return [...files.keys()].sort();
}

/** Reject absolute paths, drive letters, backslashes and `..` segments. */
export function isSafeMemberPath(path: string): boolean {
  if (path === "" || path.startsWith("/") || path.includes("\\") || /^[a-zA-Z]:/.test(path)) {
    return false;
  }
  const normalized = posix.normalize(path);
  return normalized === path && !normalized.split("/").includes("..");
}

export function pack(files: FileSet): Uint8Array {
  const zippable: Zippable = {};
  for (const path of sortedPaths(files)) {
    if (!isSafeMemberPath(path)) {
      throw new SyncError("SerializationError", `Refusing to pack unsafe path: ${path}`);
    }
    const data = files.get(path);
    if (data) zippable[path] = [data, { mtime: MEMBER_MTIME }];
  }
  return zipSync(zippable, { level: 6 });
}

export function unpack(archive: Uint8Array): FileSet {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(archive);
  } catch (err) {
    throw new SyncError("SerializationError", `Corrupt archive: ${errorMessage(err)}`, { cause: err });
  }

  const files: FileSet = new Map();
  for (const name of Object.keys(entries).sort()) {
    if (name.endsWith("/")) continue;
    if (!isSafeMemberPath(name)) {
      throw new SyncError("SerializationError", `Archive member escapes project: ${name}`);
    }
    files.set(name, entries[name]);
  }
  return files;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Same paths, same bytes. Order is irrelevant. */
export function fileSetsEqual(a: FileSet, b: FileSet): boolean {
  if (a.size !== b.size) return false;
  for (const [path, data] of a) {
    const other = b.get(path);
    if (!other || !bytesEqual(data, other)) return false;
  }
  return true;
}
