import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import type { FileSet } from "../shared/types.js";

export const SAMPLE_MAK = [
  "/ Sample cave project",
  "@0.000,0.000,0.000,13,0.000;",
  "&WGS 1984;",
  "!OTVXC;",
  "#cave.dat,A1[m,0.0,0.0,0.0];",
  "",
].join("\r\n");

export const SAMPLE_DAT = [
  "Sample Cave",
  "SURVEY NAME: A",
  "SURVEY DATE: 1 2 2024",
  "FROM TO LENGTH BEARING INC",
  "A1 A2 10.00 90.00 -5.00",
  "\f",
].join("\r\n");

export function bytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, "latin1"));
}

export function text(data: Uint8Array | undefined): string {
  return data ? Buffer.from(data).toString("latin1") : "";
}

export function fileSet(entries: Record<string, string>): FileSet {
  return new Map(Object.entries(entries).map(([path, content]) => [path, bytes(content)]));
}

/** A minimal downloadable project tree: project file plus one survey file. */
export function sampleProject(): FileSet {
  return fileSet({ "cave.mak": SAMPLE_MAK, "cave.dat": SAMPLE_DAT });
}

/** Temp directories created through `makeTempDir`, removed by `cleanupTempDirs`. */
let tmpDirs: string[] = [];

export function makeTempDir(prefix = "cavesync-test-"): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tmpDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tmpDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
}
