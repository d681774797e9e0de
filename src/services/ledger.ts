import { readFile, rm } from "fs/promises";
import { z } from "zod";
import { atomicWrite, isErrno } from "./atomic.js";
import { revisionFile } from "./paths.js";
import { getLogger } from "./logger.js";

const log = getLogger("ledger");

const MarkerSchema = z.object({
  revision: z.string().min(1),
  syncedAt: z.string(),
});
export type RevisionMarker = z.infer<typeof MarkerSchema>;

/**
 * Per-project record of the last remote revision fully synchronized into `index`.
 * Absent, unreadable and malformed markers all read as "never synced".
 */
export class RevisionLedger {
  constructor(private readonly home: string) {}

  async read(projectId: string): Promise<string | null> {
    const marker = await this.readMarker(projectId);
    return marker?.revision ?? null;
  }

  async readMarker(projectId: string): Promise<RevisionMarker | null> {
    let raw: string;
    try {
      raw = await readFile(revisionFile(this.home, projectId), "utf-8");
    } catch (err) {
      if (!isErrno(err, "ENOENT")) {
        log.warn("Revision marker unreadable", { projectId, error: String(err) });
      }
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      data = undefined;
    }
    const parsed = MarkerSchema.safeParse(data);
    if (parsed.success) return parsed.data;
    log.warn("Revision marker malformed, treating as unsynced", { projectId });
    return null;
  }

  async write(projectId: string, revision: string): Promise<void> {
    const marker: RevisionMarker = { revision, syncedAt: new Date().toISOString() };
    await atomicWrite(revisionFile(this.home, projectId), JSON.stringify(marker, null, 2) + "\n");
  }

  async clear(projectId: string): Promise<void> {
    await rm(revisionFile(this.home, projectId), { force: true });
  }
}
