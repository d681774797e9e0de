import { mkdir, rename, rm, writeFile, readdir, readFile, stat } from "fs/promises";
import { dirname, join, basename } from "path";
import { randomUUID } from "crypto";
import { z } from "zod";

const STAGING_PREFIX = ".staging-";
export const SWAP_JOURNAL = ".swap.json";

const SwapJournalSchema = z.object({
  entries: z.array(z.object({ name: z.string().min(1), hadTarget: z.boolean() })),
});
type SwapJournal = z.infer<typeof SwapJournalSchema>;

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrno(err, "ENOENT")) return false;
    throw err;
  }
}

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Write to a temp file beside the target, then rename over it.
 * Readers see either the old content or the new, never a partial file.
 */
export async function atomicWrite(
  filePath: string,
  content: string | Uint8Array,
  mode?: number
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tempPath = join(dir, `.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, content, mode === undefined ? undefined : { mode });
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

function previousPath(target: string): string {
  return join(dirname(target), `.${basename(target)}.prev`);
}

export interface DirectoryReplacement {
  target: string;
  populate: (staging: string) => Promise<void>;
}

/**
 * Replace the directory `target` with a freshly populated one.
 *
 * The new tree is built in a sibling staging directory; the old tree is moved
 * aside, the staging tree renamed into place, then the old tree removed. A crash
 * leaves either `target` or `.target.prev`, which `recoverDirectory` restores.
 */
export async function swapDirectory(
  target: string,
  populate: (staging: string) => Promise<void>
): Promise<void> {
  await swapDirectories([{ target, populate }]);
}

/**
 * Replace several directories as a unit: all trees are staged first, and if
 * any rename fails the targets already swapped are put back.
 *
 * When more than one tree is replaced the targets must share a parent. A
 * journal in that parent lists them while the renames run; `recoverSwap`
 * rolls every target back if a crash leaves the journal behind.
 */
export async function swapDirectories(replacements: DirectoryReplacement[]): Promise<void> {
  const staged: Array<{ target: string; staging: string }> = [];
  try {
    for (const { target, populate } of replacements) {
      const parent = dirname(target);
      await mkdir(parent, { recursive: true });
      const staging = join(parent, `${STAGING_PREFIX}${randomUUID()}`);
      await mkdir(staging);
      staged.push({ target, staging });
      await populate(staging);
    }
  } catch (err) {
    for (const { staging } of staged) await rm(staging, { recursive: true, force: true });
    throw err;
  }

  const plan: Array<{ target: string; staging: string; hadTarget: boolean }> = [];
  for (const { target, staging } of staged) {
    await rm(previousPath(target), { recursive: true, force: true });
    plan.push({ target, staging, hadTarget: await pathExists(target) });
  }

  const journal = plan.length > 1 ? journalPath(plan.map((p) => p.target)) : null;
  if (journal) {
    const entries: SwapJournal = {
      entries: plan.map(({ target, hadTarget }) => ({ name: basename(target), hadTarget })),
    };
    await atomicWrite(journal, JSON.stringify(entries));
  }

  const done: Array<{ target: string; hadTarget: boolean }> = [];
  try {
    for (const { target, staging, hadTarget } of plan) {
      const prev = previousPath(target);
      if (hadTarget) await rename(target, prev);
      try {
        await rename(staging, target);
      } catch (err) {
        if (hadTarget) await rename(prev, target);
        throw err;
      }
      done.push({ target, hadTarget });
    }
    // Commit point: once the journal is gone the new trees stand.
    if (journal) await rm(journal, { force: true });
  } catch (err) {
    for (const { target, hadTarget } of done.reverse()) {
      await rm(target, { recursive: true, force: true });
      if (hadTarget) await rename(previousPath(target), target);
    }
    for (const { staging } of staged) await rm(staging, { recursive: true, force: true });
    if (journal) await rm(journal, { force: true });
    throw err;
  }

  for (const { target } of done) {
    await rm(previousPath(target), { recursive: true, force: true });
  }
}

function journalPath(targets: string[]): string {
  const parent = dirname(targets[0]);
  if (targets.some((t) => dirname(t) !== parent)) {
    throw new Error("Directories swapped together must share a parent");
  }
  return join(parent, SWAP_JOURNAL);
}

async function readJournal(path: string): Promise<SwapJournal | null> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrno(err, "ENOENT")) return null;
    throw err;
  }
  let data: unknown;
  try { data = JSON.parse(raw); } catch { data = undefined; }
  const parsed = SwapJournalSchema.safeParse(data);
  // A torn journal means the renames never started.
  return parsed.success ? parsed.data : { entries: [] };
}

/**
 * Roll back a multi-directory swap that a crash left unfinished in `parent`.
 * Every listed target returns to its tree from before the swap. Returns
 * whether anything was rolled back.
 */
export async function recoverSwap(parent: string): Promise<boolean> {
  const path = join(parent, SWAP_JOURNAL);
  const journal = await readJournal(path);
  if (!journal) return false;

  for (const { name, hadTarget } of journal.entries) {
    const target = join(parent, basename(name));
    const prev = previousPath(target);
    if (await pathExists(prev)) {
      await rm(target, { recursive: true, force: true });
      await rename(prev, target);
    } else if (!hadTarget) {
      await rm(target, { recursive: true, force: true });
    }
  }
  await rm(path, { force: true });
  return true;
}

/** Undo a swap interrupted between its two renames and drop abandoned staging trees. */
export async function recoverDirectory(target: string): Promise<void> {
  const prev = previousPath(target);
  if (await pathExists(prev)) {
    if (await pathExists(target)) {
      await rm(prev, { recursive: true, force: true });
    } else {
      await rename(prev, target);
    }
  }

  const parent = dirname(target);
  if (!(await pathExists(parent))) return;
  for (const entry of await readdir(parent)) {
    if (entry.startsWith(STAGING_PREFIX)) {
      await rm(join(parent, entry), { recursive: true, force: true });
    }
  }
}
