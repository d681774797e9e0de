import { spawn, execFile, type ChildProcess } from "child_process";

import type { EditorSession } from "../shared/types.js";
import { SyncError, errorMessage } from "../shared/errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("editor");

interface TrackedSession {
  session: EditorSession;
  child: ChildProcess | null;
  exited: boolean;
}

export type SpawnFn = (command: string, args: string[]) => ChildProcess;
export type RevealFn = (folder: string) => Promise<void>;

export interface EditorSupervisorOptions {
  /** Editor executable. Without one the supervisor only reveals folders. */
  command?: string;
  args?: string[];
  spawn?: SpawnFn;
  reveal?: RevealFn;
}

function defaultSpawn(command: string, args: string[]): ChildProcess {
  return spawn(command, args, { stdio: "ignore", windowsHide: false });
}

/** Open a folder in the platform file browser. */
export function revealInShell(folder: string): Promise<void> {
  const cmd =
    process.platform === "darwin" ? "open" : process.platform === "win32" ? "explorer" : "xdg-open";
  return new Promise((resolve, reject) => {
    execFile(cmd, [folder], (err) => {
      // explorer.exe exits 1 even when it succeeds
      if (err && process.platform !== "win32") reject(err);
      else resolve();
    });
  });
}

/**
 * Tracks editor sessions per project.
 *
 * In process mode liveness comes from the ChildProcess handle we spawned
 * (its exit event, exitCode and signalCode), so a recycled pid cannot make a
 * dead editor look alive. In manual mode the folder is revealed and the
 * session lasts until `end` is called.
 */
export class EditorSupervisor {
  private readonly sessions = new Map<string, TrackedSession>();
  private readonly spawnFn: SpawnFn;
  private readonly revealFn: RevealFn;

  constructor(private readonly opts: EditorSupervisorOptions = {}) {
    this.spawnFn = opts.spawn ?? defaultSpawn;
    this.revealFn = opts.reveal ?? revealInShell;
  }

  get mode(): "process" | "manual" {
    return this.opts.command ? "process" : "manual";
  }

  session(projectId: string): EditorSession | null {
    return this.sessions.get(projectId)?.session ?? null;
  }

  isRunning(projectId: string): boolean {
    const tracked = this.sessions.get(projectId);
    return tracked !== undefined && !this.hasExited(tracked);
  }

  async launch(projectId: string, target: string, folder: string): Promise<EditorSession> {
    const existing = this.sessions.get(projectId);
    if (existing && !this.hasExited(existing)) return existing.session;

    const startedAt = new Date().toISOString();
    if (!this.opts.command) {
      try {
        await this.revealFn(folder);
      } catch (err) {
        log.warn("Could not reveal project folder", { projectId, folder, error: errorMessage(err) });
      }
      const session: EditorSession = { mode: "manual", startedAt };
      this.sessions.set(projectId, { session, child: null, exited: false });
      return session;
    }

    const child = await this.start(this.opts.command, [...(this.opts.args ?? []), target]);
    const tracked: TrackedSession = {
      session: { mode: "process", pid: child.pid ?? null, startedAt },
      child,
      exited: false,
    };
    child.once("exit", (code, signal) => {
      tracked.exited = true;
      log.info("Editor exited", { projectId, code, signal });
    });
    this.sessions.set(projectId, tracked);
    log.info("Editor started", { projectId, pid: child.pid, target });
    return tracked.session;
  }

  private start(command: string, args: string[]): Promise<ChildProcess> {
    let child: ChildProcess;
    try {
      child = this.spawnFn(command, args);
    } catch (err) {
      return Promise.reject(new SyncError("LaunchError", `Cannot start ${command}: ${errorMessage(err)}`, { cause: err }));
    }
    return new Promise((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        child.on("error", (err) => log.warn("Editor process error", { error: errorMessage(err) }));
        resolve(child);
      };
      const onError = (err: Error) => {
        child.off("spawn", onSpawn);
        reject(new SyncError("LaunchError", `Cannot start ${command}: ${err.message}`, { cause: err }));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });
  }

  private hasExited(tracked: TrackedSession): boolean {
    if (!tracked.child) return false;
    return tracked.exited || tracked.child.exitCode !== null || tracked.child.signalCode !== null;
  }

  /** Projects whose editor process has exited and not yet been ended. */
  exited(): string[] {
    return [...this.sessions]
      .filter(([, tracked]) => this.hasExited(tracked))
      .map(([id]) => id);
  }

  /** Stop tracking a session. The editor itself is left running. */
  end(projectId: string): void {
    const tracked = this.sessions.get(projectId);
    if (!tracked) return;
    tracked.child?.removeAllListeners("exit");
    this.sessions.delete(projectId);
  }

  endAll(): void {
    for (const id of [...this.sessions.keys()]) this.end(id);
  }
}
