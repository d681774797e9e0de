import { errorMessage, isSyncError } from "../shared/errors.js";
import type { EditorSupervisor } from "./editor.js";
import type { ProjectManager } from "./manager.js";
import { getLogger } from "./logger.js";

const log = getLogger("reconciler");

export interface ReconcilerOptions {
  remotePollMs: number;
  localPollMs: number;
}

/**
 * Two self-rescheduling loops: a slow one for the remote project list and a
 * fast one for local status and editor liveness. A tick never overlaps the
 * previous tick of the same loop; the next one is scheduled when it finishes.
 */
export class Reconciler<Doc> {
  private slowTimer: NodeJS.Timeout | null = null;
  private fastTimer: NodeJS.Timeout | null = null;
  private slowRun: Promise<void> | null = null;
  private fastRun: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly manager: ProjectManager<Doc>,
    private readonly editor: EditorSupervisor,
    private readonly opts: ReconcilerOptions
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleSlow();
    this.scheduleFast();
    log.info("Reconciliation started", { remotePollMs: this.opts.remotePollMs, localPollMs: this.opts.localPollMs });
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.slowTimer) clearTimeout(this.slowTimer);
    if (this.fastTimer) clearTimeout(this.fastTimer);
    this.slowTimer = null;
    this.fastTimer = null;
    await Promise.all([this.slowRun, this.fastRun]);
  }

  private scheduleSlow(): void {
    if (!this.running) return;
    this.slowTimer = setTimeout(() => {
      void this.tickSlow().then(() => this.scheduleSlow());
    }, this.opts.remotePollMs);
    this.slowTimer.unref();
  }

  private scheduleFast(): void {
    if (!this.running) return;
    this.fastTimer = setTimeout(() => {
      void this.tickFast().then(() => this.scheduleFast());
    }, this.opts.localPollMs);
    this.fastTimer.unref();
  }

  /** Remote list refresh. Errors are recorded in state by the manager and logged here. */
  tickSlow(): Promise<void> {
    if (this.slowRun) return this.slowRun;
    this.slowRun = (async () => {
      try {
        await this.manager.syncRemote();
      } catch (err) {
        log.warn("Remote refresh failed, will retry", { error: errorMessage(err) });
      } finally {
        this.slowRun = null;
      }
    })();
    return this.slowRun;
  }

  /** Editor exits first, so the status computed right after reflects the release. */
  tickFast(): Promise<void> {
    if (this.fastRun) return this.fastRun;
    this.fastRun = (async () => {
      try {
        for (const projectId of this.editor.exited()) {
          try {
            await this.manager.onEditorExited(projectId);
          } catch (err) {
            if (isSyncError(err, "Busy")) continue;
            this.editor.end(projectId);
            log.warn("Release after editor exit failed", { projectId, error: errorMessage(err) });
          }
        }
        await this.manager.refreshLocal();
      } catch (err) {
        log.warn("Local refresh failed, will retry", { error: errorMessage(err) });
      } finally {
        this.fastRun = null;
      }
    })();
    return this.fastRun;
  }
}
