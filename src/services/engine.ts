import type { Config } from "./config.js";
import { makCodec, type MakDocument } from "./codec.js";
import { CredentialStore } from "./credentials.js";
import { EditorSupervisor, type EditorSupervisorOptions } from "./editor.js";
import { RemoteLockClient } from "./lock.js";
import { ProjectManager } from "./manager.js";
import { Reconciler } from "./reconciler.js";
import { HttpRemoteClient, type RemoteClient } from "./remote.js";
import { AppStateStore } from "./state.js";
import { LocalProjectStore } from "./store.js";
import { getLogger } from "./logger.js";

const log = getLogger("engine");

export interface Engine {
  state: AppStateStore;
  manager: ProjectManager<MakDocument>;
  reconciler: Reconciler<MakDocument>;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface EngineOverrides {
  remote?: RemoteClient;
  editor?: Pick<EditorSupervisorOptions, "spawn" | "reveal">;
}

export function createEngine(config: Config, overrides: EngineOverrides = {}): Engine {
  const remote =
    overrides.remote ??
    new HttpRemoteClient({
      instance: config.instance,
      requestTimeoutMs: config.requestTimeoutMs,
      transferTimeoutMs: config.transferTimeoutMs,
    });
  const locks = new RemoteLockClient(remote, { releaseRetries: config.releaseRetries });
  const editor = new EditorSupervisor({
    command: config.editorCommand,
    args: config.editorArgs,
    ...overrides.editor,
  });
  const state = new AppStateStore({
    lock: (id) => locks.state(id),
    editor: (id) => editor.session(id),
  });
  const store = new LocalProjectStore(config.home, makCodec);
  const credentials = new CredentialStore({
    home: config.home,
    instance: config.instance,
    envToken: config.token,
  });
  const manager = new ProjectManager({ remote, store, locks, editor, state, credentials, instance: config.instance });
  const reconciler = new Reconciler(manager, editor, {
    remotePollMs: config.remotePollMs,
    localPollMs: config.localPollMs,
  });

  let started = false;

  return {
    state,
    manager,
    reconciler,
    async start() {
      if (started) return;
      started = true;
      log.info("Starting", { home: config.home, instance: config.instance, editor: editor.mode });
      await manager.start();
      reconciler.start();
    },
    async stop() {
      if (!started) return;
      started = false;
      await reconciler.stop();
      await manager.shutdown();
      log.info("Stopped");
    },
  };
}
