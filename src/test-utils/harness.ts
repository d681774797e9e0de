import { makCodec, type MakDocument } from "../services/codec.js";
import { CredentialStore } from "../services/credentials.js";
import { EditorSupervisor, type EditorSupervisorOptions } from "../services/editor.js";
import { RemoteLockClient } from "../services/lock.js";
import { ProjectManager } from "../services/manager.js";
import { AppStateStore } from "../services/state.js";
import { LocalProjectStore } from "../services/store.js";
import { FakeRemoteClient, type FakeProjectService } from "./fakeRemote.js";
import { makeTempDir } from "./fixtures.js";

export const INSTANCE = "https://caves.example.org";

/** One signed-out user of the engine, wired to a shared fake service. */
export interface Actor {
  home: string;
  remote: FakeRemoteClient;
  locks: RemoteLockClient;
  editor: EditorSupervisor;
  state: AppStateStore;
  store: LocalProjectStore<MakDocument>;
  credentials: CredentialStore;
  manager: ProjectManager<MakDocument>;
  /** Folders revealed by a manual-mode editor. */
  revealed: string[];
}

export function createActor(
  service: FakeProjectService,
  opts: { home?: string; editor?: EditorSupervisorOptions } = {}
): Actor {
  const home = opts.home ?? makeTempDir();
  const revealed: string[] = [];
  const remote = new FakeRemoteClient(service);
  const locks = new RemoteLockClient(remote);
  const editor = new EditorSupervisor({
    reveal: async (folder) => {
      revealed.push(folder);
    },
    ...opts.editor,
  });
  const state = new AppStateStore({
    lock: (id) => locks.state(id),
    editor: (id) => editor.session(id),
  });
  const store = new LocalProjectStore(home, makCodec);
  const credentials = new CredentialStore({ home, instance: INSTANCE });
  const manager = new ProjectManager({ remote, store, locks, editor, state, credentials, instance: INSTANCE });
  return { home, remote, locks, editor, state, store, credentials, manager, revealed };
}
