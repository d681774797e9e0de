import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { spawn, type ChildProcess } from "child_process";
import { writeFileSync } from "fs";
import { join } from "path";

import { SyncError } from "../shared/errors.js";
import { pack } from "./archive.js";
import { Reconciler } from "./reconciler.js";
import type { MakDocument } from "./codec.js";
import { FakeProjectService } from "../test-utils/fakeRemote.js";
import { createActor, type Actor } from "../test-utils/harness.js";
import { cleanupTempDirs, sampleProject } from "../test-utils/fixtures.js";

const ALICE = "alice@example.com";
const ALICE_TOKEN = "a".repeat(40);

const children: ChildProcess[] = [];

afterEach(() => {
  for (const child of children.splice(0)) {
    if (child.exitCode === null && child.signalCode === null) child.kill();
  }
  cleanupTempDirs();
});

describe("Reconciler", () => {
  let service: FakeProjectService;
  let alice: Actor;
  let reconciler: Reconciler<MakDocument>;
  let projectId: string;

  beforeEach(async () => {
    service = new FakeProjectService();
    service.addUser(ALICE, ALICE_TOKEN);
    projectId = service.addProject({ name: "Mammoth", revision: "r0", archive: pack(sampleProject()) }).id;
    alice = createActor(service, {
      editor: {
        command: process.execPath,
        args: ["-e", "process.exit(0)"],
        spawn: (command, args) => {
          const child = spawn(command, args, { stdio: "ignore" });
          children.push(child);
          return child;
        },
      },
    });
    await alice.manager.login({ token: ALICE_TOKEN });
    reconciler = new Reconciler(alice.manager, alice.editor, { remotePollMs: 60_000, localPollMs: 60_000 });
  });

  afterEach(async () => {
    await reconciler.stop();
  });

  it("releases the lock after the editor exits", async () => {
    await alice.manager.download(projectId);
    await alice.manager.open(projectId);
    expect(alice.manager.snapshot().projects[projectId].editor).toMatchObject({ mode: "process" });

    await vi.waitFor(() => expect(alice.editor.exited()).toEqual([projectId]), { timeout: 5000 });
    await reconciler.tickFast();

    const snap = alice.manager.snapshot();
    expect(snap.projects[projectId].lock).toEqual({ kind: "unlocked" });
    expect(snap.projects[projectId].editor).toBeNull();
    expect(snap.activeProjectId).toBeNull();
    expect(service.get(projectId).holder).toBeNull();
  });

  it("stops tracking the editor even when the release fails", async () => {
    await alice.manager.download(projectId);
    await alice.manager.open(projectId);
    await vi.waitFor(() => expect(alice.editor.exited()).toEqual([projectId]), { timeout: 5000 });

    alice.remote.failNext("releaseLock", new SyncError("NetworkError", "offline"), 2);
    await reconciler.tickFast();

    expect(alice.editor.exited()).toEqual([]);
    expect(alice.manager.snapshot().projects[projectId].lock).toEqual({ kind: "unlocked" });
  });

  it("picks up local edits on the fast tick", async () => {
    await alice.manager.download(projectId);
    writeFileSync(join(alice.store.workingPath(projectId), "cave.dat"), "edited");
    await reconciler.tickFast();
    expect(alice.manager.snapshot().projects[projectId].status).toBe("Dirty");
  });

  it("picks up remote changes on the slow tick", async () => {
    const added = service.addProject({ name: "Jewel" });
    service.get(projectId).holder = "bob@example.com";
    await reconciler.tickSlow();

    const snap = alice.manager.snapshot();
    expect(snap.projects[added.id].status).toBe("RemoteOnly");
    expect(snap.projects[projectId].lock).toEqual({ kind: "lockedByOther", holder: "bob@example.com" });
  });

  it("survives a failed slow tick and records the error", async () => {
    alice.remote.failNext("fetchProjectList", new SyncError("NetworkError", "offline"));
    await reconciler.tickSlow();
    expect(alice.manager.snapshot().transientError).toBe("offline");

    await reconciler.tickSlow();
    expect(alice.manager.snapshot().transientError).toBeNull();
  });

  it("does not overlap ticks of the same loop", async () => {
    const resume = alice.remote.hold("fetchProjectList");
    const first = reconciler.tickSlow();
    const second = reconciler.tickSlow();
    expect(second).toBe(first);
    resume();
    await first;
    expect(alice.remote.calls.filter((c) => c === "fetchProjectList")).toHaveLength(2);
  });

  it("runs on its own timers until stopped", async () => {
    vi.useFakeTimers();
    try {
      const fast = new Reconciler(alice.manager, alice.editor, { remotePollMs: 1000, localPollMs: 100 });
      const refreshLocal = vi.spyOn(alice.manager, "refreshLocal").mockResolvedValue(undefined);
      fast.start();
      await vi.advanceTimersByTimeAsync(350);
      expect(refreshLocal.mock.calls.length).toBeGreaterThanOrEqual(3);

      await fast.stop();
      const seen = refreshLocal.mock.calls.length;
      await vi.advanceTimersByTimeAsync(500);
      expect(refreshLocal.mock.calls.length).toBe(seen);
    } finally {
      vi.useRealTimers();
    }
  });
});
