import { describe, it, expect, beforeEach } from "vitest";

import { SyncError } from "../shared/errors.js";
import { RemoteLockClient, sameLockState } from "./lock.js";
import { FakeProjectService, FakeRemoteClient } from "../test-utils/fakeRemote.js";

const ALICE = "alice@example.com";
const ALICE_TOKEN = "a".repeat(40);

describe("RemoteLockClient", () => {
  let service: FakeProjectService;
  let remote: FakeRemoteClient;
  let locks: RemoteLockClient;
  let projectId: string;

  beforeEach(async () => {
    service = new FakeProjectService();
    service.addUser(ALICE, ALICE_TOKEN);
    projectId = service.addProject({ name: "Cueva Grande" }).id;
    remote = new FakeRemoteClient(service);
    await remote.authenticate({ kind: "token", token: ALICE_TOKEN });
    locks = new RemoteLockClient(remote);
    locks.setIdentity(ALICE);
  });

  function callCount(op: string): number {
    return remote.calls.filter((c) => c === op).length;
  }

  describe("acquire", () => {
    it("takes the server mutex and keeps its token", async () => {
      const state = await locks.acquire(projectId);
      expect(state).toEqual({ kind: "lockedByMe", token: "lock-1" });
      expect(locks.state(projectId)).toEqual(state);
      expect(service.get(projectId).holder).toBe(ALICE);
      expect(locks.heldByMe()).toEqual([projectId]);
    });

    it("does not call the server again while the lock is held", async () => {
      await locks.acquire(projectId);
      await locks.acquire(projectId);
      expect(callCount("acquireLock")).toBe(1);
    });

    it("records a conflict as lockedByOther", async () => {
      service.get(projectId).holder = "bob@example.com";
      await expect(locks.acquire(projectId)).rejects.toMatchObject({ kind: "LockConflict" });
      expect(locks.state(projectId)).toEqual({ kind: "lockedByOther", holder: "another user" });
    });

    it("keeps a holder already seen on the server", async () => {
      service.get(projectId).holder = "bob@example.com";
      locks.observe(projectId, "bob@example.com", locks.mark());
      await expect(locks.acquire(projectId)).rejects.toMatchObject({ kind: "LockConflict" });
      expect(locks.state(projectId)).toEqual({ kind: "lockedByOther", holder: "bob@example.com" });
    });

    it("leaves state alone on a network failure", async () => {
      remote.failNext("acquireLock", new SyncError("NetworkError", "offline"));
      await expect(locks.acquire(projectId)).rejects.toMatchObject({ kind: "NetworkError" });
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
    });
  });

  describe("release", () => {
    it("does nothing when the lock is not ours", async () => {
      await locks.release(projectId);
      expect(callCount("releaseLock")).toBe(0);
    });

    it("clears the server mutex once", async () => {
      await locks.acquire(projectId);
      await locks.release(projectId);
      await locks.release(projectId);
      expect(callCount("releaseLock")).toBe(1);
      expect(service.get(projectId).holder).toBeNull();
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
      expect(locks.heldByMe()).toEqual([]);
    });

    it("treats a lock already cleared on the server as released", async () => {
      await locks.acquire(projectId);
      service.forceClearLock(projectId);
      await locks.release(projectId);
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
    });

    it("retries once after a network failure", async () => {
      await locks.acquire(projectId);
      remote.failNext("releaseLock", new SyncError("NetworkError", "offline"));
      await locks.release(projectId);
      expect(callCount("releaseLock")).toBe(2);
      expect(service.get(projectId).holder).toBeNull();
    });

    it("gives up after the configured retries but still forgets the lock", async () => {
      locks = new RemoteLockClient(remote, { releaseRetries: 2 });
      await locks.acquire(projectId);
      remote.failNext("releaseLock", new SyncError("NetworkError", "offline"), 3);
      await expect(locks.release(projectId)).rejects.toMatchObject({ kind: "NetworkError" });
      expect(callCount("releaseLock")).toBe(3);
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
    });
  });

  describe("observe", () => {
    it("ignores an observation that started before a local transition", async () => {
      const stamp = locks.mark();
      await locks.acquire(projectId);
      expect(locks.observe(projectId, null, stamp)).toEqual({ changed: false, lost: false });
      expect(locks.state(projectId).kind).toBe("lockedByMe");
    });

    it("reports a lock cleared on the server as lost", async () => {
      await locks.acquire(projectId);
      expect(locks.observe(projectId, null, locks.mark())).toEqual({ changed: true, lost: true });
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
    });

    it("reports a lock taken over by someone else as lost", async () => {
      await locks.acquire(projectId);
      expect(locks.observe(projectId, "admin@example.com", locks.mark())).toEqual({ changed: true, lost: true });
      expect(locks.state(projectId)).toEqual({ kind: "lockedByOther", holder: "admin@example.com" });
    });

    it("adopts a server lock held by us without a token", () => {
      locks.setIdentity("Alice@Example.com");
      expect(locks.observe(projectId, ALICE, locks.mark())).toEqual({ changed: true, lost: false });
      expect(locks.state(projectId)).toEqual({ kind: "lockedByMe", token: null });
    });

    it("keeps our token when the server confirms the lock", async () => {
      await locks.acquire(projectId);
      expect(locks.observe(projectId, ALICE, locks.mark())).toEqual({ changed: false, lost: false });
      expect(locks.state(projectId)).toEqual({ kind: "lockedByMe", token: "lock-1" });
    });

    it("sees another holder leave", () => {
      locks.observe(projectId, "bob@example.com", locks.mark());
      expect(locks.observe(projectId, null, locks.mark())).toEqual({ changed: true, lost: false });
      expect(locks.state(projectId)).toEqual({ kind: "unlocked" });
    });
  });

  it("reacquires after a token-less adoption", async () => {
    service.get(projectId).holder = ALICE;
    locks.observe(projectId, ALICE, locks.mark());
    expect(await locks.acquire(projectId)).toEqual({ kind: "lockedByMe", token: "lock-1" });
  });
});

describe("sameLockState", () => {
  it("compares tokens and holders", () => {
    expect(sameLockState({ kind: "unlocked" }, { kind: "unlocked" })).toBe(true);
    expect(sameLockState({ kind: "lockedByMe", token: "x" }, { kind: "lockedByMe", token: null })).toBe(false);
    expect(sameLockState({ kind: "lockedByOther", holder: "a" }, { kind: "lockedByOther", holder: "a" })).toBe(true);
    expect(sameLockState({ kind: "lockedByOther", holder: "a" }, { kind: "unlocked" })).toBe(false);
  });
});
