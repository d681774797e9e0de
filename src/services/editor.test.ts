import { describe, it, expect, afterEach, vi } from "vitest";
import { spawn, type ChildProcess } from "child_process";

import { EditorSupervisor } from "./editor.js";

const children: ChildProcess[] = [];

function trackedSpawn(command: string, args: string[]): ChildProcess {
  const child = spawn(command, args, { stdio: "ignore" });
  children.push(child);
  return child;
}

afterEach(() => {
  for (const child of children.splice(0)) {
    if (child.exitCode === null && child.signalCode === null) child.kill();
  }
});

function nodeEditor(script: string): EditorSupervisor {
  return new EditorSupervisor({ command: process.execPath, args: ["-e", script], spawn: trackedSpawn });
}

describe("EditorSupervisor (manual mode)", () => {
  it("reveals the folder and tracks the session until ended", async () => {
    const revealed: string[] = [];
    const editor = new EditorSupervisor({ reveal: async (folder) => void revealed.push(folder) });

    const session = await editor.launch("p1", "/work/p1/cave.mak", "/work/p1");

    expect(editor.mode).toBe("manual");
    expect(revealed).toEqual(["/work/p1"]);
    expect(session.mode).toBe("manual");
    expect(editor.isRunning("p1")).toBe(true);
    expect(editor.exited()).toEqual([]);

    editor.end("p1");
    expect(editor.session("p1")).toBeNull();
    expect(editor.isRunning("p1")).toBe(false);
  });

  it("keeps the session when the folder cannot be revealed", async () => {
    const editor = new EditorSupervisor({
      reveal: async () => {
        throw new Error("no file browser");
      },
    });
    await editor.launch("p1", "/work/p1/cave.mak", "/work/p1");
    expect(editor.isRunning("p1")).toBe(true);
  });
});

describe("EditorSupervisor (process mode)", () => {
  it("notices when the editor exits", async () => {
    const editor = nodeEditor("process.exit(0)");
    const session = await editor.launch("p1", "cave.mak", "/work/p1");

    expect(editor.mode).toBe("process");
    expect(session).toMatchObject({ mode: "process" });
    await vi.waitFor(() => expect(editor.exited()).toEqual(["p1"]), { timeout: 5000 });
    expect(editor.isRunning("p1")).toBe(false);

    editor.end("p1");
    expect(editor.exited()).toEqual([]);
  });

  it("returns the running session instead of starting a second editor", async () => {
    const editor = nodeEditor("setTimeout(() => {}, 10000)");
    const first = await editor.launch("p1", "cave.mak", "/work/p1");
    const second = await editor.launch("p1", "cave.mak", "/work/p1");

    expect(second).toBe(first);
    expect(children).toHaveLength(1);
    expect(editor.isRunning("p1")).toBe(true);
  });

  it("starts a fresh editor after the previous one exited", async () => {
    const editor = nodeEditor("process.exit(0)");
    await editor.launch("p1", "cave.mak", "/work/p1");
    await vi.waitFor(() => expect(editor.exited()).toEqual(["p1"]), { timeout: 5000 });

    await editor.launch("p1", "cave.mak", "/work/p1");
    expect(children).toHaveLength(2);
  });

  it("passes the project file as the last argument", async () => {
    const seen: string[][] = [];
    const editor = new EditorSupervisor({
      command: process.execPath,
      args: ["-e", "0"],
      spawn: (command, args) => {
        seen.push(args);
        return trackedSpawn(command, args);
      },
    });
    await editor.launch("p1", "/work/p1/cave.mak", "/work/p1");
    expect(seen).toEqual([["-e", "0", "/work/p1/cave.mak"]]);
  });

  it("fails with LaunchError when the executable does not exist", async () => {
    const editor = new EditorSupervisor({ command: "/nonexistent/cave-editor", spawn: trackedSpawn });
    await expect(editor.launch("p1", "cave.mak", "/work/p1")).rejects.toMatchObject({ kind: "LaunchError" });
    expect(editor.session("p1")).toBeNull();
  });

  it("fails with LaunchError when spawning throws", async () => {
    const editor = new EditorSupervisor({
      command: "cave-editor",
      spawn: () => {
        throw new Error("EACCES");
      },
    });
    await expect(editor.launch("p1", "cave.mak", "/work/p1")).rejects.toMatchObject({
      kind: "LaunchError",
      message: "Cannot start cave-editor: EACCES",
    });
  });

  it("endAll forgets every session", async () => {
    const editor = nodeEditor("setTimeout(() => {}, 10000)");
    await editor.launch("p1", "a.mak", "/work/p1");
    await editor.launch("p2", "b.mak", "/work/p2");
    editor.endAll();
    expect(editor.session("p1")).toBeNull();
    expect(editor.session("p2")).toBeNull();
  });
});
