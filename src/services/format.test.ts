import { describe, it, expect } from "vitest";

import type { AppSnapshot, ProjectSnapshot } from "../shared/types.js";
import { formatLock, formatProjectDetail, formatProjectLine, formatSnapshot, formatStatus } from "./format.js";

function projectSnapshot(overrides: Partial<ProjectSnapshot> & { name: string; id: string }): ProjectSnapshot {
  const { name, id, ...rest } = overrides;
  return {
    project: {
      id,
      name,
      description: "",
      kind: "COMPASS",
      revision: null,
      lockHolder: null,
      permission: "READ_AND_WRITE",
    },
    status: "RemoteOnly",
    lock: { kind: "unlocked" },
    busy: null,
    editor: null,
    ...rest,
  };
}

function appSnapshot(overrides: Partial<AppSnapshot>): AppSnapshot {
  return {
    version: 1,
    loadingState: "ready",
    user: null,
    activeProjectId: null,
    transientError: null,
    lockLost: [],
    projects: {},
    ...overrides,
  };
}

describe("formatStatus / formatLock", () => {
  it("labels statuses", () => {
    expect(formatStatus("Dirty")).toBe("✏️ local changes");
    expect(formatStatus("DirtyAndOutOfDate")).toBe("⚠️ local changes, newer revision on server");
  });

  it("labels locks", () => {
    expect(formatLock({ kind: "unlocked" })).toBe("🔓 unlocked");
    expect(formatLock({ kind: "lockedByMe", token: "lock-1" })).toBe("🔒 locked by you");
    expect(formatLock({ kind: "lockedByMe", token: null })).toBe("🔒 locked by you (recovered)");
    expect(formatLock({ kind: "lockedByOther", holder: "bob@example.com" })).toBe("⛔ locked by bob@example.com");
  });
});

describe("formatProjectLine", () => {
  it("shows activity and the editor", () => {
    const p = projectSnapshot({
      id: "p1",
      name: "Cave",
      status: "UpToDate",
      lock: { kind: "lockedByMe", token: "lock-1" },
      busy: "commit",
      editor: { mode: "manual", startedAt: "2024-01-01T00:00:00.000Z" },
    });
    expect(formatProjectLine(p, true)).toBe(
      "- **Cave** ⭐ · ✅ up to date · 🔒 locked by you · ⏳ commit · 🖥️ editing (manual)\n  `p1`"
    );
  });
});

describe("formatSnapshot", () => {
  it("prompts to sign in when there is no user", () => {
    expect(formatSnapshot(appSnapshot({ loadingState: "unauthenticated" }))).toBe(
      ["# 🗺️ cavesync", "Not signed in. Use `cavesync_login`.", "State: `unauthenticated`", "", "_No projects._"].join("\n")
    );
  });

  it("lists projects by name with errors and lost locks first", () => {
    const out = formatSnapshot(
      appSnapshot({
        user: { email: "caver@example.com", instance: "https://caves.example.org" },
        transientError: "offline",
        activeProjectId: "p2",
        lockLost: [{ projectId: "p2", at: "2024-01-01T00:00:00.000Z", holder: "admin@example.com" }],
        projects: {
          p1: projectSnapshot({ id: "p1", name: "Zeta" }),
          p2: projectSnapshot({ id: "p2", name: "Alpha", status: "Dirty" }),
        },
      })
    );
    expect(out.split("\n")).toEqual([
      "# 🗺️ cavesync",
      "Signed in as **caver@example.com** on https://caves.example.org",
      "State: `ready`",
      "",
      "> ⚠️ offline",
      "",
      "> 🔓 Lock on **Alpha** was cleared on the server (now held by admin@example.com). Re-open before committing.",
      "",
      "## Projects (2)",
      "- **Alpha** ⭐ · ✏️ local changes · 🔓 unlocked",
      "  `p2`",
      "- **Zeta** · ☁️ not downloaded · 🔓 unlocked",
      "  `p1`",
    ]);
  });
});

describe("formatProjectDetail", () => {
  it("omits an empty description", () => {
    const p = projectSnapshot({ id: "p1", name: "Cave" });
    expect(formatProjectDetail(p).split("\n")).toEqual([
      "# Cave",
      "",
      "- **Id:** `p1`",
      "- **Status:** ☁️ not downloaded",
      "- **Lock:** 🔓 unlocked",
      "- **Remote revision:** none",
      "- **Permission:** READ_AND_WRITE",
    ]);
  });

  it("includes the description, revision and editor session", () => {
    const p = projectSnapshot({
      id: "p1",
      name: "Cave",
      editor: { mode: "process", pid: 7, startedAt: "2024-01-01T00:00:00.000Z" },
    });
    const detail = formatProjectDetail({
      ...p,
      project: { ...p.project, description: "Main trunk", revision: "rev-3" },
    }).split("\n");
    expect(detail[1]).toBe("> Main trunk");
    expect(detail[2]).toBe("");
    expect(detail).toContain("- **Remote revision:** `rev-3`");
    expect(detail[detail.length - 1]).toBe("- **Editor:** process since 2024-01-01T00:00:00.000Z");
  });
});
