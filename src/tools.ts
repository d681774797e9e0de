import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { SyncError, toSyncError } from "./shared/errors.js";
import type { Engine } from "./services/engine.js";
import { formatLock, formatProjectDetail, formatSnapshot, formatStatus } from "./services/format.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

function text(body: string): ToolResult {
  return { content: [{ type: "text" as const, text: body }] };
}

/** Run a command and turn its outcome into a tool response. */
async function run(fn: () => Promise<string>): Promise<ToolResult> {
  try {
    return text(await fn());
  } catch (err) {
    const e = toSyncError(err);
    return { ...text(`❌ **${e.kind}**: ${e.message}`), isError: true };
  }
}

const projectId = z.string().uuid().describe("Project id (UUID) as shown by cavesync_status");

export function createMcpServer(engine: Engine): McpServer {
  const { manager } = engine;

  const server = new McpServer({
    name: "cavesync-mcp-server",
    version: "0.1.0",
  });

  function describeProject(id: string): string {
    const p = manager.snapshot().projects[id];
    return p ? `**${p.project.name}** is now ${formatStatus(p.status)}, ${formatLock(p.lock)}.` : "";
  }

  // ============================================================
  // TOOL: cavesync_status
  // ============================================================
  server.registerTool(
    "cavesync_status",
    {
      title: "Sync Status",
      description: `Show every project with its local status (not downloaded, up to date, local changes, newer revision on server), who holds its lock, and whether an editor session is running. Pass project_id for a single project's details.`,
      inputSchema: {
        project_id: projectId.optional(),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ project_id }) =>
      run(async () => {
        const snapshot = manager.snapshot();
        if (!project_id) return formatSnapshot(snapshot);
        const p = snapshot.projects[project_id];
        if (!p) throw new SyncError("NotFound", `Unknown project ${project_id}`);
        return formatProjectDetail(p);
      })
  );

  // ============================================================
  // TOOL: cavesync_login
  // ============================================================
  server.registerTool(
    "cavesync_login",
    {
      title: "Sign In",
      description: `Sign in to the project service with either a 40-character API token or an email and password. Only the resulting session token is saved (owner-readable only); passwords are never stored.`,
      inputSchema: {
        token: z.string().optional().describe("40-character hexadecimal API token"),
        email: z.string().optional().describe("Account email (with password)"),
        password: z.string().optional().describe("Account password (with email)"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ token, email, password }) =>
      run(async () => {
        await manager.login({ token, email, password });
        return `✅ Signed in.\n\n${formatSnapshot(manager.snapshot())}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_logout
  // ============================================================
  server.registerTool(
    "cavesync_logout",
    {
      title: "Sign Out",
      description: `Release every lock this session holds, forget the saved token and clear the project list.`,
      inputSchema: {},
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async () =>
      run(async () => {
        await manager.logout();
        return "👋 Signed out. Saved credentials removed.";
      })
  );

  // ============================================================
  // TOOL: cavesync_refresh
  // ============================================================
  server.registerTool(
    "cavesync_refresh",
    {
      title: "Refresh",
      description: `Fetch the project list and lock holders from the server now instead of waiting for the next poll, then recompute local statuses.`,
      inputSchema: {},
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async () =>
      run(async () => {
        await manager.refreshRemoteList();
        await manager.refreshLocal();
        return formatSnapshot(manager.snapshot());
      })
  );

  // ============================================================
  // TOOL: cavesync_open
  // ============================================================
  server.registerTool(
    "cavesync_open",
    {
      title: "Open Project",
      description: `Take the project's lock and start the survey editor on the working copy (or reveal the folder when no editor is configured). Fails with LockConflict if someone else is editing. The lock is released automatically when the editor exits.`,
      inputSchema: {
        project_id: projectId,
        launch: z.boolean().default(true).describe("Start the editor after taking the lock"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ project_id, launch }) =>
      run(async () => {
        await manager.open(project_id, { launch });
        return `🔒 Opened. ${describeProject(project_id)}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_download
  // ============================================================
  server.registerTool(
    "cavesync_download",
    {
      title: "Download Project",
      description: `Download the latest revision into both the index and the working copy. Refuses to replace local changes unless overwrite is true. Nothing on disk changes if the download fails.`,
      inputSchema: {
        project_id: projectId,
        overwrite: z.boolean().default(false).describe("Replace a working copy that has local changes"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ project_id, overwrite }) =>
      run(async () => {
        await manager.download(project_id, { overwrite });
        return `⬇️ Downloaded. ${describeProject(project_id)}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_commit
  // ============================================================
  server.registerTool(
    "cavesync_commit",
    {
      title: "Commit Project",
      description: `Upload the working copy as a new revision. Requires holding the project's lock (use cavesync_open). On failure nothing local changes and the lock is kept so you can retry.`,
      inputSchema: {
        project_id: projectId,
        message: z.string().min(1).max(1000).describe("Commit message"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async ({ project_id, message }) =>
      run(async () => {
        const result = await manager.commit(project_id, message);
        const head = result.outcome === "noChanges" ? "ℹ️ Server reported no changes." : "💾 Committed.";
        return `${head} ${describeProject(project_id)}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_discard
  // ============================================================
  server.registerTool(
    "cavesync_discard",
    {
      title: "Discard Local Changes",
      description: `Reset the working copy to the last synchronized snapshot. Local edits are lost.`,
      inputSchema: {
        project_id: projectId,
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ project_id }) =>
      run(async () => {
        await manager.discard(project_id);
        return `↩️ Changes discarded. ${describeProject(project_id)}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_release
  // ============================================================
  server.registerTool(
    "cavesync_release",
    {
      title: "Release Lock",
      description: `Release the project's lock so collaborators can edit it, and end the editor session. Safe to call when the lock is not held.`,
      inputSchema: {
        project_id: projectId,
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ project_id }) =>
      run(async () => {
        await manager.release(project_id);
        return `🔓 Released. ${describeProject(project_id)}`;
      })
  );

  // ============================================================
  // TOOL: cavesync_create
  // ============================================================
  server.registerTool(
    "cavesync_create",
    {
      title: "Create Project",
      description: `Create a new Compass project on the server and an empty local folder for it.`,
      inputSchema: {
        name: z.string().min(1).max(255).describe("Project name"),
        description: z.string().max(2000).default("").describe("Project description"),
        country: z.string().min(2).max(2).describe("ISO 3166 two-letter country code"),
        latitude: z.string().optional().describe("Decimal latitude"),
        longitude: z.string().optional().describe("Decimal longitude"),
        seed: z.string().max(100).optional().describe("Client request id, forwarded to the server"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async ({ name, description, country, latitude, longitude, seed }) =>
      run(async () => {
        const project = await manager.create(seed, { name, description, country, latitude, longitude });
        return `🆕 Created **${project.name}** (\`${project.id}\`).`;
      })
  );

  // ============================================================
  // TOOL: cavesync_reimport
  // ============================================================
  server.registerTool(
    "cavesync_reimport",
    {
      title: "Import Editor Project",
      description: `Replace the working copy with a Compass project (.mak) from elsewhere on disk plus the survey data files it references. Requires holding the lock; commit afterwards to publish it.`,
      inputSchema: {
        project_id: projectId,
        mak_path: z.string().min(1).describe("Absolute path to the .mak project file"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ project_id, mak_path }) =>
      run(async () => {
        const result = await manager.reimport(project_id, mak_path);
        return [
          `📥 Imported **${result.projectFile}** with ${result.surveyFiles.length} survey file(s).`,
          ...result.surveyFiles.map((f) => `- \`${f}\``),
          "",
          describeProject(project_id),
        ].join("\n");
      })
  );

  // ============================================================
  // TOOL: cavesync_help
  // ============================================================
  server.registerTool(
    "cavesync_help",
    {
      title: "Help",
      description: `Explain the cavesync workflow and list its tools.`,
      inputSchema: {},
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async () => {
      const help = [
        "# 🗺️ cavesync",
        "",
        "Keeps a local copy of each Compass survey project in sync with the project service.",
        "Each project has an `index/` (last synchronized revision) and a `working_copy/` (what the editor changes).",
        "",
        "## Workflow",
        "",
        "1. `cavesync_download` the project.",
        "2. `cavesync_open` it: takes the lock and starts the editor.",
        "3. Edit. Status flips to *local changes* on the next check.",
        "4. `cavesync_commit` with a message. Status returns to *up to date*.",
        "5. Close the editor. The lock is released automatically (or use `cavesync_release`).",
        "",
        "## Tools",
        "",
        "| Tool | What it does |",
        "|------|-------------|",
        "| `cavesync_status` | Projects, statuses, locks, editor sessions. |",
        "| `cavesync_login` / `cavesync_logout` | Start or end a session. |",
        "| `cavesync_refresh` | Poll the server now. |",
        "| `cavesync_open` | Take the lock and start the editor. |",
        "| `cavesync_download` | Fetch the latest revision. |",
        "| `cavesync_commit` | Upload the working copy. |",
        "| `cavesync_discard` | Reset the working copy to the index. |",
        "| `cavesync_release` | Give the lock back. |",
        "| `cavesync_create` | New project on the server. |",
        "| `cavesync_reimport` | Replace the working copy from a .mak file. |",
      ].join("\n");

      return { content: [{ type: "text" as const, text: help }] };
    }
  );

  return server;
}
