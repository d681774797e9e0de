import type {
  AppSnapshot,
  LocalProjectStatus,
  LockState,
  ProjectSnapshot,
} from "../shared/types.js";

const STATUS_ICON: Record<LocalProjectStatus, string> = {
  RemoteOnly: "☁️",
  EmptyLocal: "📂",
  UpToDate: "✅",
  OutOfDate: "⬇️",
  Dirty: "✏️",
  DirtyAndOutOfDate: "⚠️",
};

const STATUS_TEXT: Record<LocalProjectStatus, string> = {
  RemoteOnly: "not downloaded",
  EmptyLocal: "empty local folder",
  UpToDate: "up to date",
  OutOfDate: "newer revision on server",
  Dirty: "local changes",
  DirtyAndOutOfDate: "local changes, newer revision on server",
};

export function formatStatus(status: LocalProjectStatus): string {
  return `${STATUS_ICON[status]} ${STATUS_TEXT[status]}`;
}

export function formatLock(lock: LockState): string {
  switch (lock.kind) {
    case "unlocked":
      return "🔓 unlocked";
    case "lockedByMe":
      return lock.token ? "🔒 locked by you" : "🔒 locked by you (recovered)";
    case "lockedByOther":
      return `⛔ locked by ${lock.holder}`;
  }
}

export function formatProjectLine(p: ProjectSnapshot, active: boolean): string {
  const parts = [
    `**${p.project.name}**${active ? " ⭐" : ""}`,
    formatStatus(p.status),
    formatLock(p.lock),
  ];
  if (p.busy) parts.push(`⏳ ${p.busy}`);
  if (p.editor) parts.push(p.editor.mode === "process" ? "🖥️ editor running" : "🖥️ editing (manual)");
  return `- ${parts.join(" · ")}\n  \`${p.project.id}\``;
}

export function formatSnapshot(snapshot: AppSnapshot): string {
  const lines: string[] = [];

  lines.push(`# 🗺️ cavesync`);
  if (snapshot.user) {
    lines.push(`Signed in as **${snapshot.user.email || "token user"}** on ${snapshot.user.instance}`);
  } else {
    lines.push("Not signed in. Use `cavesync_login`.");
  }
  lines.push(`State: \`${snapshot.loadingState}\``);
  lines.push("");

  if (snapshot.transientError) {
    lines.push(`> ⚠️ ${snapshot.transientError}`);
    lines.push("");
  }

  for (const notice of snapshot.lockLost) {
    const name = snapshot.projects[notice.projectId]?.project.name ?? notice.projectId;
    lines.push(`> 🔓 Lock on **${name}** was cleared on the server${notice.holder ? ` (now held by ${notice.holder})` : ""}. Re-open before committing.`);
  }
  if (snapshot.lockLost.length > 0) lines.push("");

  const projects = Object.values(snapshot.projects).sort((a, b) =>
    a.project.name.localeCompare(b.project.name)
  );
  if (projects.length === 0) {
    lines.push("_No projects._");
  } else {
    lines.push(`## Projects (${projects.length})`);
    for (const p of projects) {
      lines.push(formatProjectLine(p, p.project.id === snapshot.activeProjectId));
    }
  }

  return lines.join("\n");
}

export function formatProjectDetail(p: ProjectSnapshot): string {
  const lines = [
    `# ${p.project.name}`,
    p.project.description ? `> ${p.project.description}` : "",
    "",
    `- **Id:** \`${p.project.id}\``,
    `- **Status:** ${formatStatus(p.status)}`,
    `- **Lock:** ${formatLock(p.lock)}`,
    `- **Remote revision:** ${p.project.revision ? `\`${p.project.revision}\`` : "none"}`,
    `- **Permission:** ${p.project.permission}`,
  ];
  if (p.editor) lines.push(`- **Editor:** ${p.editor.mode} since ${p.editor.startedAt}`);
  return lines.filter((l, i) => l !== "" || i === 2).join("\n");
}
