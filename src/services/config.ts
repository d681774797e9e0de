import { z } from "zod";
import { homedir } from "os";
import { join } from "path";

// --- Schema ---

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z.object({
  home: z.string().min(1),
  instance: z.string().url().default("https://www.speleodb.org"),
  token: z.string().optional(),
  editorCommand: z.string().optional(),
  editorArgs: z.array(z.string()).default([]),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  remotePollMs: intFromEnv(120_000),
  localPollMs: intFromEnv(1_000),
  requestTimeoutMs: intFromEnv(10_000),
  transferTimeoutMs: intFromEnv(120_000),
  releaseRetries: z.coerce.number().int().min(0).default(1),
  dashboardPort: intFromEnv(3434),
});
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

// --- Loader ---

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function splitArgs(value: string | undefined): string[] | undefined {
  const raw = blankToUndefined(value);
  return raw ? raw.split(/\s+/).filter(Boolean) : undefined;
}

/** Build the runtime config from environment variables, then `overrides`. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConfigInput> = {}
): Config {
  const result = ConfigSchema.safeParse({
    home: blankToUndefined(env.CAVESYNC_HOME) ?? join(homedir(), ".cavesync"),
    instance: blankToUndefined(env.CAVESYNC_INSTANCE),
    token: blankToUndefined(env.CAVESYNC_TOKEN),
    editorCommand: blankToUndefined(env.CAVESYNC_EDITOR),
    editorArgs: splitArgs(env.CAVESYNC_EDITOR_ARGS),
    logLevel: blankToUndefined(env.CAVESYNC_LOG_LEVEL),
    remotePollMs: blankToUndefined(env.CAVESYNC_REMOTE_POLL_MS),
    localPollMs: blankToUndefined(env.CAVESYNC_LOCAL_POLL_MS),
    requestTimeoutMs: blankToUndefined(env.CAVESYNC_REQUEST_TIMEOUT_MS),
    transferTimeoutMs: blankToUndefined(env.CAVESYNC_TRANSFER_TIMEOUT_MS),
    releaseRetries: blankToUndefined(env.CAVESYNC_RELEASE_RETRIES),
    dashboardPort: blankToUndefined(env.CAVESYNC_DASHBOARD_PORT),
    ...overrides,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
