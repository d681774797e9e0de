import { z } from "zod";
import { randomUUID } from "crypto";

import type { NewProjectMetadata, Project } from "../shared/types.js";
import { SyncError, errorMessage, type SyncErrorKind } from "../shared/errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("remote");

// --- Interface ---

export type Credentials =
  | { kind: "token"; token: string }
  | { kind: "password"; email: string; password: string };

export interface AuthResult {
  token: string;
  user: string;
}

export type UploadOutcome = "saved" | "noChanges";

/**
 * The remote project-versioning service. Every method rejects with a SyncError:
 * `NetworkError` for transport failures and timeouts, `Unauthorized`, `NotFound`,
 * and `LockConflict` from `acquireLock` when someone else holds the mutex.
 */
export interface RemoteClient {
  authenticate(credentials: Credentials): Promise<AuthResult>;
  signOut(): void;
  fetchProjectList(): Promise<Project[]>;
  fetchProject(projectId: string): Promise<Project>;
  createProject(metadata: NewProjectMetadata, seed?: string): Promise<Project>;
  uploadProject(projectId: string, archive: Uint8Array, message: string): Promise<UploadOutcome>;
  /** Null when the project has never been committed to. */
  downloadProject(projectId: string): Promise<Uint8Array | null>;
  acquireLock(projectId: string): Promise<string>;
  releaseLock(projectId: string, token: string | null): Promise<void>;
}

// --- Wire schemas ---

const ActiveMutexSchema = z.object({
  user: z.string(),
  creation_date: z.string(),
  modified_date: z.string(),
});

const CommitInfoSchema = z.object({
  id: z.string(),
  message: z.string(),
  author_name: z.string(),
  commit_date: z.string().nullish(),
  dt_since: z.string(),
});

export const ProjectInfoSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  description: z.string().default(""),
  is_active: z.boolean().default(true),
  permission: z.string(),
  active_mutex: ActiveMutexSchema.nullish(),
  country: z.string().default(""),
  created_by: z.string().default(""),
  creation_date: z.string().default(""),
  modified_date: z.string().default(""),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  fork_from: z.string().nullish(),
  visibility: z.string().default("PRIVATE"),
  exclude_geojson: z.boolean().default(false),
  latest_commit: CommitInfoSchema.nullish(),
  type: z.enum(["COMPASS", "ARIANE"]),
});
export type ProjectInfo = z.infer<typeof ProjectInfoSchema>;

const AuthResponseSchema = z.object({ token: z.string(), user: z.string() });
const ProjectResponseSchema = z.object({ data: ProjectInfoSchema });
const ProjectListResponseSchema = z.object({ data: z.array(z.unknown()) });

export function toProject(info: ProjectInfo): Project {
  return {
    id: info.id,
    name: info.name,
    description: info.description,
    kind: info.type,
    revision: info.latest_commit?.id ?? null,
    lockHolder: info.active_mutex?.user ?? null,
    permission: info.permission,
  };
}

export function statusErrorKind(status: number): SyncErrorKind {
  if (status === 401 || status === 403) return "Unauthorized";
  if (status === 404) return "NotFound";
  if (status === 409 || status === 423) return "LockConflict";
  if (status >= 500 || status === 408 || status === 429) return "NetworkError";
  return "SerializationError";
}

// --- HTTP client ---

export interface HttpRemoteOptions {
  instance: string;
  requestTimeoutMs: number;
  transferTimeoutMs: number;
  fetch?: typeof fetch;
}

/** REST client for the project service (`Authorization: Token <token>`). */
export class HttpRemoteClient implements RemoteClient {
  private token: string | null = null;
  private readonly base: URL;
  private readonly doFetch: typeof fetch;

  constructor(private readonly opts: HttpRemoteOptions) {
    this.base = new URL(opts.instance.endsWith("/") ? opts.instance : `${opts.instance}/`);
    this.doFetch = opts.fetch ?? fetch;
  }

  private url(route: string): URL {
    return new URL(route, this.base);
  }

  private authHeader(): Record<string, string> {
    if (!this.token) throw new SyncError("Unauthorized", "Not signed in");
    return { Authorization: `Token ${this.token}` };
  }

  private async send(
    what: string,
    url: URL,
    init: RequestInit,
    timeoutMs = this.opts.requestTimeoutMs
  ): Promise<Response> {
    let res: Response;
    try {
      res = await this.doFetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      throw new SyncError(
        "NetworkError",
        timedOut ? `${what} timed out after ${timeoutMs}ms` : `${what} failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }
    log.debug(`${init.method ?? "GET"} ${url.pathname} -> ${res.status}`);
    return res;
  }

  private fail(what: string, res: Response): SyncError {
    return new SyncError(statusErrorKind(res.status), `${what} failed with status ${res.status}`);
  }

  private async json<T>(what: string, res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new SyncError("SerializationError", `${what}: response is not JSON`, { cause: err });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SyncError("SerializationError", `${what}: unexpected response (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }
    return parsed.data;
  }

  async authenticate(credentials: Credentials): Promise<AuthResult> {
    const url = this.url("api/v1/user/auth-token/");
    const res =
      credentials.kind === "token"
        ? await this.send("Sign in", url, {
            method: "GET",
            headers: { Authorization: `Token ${credentials.token}` },
          })
        : await this.send("Sign in", url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ email: credentials.email, password: credentials.password }),
          });
    if (!res.ok) {
      // Wrong email/password comes back as 400.
      if (res.status === 400) throw new SyncError("Unauthorized", "Sign in rejected: check your credentials");
      throw this.fail("Sign in", res);
    }
    const auth = await this.json("Sign in", res, AuthResponseSchema);
    this.token = auth.token;
    return auth;
  }

  signOut(): void {
    this.token = null;
  }

  async fetchProjectList(): Promise<Project[]> {
    const res = await this.send("Project list", this.url("api/v1/projects/"), {
      headers: this.authHeader(),
    });
    if (!res.ok) throw this.fail("Project list", res);
    const { data } = await this.json("Project list", res, ProjectListResponseSchema);

    const projects: Project[] = [];
    for (const entry of data) {
      const parsed = ProjectInfoSchema.safeParse(entry);
      if (!parsed.success) {
        log.warn("Skipping unreadable project entry", { issue: parsed.error.issues[0]?.message });
        continue;
      }
      if (parsed.data.type === "COMPASS") projects.push(toProject(parsed.data));
    }
    return projects;
  }

  async fetchProject(projectId: string): Promise<Project> {
    const res = await this.send("Project info", this.url(`api/v1/projects/${projectId}/`), {
      headers: this.authHeader(),
    });
    if (!res.ok) throw this.fail("Project info", res);
    return toProject((await this.json("Project info", res, ProjectResponseSchema)).data);
  }

  async createProject(metadata: NewProjectMetadata, seed?: string): Promise<Project> {
    const body: Record<string, string> = {
      name: metadata.name,
      description: metadata.description,
      country: metadata.country,
      type: "COMPASS",
    };
    if (metadata.latitude) body.latitude = metadata.latitude;
    if (metadata.longitude) body.longitude = metadata.longitude;

    const headers: Record<string, string> = { ...this.authHeader(), "Content-Type": "application/json" };
    if (seed) headers["X-Request-Id"] = seed;

    const res = await this.send("Create project", this.url("api/v1/projects/"), {
      method: "POST",
      headers,
      body: JSON.stringify(body),
    });
    if (!res.ok) throw this.fail("Create project", res);
    return toProject((await this.json("Create project", res, ProjectResponseSchema)).data);
  }

  async uploadProject(projectId: string, archive: Uint8Array, message: string): Promise<UploadOutcome> {
    const form = new FormData();
    form.append("message", message);
    form.append("artifact", new Blob([archive], { type: "application/zip" }), "project.zip");

    const res = await this.send(
      "Upload",
      this.url(`api/v1/projects/${projectId}/upload/compass_zip/`),
      { method: "PUT", headers: this.authHeader(), body: form },
      this.opts.transferTimeoutMs
    );
    if (res.status === 304) return "noChanges";
    if (!res.ok) throw this.fail("Upload", res);
    return "saved";
  }

  async downloadProject(projectId: string): Promise<Uint8Array | null> {
    const res = await this.send(
      "Download",
      this.url(`api/v1/projects/${projectId}/download/compass_zip/`),
      { headers: this.authHeader() },
      this.opts.transferTimeoutMs
    );
    // 422: the project exists but has no Compass data yet.
    if (res.status === 422) return null;
    if (!res.ok) throw this.fail("Download", res);
    try {
      return new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      throw new SyncError("NetworkError", `Download interrupted: ${errorMessage(err)}`, { cause: err });
    }
  }

  async acquireLock(projectId: string): Promise<string> {
    const res = await this.send("Acquire lock", this.url(`api/v1/projects/${projectId}/acquire/`), {
      method: "POST",
      headers: this.authHeader(),
    });
    if (!res.ok) throw this.fail("Acquire lock", res);

    // The server keys the mutex on the user; its creation stamp serves as our token.
    const parsed = ProjectResponseSchema.safeParse(await res.json().catch(() => null));
    return parsed.success && parsed.data.data.active_mutex
      ? parsed.data.data.active_mutex.creation_date
      : randomUUID();
  }

  async releaseLock(projectId: string, _token: string | null): Promise<void> {
    const res = await this.send("Release lock", this.url(`api/v1/projects/${projectId}/release/`), {
      method: "POST",
      headers: this.authHeader(),
    });
    if (!res.ok) throw this.fail("Release lock", res);
  }
}
