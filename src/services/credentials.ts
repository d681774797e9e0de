import { readFile, rm } from "fs/promises";
import { z } from "zod";

import { SyncError } from "../shared/errors.js";
import { atomicWrite, isErrno } from "./atomic.js";
import { credentialsFile } from "./paths.js";
import type { Credentials } from "./remote.js";
import { getLogger } from "./logger.js";

const log = getLogger("credentials");

// --- Validation ---

const TOKEN_RE = /^[0-9a-fA-F]{40}$/;

export function isValidToken(token: string): boolean {
  return TOKEN_RE.test(token);
}

/** One `@`, a non-empty local part, and a dot inside the domain. */
export function isValidEmail(email: string): boolean {
  const parts = email.split("@");
  if (parts.length !== 2) return false;
  const [local, domain] = parts;
  if (!local) return false;
  const dot = domain.indexOf(".");
  return dot > 0 && dot < domain.length - 1;
}

export interface LoginInput {
  token?: string;
  email?: string;
  password?: string;
}

/** Exactly one sign-in method: a 40-character hex token, or email plus password. */
export function parseLoginInput(input: LoginInput): Credentials {
  const token = input.token?.trim() || undefined;
  const email = input.email?.trim() || undefined;
  const password = input.password || undefined;

  if (token && (email || password)) {
    throw new SyncError("Precondition", "Use either a token or email and password, not both");
  }
  if (token) {
    if (!isValidToken(token)) {
      throw new SyncError("Precondition", "Token must be 40 hexadecimal characters");
    }
    return { kind: "token", token };
  }
  if (!email && !password) {
    throw new SyncError("Precondition", "Provide a token or an email and password");
  }
  if (!email || !isValidEmail(email)) {
    throw new SyncError("Precondition", "Email address is not valid");
  }
  if (!password) {
    throw new SyncError("Precondition", "Password must not be empty");
  }
  return { kind: "password", email, password };
}

// --- Persistence ---

const SavedCredentialsSchema = z.object({
  instance: z.string().url(),
  token: z.string().min(1),
  user: z.string().default(""),
});
export type SavedCredentials = z.infer<typeof SavedCredentialsSchema>;

export interface CredentialStoreOptions {
  home: string;
  instance: string;
  /** Token from the environment; wins over the saved file. */
  envToken?: string;
}

/** Only the session token is ever written to disk, with owner-only permissions. */
export class CredentialStore {
  constructor(private readonly opts: CredentialStoreOptions) {}

  get path(): string {
    return credentialsFile(this.opts.home);
  }

  async load(): Promise<SavedCredentials | null> {
    if (this.opts.envToken) {
      log.info("Using token from environment");
      return { instance: this.opts.instance, token: this.opts.envToken, user: "" };
    }

    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) return null;
      throw new SyncError("IoError", `Cannot read ${this.path}`, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      data = undefined;
    }
    const parsed = SavedCredentialsSchema.safeParse(data);
    if (parsed.success) return parsed.data;
    log.warn("Saved credentials are malformed, ignoring them", { path: this.path });
    return null;
  }

  async save(credentials: SavedCredentials): Promise<void> {
    await atomicWrite(this.path, JSON.stringify(credentials, null, 2) + "\n", 0o600);
    log.info("Credentials saved", { path: this.path });
  }

  async forget(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
