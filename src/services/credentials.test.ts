import { describe, it, expect, afterEach } from "vitest";
import { existsSync, statSync, writeFileSync } from "fs";

import { CredentialStore, isValidEmail, isValidToken, parseLoginInput } from "./credentials.js";
import { credentialsFile } from "./paths.js";
import { cleanupTempDirs, makeTempDir } from "../test-utils/fixtures.js";

const TOKEN = "0123456789abcdef0123456789abcdef01234567";
const INSTANCE = "https://caves.example.org";

afterEach(cleanupTempDirs);

describe("isValidToken", () => {
  it.each([
    [TOKEN, true],
    [TOKEN.toUpperCase(), true],
    [TOKEN.slice(1), false],
    [`${TOKEN}8`, false],
    ["g".repeat(40), false],
  ])("%s -> %s", (token, expected) => {
    expect(isValidToken(token)).toBe(expected);
  });
});

describe("isValidEmail", () => {
  it.each([
    ["caver@example.com", true],
    ["a@b.co", true],
    ["no-at-sign.com", false],
    ["two@@example.com", false],
    ["@example.com", false],
    ["caver@localhost", false],
    ["caver@.com", false],
    ["caver@example.", false],
  ])("%s -> %s", (email, expected) => {
    expect(isValidEmail(email)).toBe(expected);
  });
});

describe("parseLoginInput", () => {
  it("accepts a token", () => {
    expect(parseLoginInput({ token: ` ${TOKEN} ` })).toEqual({ kind: "token", token: TOKEN });
  });

  it("accepts email and password", () => {
    expect(parseLoginInput({ email: "caver@example.com", password: "test-secret" })).toEqual({
      kind: "password",
      email: "caver@example.com",
      password: "test-secret",
    });
  });

  it.each([
    [{}, "Provide a token or an email and password"],
    [{ token: TOKEN, email: "caver@example.com" }, "Use either a token or email and password, not both"],
    [{ token: "xyz" }, "Token must be 40 hexadecimal characters"],
    [{ email: "nope", password: "test-secret" }, "Email address is not valid"],
    [{ password: "test-secret" }, "Email address is not valid"],
    [{ email: "caver@example.com" }, "Password must not be empty"],
  ])("rejects %o", (input, message) => {
    expect(() => parseLoginInput(input)).toThrowError(message);
  });
});

describe("CredentialStore", () => {
  it("returns null when nothing was saved", async () => {
    const store = new CredentialStore({ home: makeTempDir(), instance: INSTANCE });
    expect(await store.load()).toBeNull();
  });

  it("saves and loads the session token", async () => {
    const home = makeTempDir();
    const store = new CredentialStore({ home, instance: INSTANCE });
    await store.save({ instance: INSTANCE, token: TOKEN, user: "caver@example.com" });
    expect(await store.load()).toEqual({ instance: INSTANCE, token: TOKEN, user: "caver@example.com" });
    if (process.platform !== "win32") {
      expect(statSync(credentialsFile(home)).mode & 0o777).toBe(0o600);
    }
  });

  it("prefers a token from the environment", async () => {
    const home = makeTempDir();
    const store = new CredentialStore({ home, instance: INSTANCE, envToken: TOKEN });
    await new CredentialStore({ home, instance: INSTANCE }).save({ instance: INSTANCE, token: "f".repeat(40), user: "" });
    expect(await store.load()).toEqual({ instance: INSTANCE, token: TOKEN, user: "" });
  });

  it("ignores a malformed file", async () => {
    const home = makeTempDir();
    writeFileSync(credentialsFile(home), "{ not json");
    expect(await new CredentialStore({ home, instance: INSTANCE }).load()).toBeNull();
  });

  it("forget removes the file and is idempotent", async () => {
    const home = makeTempDir();
    const store = new CredentialStore({ home, instance: INSTANCE });
    await store.save({ instance: INSTANCE, token: TOKEN, user: "" });
    await store.forget();
    await store.forget();
    expect(existsSync(credentialsFile(home))).toBe(false);
  });
});
