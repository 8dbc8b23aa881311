import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { rename } from "node:fs/promises";
import { CredentialStore, type Credential } from "../../src/auth/credential-store.js";
import { silentLogger } from "../helpers/fixtures.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

const credential: Credential = {
  homeserver: "https://matrix.test.local",
  userId: "@versebot:test.local",
  accessToken: "test-token",
  deviceId: "BOTDEVICE",
};

describe("CredentialStore", () => {
  let tempDir: string;
  let store: CredentialStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "versebot-creds-"));
    store = new CredentialStore(silentLogger(), {
      filePath: join(tempDir, "config", "credentials.json"),
      storeDir: join(tempDir, "config", "e2ee-store"),
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns undefined when nothing is saved", async () => {
    expect(await store.load()).toBeUndefined();
    expect(await store.exists()).toBe(false);
  });

  it("saves and loads a credential", async () => {
    await store.save(credential);
    expect(await store.load()).toEqual(credential);
    expect(await store.exists()).toBe(true);
  });

  it("writes the file readable by the owner only", async () => {
    await store.save(credential);
    expect(statSync(store.filePath).mode & 0o777).toBe(0o600);
  });

  it("leaves no temp files behind", async () => {
    await store.save(credential);
    await store.save({ ...credential, accessToken: "test-token-2" });
    const stored: unknown = JSON.parse(readFileSync(store.filePath, "utf-8"));
    expect(stored).toMatchObject({ accessToken: "test-token-2" });
    expect(readdirSync(join(tempDir, "config"))).toEqual(["credentials.json"]);
  });

  it("keeps the previous credential when a save fails", async () => {
    await store.save(credential);
    vi.mocked(rename).mockRejectedValueOnce(new Error("disk full"));

    await expect(store.save({ ...credential, accessToken: "test-token-2" })).rejects.toThrow("disk full");

    expect(readdirSync(join(tempDir, "config"))).toEqual(["credentials.json"]);
    expect(await store.load()).toEqual(credential);
  });

  it("rejects a malformed credential", async () => {
    await expect(store.save({ ...credential, userId: "versebot" })).rejects.toThrow();
    expect(await store.exists()).toBe(false);
  });

  it("treats an unparseable file as missing", async () => {
    await store.save(credential);
    writeFileSync(store.filePath, "{ not json");
    expect(await store.load()).toBeUndefined();
  });

  it("treats an incomplete file as missing", async () => {
    await store.save(credential);
    writeFileSync(store.filePath, JSON.stringify({ homeserver: "https://matrix.test.local" }));
    expect(await store.load()).toBeUndefined();
  });

  it("deletes the credential and the key store", async () => {
    await store.save(credential);
    mkdirSync(store.storeDir, { recursive: true });
    writeFileSync(join(store.storeDir, "keys"), "x");

    await store.delete();

    expect(existsSync(store.filePath)).toBe(false);
    expect(existsSync(store.storeDir)).toBe(false);
  });

  it("deletes quietly when nothing is saved", async () => {
    await expect(store.delete()).resolves.toBeUndefined();
  });
});
