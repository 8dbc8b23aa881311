import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  discoverHomeserver,
  homeserverUrl,
  logout,
  normalizeUserId,
  serverNameOf,
} from "../../src/auth/login.js";
import { CredentialStore } from "../../src/auth/credential-store.js";
import { silentLogger } from "../helpers/fixtures.js";

describe("homeserverUrl", () => {
  it("adds https and drops trailing slashes", () => {
    expect(homeserverUrl("matrix.org/")).toBe("https://matrix.org");
    expect(homeserverUrl(" http://localhost:8008// ")).toBe("http://localhost:8008");
  });
});

describe("serverNameOf", () => {
  it("returns the host including a port", () => {
    expect(serverNameOf("https://matrix.test.local:8448/")).toBe("matrix.test.local:8448");
    expect(serverNameOf("matrix.org")).toBe("matrix.org");
  });
});

describe("normalizeUserId", () => {
  it("qualifies a bare localpart", () => {
    expect(normalizeUserId("versebot", "matrix.org")).toBe("@versebot:matrix.org");
    expect(normalizeUserId("@versebot", "matrix.org")).toBe("@versebot:matrix.org");
  });

  it("keeps a full user id", () => {
    expect(normalizeUserId("@versebot:test.local", "matrix.org")).toBe("@versebot:test.local");
    expect(normalizeUserId("versebot:test.local", "matrix.org")).toBe("@versebot:test.local");
  });
});

describe("discoverHomeserver", () => {
  it("uses the advertised base URL", async () => {
    const find = vi.fn().mockResolvedValue({ "m.homeserver": { base_url: "https://synapse.test.local/" } });
    expect(await discoverHomeserver("test.local", silentLogger(), find)).toBe("https://synapse.test.local");
    expect(find).toHaveBeenCalledWith("test.local");
  });

  it("falls back to the entered URL when nothing is advertised", async () => {
    const find = vi.fn().mockResolvedValue({ "m.homeserver": { base_url: null } });
    expect(await discoverHomeserver("test.local", silentLogger(), find)).toBe("https://test.local");
  });

  it("falls back to the entered URL when discovery fails", async () => {
    const find = vi.fn().mockRejectedValue(new Error("no .well-known"));
    expect(await discoverHomeserver("http://localhost:8008", silentLogger(), find)).toBe("http://localhost:8008");
  });
});

describe("logout", () => {
  let tempDir: string;
  let store: CredentialStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "versebot-logout-"));
    store = new CredentialStore(silentLogger(), {
      filePath: join(tempDir, "credentials.json"),
      storeDir: join(tempDir, "e2ee-store"),
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("revokes the session and deletes the credential", async () => {
    await store.save({ homeserver: "https://matrix.test.local", userId: "@versebot:test.local", accessToken: "test-token" });
    const revoke = vi.fn().mockResolvedValue(undefined);

    expect(await logout(store, silentLogger(), revoke)).toBe(true);
    expect(revoke).toHaveBeenCalledWith(expect.objectContaining({ accessToken: "test-token" }));
    expect(await store.exists()).toBe(false);
  });

  it("deletes the credential even when revoking fails", async () => {
    await store.save({ homeserver: "https://matrix.test.local", userId: "@versebot:test.local", accessToken: "test-token" });
    const revoke = vi.fn().mockRejectedValue(new Error("offline"));

    expect(await logout(store, silentLogger(), revoke)).toBe(true);
    expect(await store.exists()).toBe(false);
  });

  it("reports when there was nothing to log out", async () => {
    const revoke = vi.fn();
    expect(await logout(store, silentLogger(), revoke)).toBe(false);
    expect(revoke).not.toHaveBeenCalled();
  });
});
