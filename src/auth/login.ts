import { cancel, confirm, intro, isCancel, outro, password, spinner, text } from "@clack/prompts";
import { AutoDiscovery, createClient } from "matrix-js-sdk";
import type { Logger } from "../logging/logger.js";
import type { Credential, CredentialStore } from "./credential-store.js";

export const DEVICE_DISPLAY_NAME = "versebot";

export type ClientConfigFinder = (
  domain: string,
) => Promise<{ "m.homeserver"?: { base_url?: string | null } }>;

/** "matrix.org" -> "https://matrix.org"; trailing slashes dropped. */
export function homeserverUrl(input: string): string {
  const trimmed = input.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function serverNameOf(input: string): string {
  return new URL(homeserverUrl(input)).host;
}

/** Accepts "alice", "@alice" or "@alice:server" and returns a full user id. */
export function normalizeUserId(username: string, serverName: string): string {
  const local = username.trim().replace(/^@/, "");
  return local.includes(":") ? `@${local}` : `@${local}:${serverName}`;
}

/**
 * Client base URL advertised by the server's .well-known, or the entered
 * URL when discovery fails or advertises nothing.
 */
export async function discoverHomeserver(
  input: string,
  logger: Logger,
  find: ClientConfigFinder = (domain) => AutoDiscovery.findClientConfig(domain),
): Promise<string> {
  const fallback = homeserverUrl(input);
  try {
    const config = await find(serverNameOf(input));
    const baseUrl = config["m.homeserver"]?.base_url;
    if (typeof baseUrl === "string" && baseUrl.length > 0) return baseUrl.replace(/\/+$/, "");
  } catch (err) {
    logger.debug({ err, server: input }, "Server discovery failed; using the entered URL");
  }
  return fallback;
}

function unlessCancelled<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Login cancelled.");
    throw new Error("Login cancelled");
  }
  return value;
}

/** Prompt for a homeserver and account, log in, and save the credential. */
export async function interactiveLogin(
  store: CredentialStore,
  logger: Logger,
): Promise<Credential | undefined> {
  intro("versebot login");

  const existing = await store.load();
  if (existing) {
    const again = unlessCancelled(
      await confirm({
        message: `Already logged in as ${existing.userId}. Log in again?`,
        initialValue: false,
      }),
    );
    if (!again) {
      outro("Keeping the existing login.");
      return undefined;
    }
  }

  const server = unlessCancelled(
    await text({
      message: "Homeserver",
      placeholder: "matrix.org",
      defaultValue: existing?.homeserver ?? "matrix.org",
    }),
  );
  const username = unlessCancelled(
    await text({
      message: "Username",
      placeholder: "@versebot:matrix.org",
      validate: (value) => (value.trim().length === 0 ? "A username is required" : undefined),
    }),
  );
  const secret = unlessCancelled(await password({ message: "Password" }));

  const progress = spinner();
  progress.start("Logging in");

  const baseUrl = await discoverHomeserver(server, logger);
  const userId = normalizeUserId(username, serverNameOf(server));
  // Same account: keep the device so encryption keys stay valid.
  const deviceId = existing?.userId === userId ? existing.deviceId : undefined;

  const client = createClient({ baseUrl });
  try {
    const response = await client.login("m.login.password", {
      identifier: { type: "m.id.user", user: userId },
      password: secret,
      device_id: deviceId,
      initial_device_display_name: DEVICE_DISPLAY_NAME,
    });

    const credential: Credential = {
      homeserver: baseUrl,
      userId: response.user_id,
      accessToken: response.access_token,
      deviceId: response.device_id,
    };
    await store.save(credential);
    progress.stop(`Logged in as ${credential.userId}`);
    outro(`Credentials saved to ${store.filePath}`);
    return credential;
  } catch (err) {
    progress.stop("Login failed");
    throw err;
  } finally {
    client.stopClient();
  }
}

export type SessionRevoker = (credential: Credential) => Promise<void>;

async function revokeOnServer(credential: Credential): Promise<void> {
  const client = createClient({
    baseUrl: credential.homeserver,
    accessToken: credential.accessToken,
    userId: credential.userId,
    deviceId: credential.deviceId,
  });
  await client.logout(true);
}

/**
 * Revoke the saved session (best-effort) and delete the local credential and
 * key store. Returns whether a credential was present.
 */
export async function logout(
  store: CredentialStore,
  logger: Logger,
  revoke: SessionRevoker = revokeOnServer,
): Promise<boolean> {
  const credential = await store.load();
  if (credential) {
    try {
      await revoke(credential);
      logger.info({ userId: credential.userId }, "Session revoked on the server");
    } catch (err) {
      logger.warn({ err }, "Could not revoke the session on the server; removing local credentials anyway");
    }
  }
  await store.delete();
  return credential !== undefined;
}
