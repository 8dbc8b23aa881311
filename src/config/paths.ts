import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export const APP_NAME = "versebot";

export function getConfigDir(): string {
  if (process.env["VERSEBOT_HOME"]) return process.env["VERSEBOT_HOME"];
  const base = process.env["XDG_CONFIG_HOME"] ?? join(homedir(), ".config");
  return join(base, APP_NAME);
}

export function getConfigPath(): string {
  return process.env["VERSEBOT_CONFIG_PATH"] ?? "versebot.config.json";
}

export function getCredentialsPath(): string {
  return join(getConfigDir(), "credentials.json");
}

export function getStoreDir(): string {
  return join(getConfigDir(), "e2ee-store");
}

/** Create the directory (owner-only) if needed and return it. */
export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true, mode: 0o700 });
  return dirPath;
}
