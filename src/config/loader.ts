import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { VerseBotConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";
import { errorCode, errorMessage } from "../utils/errors.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** Environment variables win over values written in the config file. */
export function applyEnvOverrides(
  config: VerseBotConfig,
  env: NodeJS.ProcessEnv = process.env,
): VerseBotConfig {
  const esv = env["ESV_API_KEY"];
  if (!esv) return config;
  return { ...config, apiKeys: { ...config.apiKeys, esv } };
}

export function formatConfigError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  return errorMessage(err);
}

export function loadConfig(path?: string): VerseBotConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new Error(
        `Config file not found: ${configPath} (run "versebot config generate" to create one)`,
      );
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw: unknown = JSON.parse(substituted);
  return applyEnvOverrides(parseConfig(raw));
}
