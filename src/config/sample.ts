import type { VerseBotConfig } from "./types.js";

/** Written by `versebot config generate`. Placeholder rooms are skipped at join time. */
export const SAMPLE_CONFIG: VerseBotConfig = {
  matrix: {
    homeserver: "https://matrix.org",
    userId: "@versebot:matrix.org",
    rooms: ["!your_room_id:your_homeserver_domain", "#your_room_alias:your_homeserver_domain"],
    e2ee: { enabled: false },
  },
  bot: {
    defaultTranslation: "kjv",
    cacheEnabled: true,
    cacheMaxEntries: 128,
    cacheTtlMs: 12 * 3_600_000,
    maxMessageLength: 2000,
    splitMessageLength: 0,
    preservePoetryFormatting: false,
    detectReferencesAnywhere: false,
    unknownBookPolicy: "lenient",
    requestTimeoutMs: 10_000,
  },
  apiKeys: {},
  logging: { level: "info" },
};

export function renderSampleConfig(): string {
  return JSON.stringify(SAMPLE_CONFIG, null, 2) + "\n";
}

const SECRET_KEYS = new Set(["accessToken", "apiKey", "password", "token"]);

/** Deep copy with every API key and token replaced. */
export function redactConfig(config: VerseBotConfig): Record<string, unknown> {
  return redactValue(config, false);
}

function redactValue(value: object, secretBranch: boolean): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const secret = secretBranch || SECRET_KEYS.has(key);
    if (Array.isArray(child)) {
      out[key] = child;
    } else if (child !== null && typeof child === "object") {
      out[key] = redactValue(child, key === "apiKeys");
    } else if (secret && typeof child === "string") {
      out[key] = "***REDACTED***";
    } else {
      out[key] = child;
    }
  }
  return out;
}
