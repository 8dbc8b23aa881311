import pino from "pino";
import type { Logger } from "../../src/logging/logger.js";
import type { DecryptionFailure, RoomMessage } from "../../src/channels/adapter.js";
import type { BotConfig, MatrixConfig, VerseBotConfig } from "../../src/config/types.js";
import type { LookupResult, PassageProvider } from "../../src/providers/types.js";

export const ROOM_ID = "!bible:test.local";
export const OTHER_ROOM_ID = "!elsewhere:test.local";
export const BOT_USER_ID = "@versebot:test.local";
export const STARTED_AT = 1_700_000_000_000;

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeRoomMessage(overrides: Partial<RoomMessage> = {}): RoomMessage {
  return {
    kind: "room-message",
    roomId: ROOM_ID,
    senderId: "@alice:test.local",
    eventId: "$event-1",
    timestamp: STARTED_AT + 1_000,
    body: "John 3:16",
    ...overrides,
  };
}

export function makeDecryptionFailure(overrides: Partial<DecryptionFailure> = {}): DecryptionFailure {
  return {
    kind: "decryption-failure",
    roomId: ROOM_ID,
    eventId: "$encrypted-1",
    senderId: "@alice:test.local",
    algorithm: "m.megolm.v1.aes-sha2",
    sessionId: "session-abc",
    senderKey: "curve-key",
    ...overrides,
  };
}

export function makeConfig(
  overrides: { matrix?: Partial<MatrixConfig>; bot?: Partial<BotConfig> } = {},
): VerseBotConfig {
  return {
    matrix: {
      homeserver: "https://matrix.test.local",
      userId: BOT_USER_ID,
      rooms: [ROOM_ID],
      e2ee: { enabled: true },
      ...overrides.matrix,
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
      requestTimeoutMs: 1_000,
      ...overrides.bot,
    },
    apiKeys: {},
    logging: { level: "error" },
  };
}

/**
 * Serves canned results keyed by "<query>|<translation>"; anything else is
 * not found. `gate` holds every call until it resolves.
 */
export class FakeProvider implements PassageProvider {
  readonly id = "fake";
  readonly calls: Array<{ query: string; translation: string }> = [];
  gate: Promise<void> | undefined;

  constructor(
    readonly translations: readonly string[],
    private readonly results: Record<string, LookupResult> = {},
  ) {}

  async fetch(query: string, translation: string): Promise<LookupResult> {
    this.calls.push({ query, translation });
    if (this.gate) await this.gate;
    return this.results[`${query}|${translation}`] ?? { kind: "not-found" };
  }
}

export function found(text: string, reference: string): LookupResult {
  return { kind: "found", passage: { text, reference } };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
