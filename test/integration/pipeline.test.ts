import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { CredentialStore } from "../../src/auth/credential-store.js";
import { startBot, type BotContext } from "../../src/gateway/lifecycle.js";
import type { FetchFn } from "../../src/providers/types.js";
import { MESSAGE_SUFFIX } from "../../src/scripture/format.js";
import { MockTransport } from "../helpers/mock-transport.js";
import {
  BOT_USER_ID,
  OTHER_ROOM_ID,
  ROOM_ID,
  jsonResponse,
  makeConfig,
  makeDecryptionFailure,
  makeRoomMessage,
  silentLogger,
} from "../helpers/fixtures.js";

/** Delivers a live message while startup is still joining rooms. */
class EagerTransport extends MockTransport {
  override async joinRoom(roomId: string): Promise<void> {
    await super.joinRoom(roomId);
    this.events.emit("event", makeRoomMessage({ eventId: "$during-join", timestamp: Date.now() + 1 }));
  }
}

describe("Integration: scripture pipeline", () => {
  let tempDir: string;
  let transport: MockTransport;
  let fetchImpl: Mock<FetchFn>;
  let ctx: BotContext | undefined;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "versebot-integration-"));
    transport = new MockTransport(BOT_USER_ID);
    transport.aliases.set("#bible:test.local", ROOM_ID);
    fetchImpl = vi.fn<FetchFn>(async (input) => {
      const url = String(input);
      if (url === "https://bible-api.com/John%203:16?translation=kjv") {
        return jsonResponse({ reference: "John 3:16", text: "For God so loved the world,\n" });
      }
      return jsonResponse({ error: "not found" }, 404);
    });
  });

  afterEach(async () => {
    await ctx?.shutdown();
    ctx = undefined;
    rmSync(tempDir, { recursive: true, force: true });
  });

  async function start(): Promise<BotContext> {
    ctx = await startBot({
      config: makeConfig({ matrix: { rooms: ["#bible:test.local"] } }),
      logger: silentLogger(),
      credentialStore: new CredentialStore(silentLogger(), {
        filePath: join(tempDir, "credentials.json"),
        storeDir: join(tempDir, "e2ee-store"),
      }),
      createTransport: () => transport,
      fetchImpl,
      env: { MATRIX_ACCESS_TOKEN: "test-token" },
      handleSignals: false,
    });
    return ctx;
  }

  it("resolves aliases and joins configured rooms on start", async () => {
    const bot = await start();

    expect(bot.state.rooms).toEqual([ROOM_ID]);
    expect(transport.callsTo("joinRoom").map((c) => c.args)).toEqual([[ROOM_ID]]);
  });

  it("answers a reference with a reaction and the passage", async () => {
    await start();

    transport.events.emit("event", makeRoomMessage({ timestamp: Date.now() + 60_000 }));

    await vi.waitFor(() => expect(transport.callsTo("sendMessage")).toHaveLength(1));
    expect(transport.callsTo("sendReaction")).toHaveLength(1);
    expect(transport.sentBodies(ROOM_ID)).toEqual([`For God so loved the world, - John 3:16${MESSAGE_SUFFIX}`]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("answers messages that arrive while rooms are being joined", async () => {
    transport = new EagerTransport(BOT_USER_ID);
    transport.aliases.set("#bible:test.local", ROOM_ID);

    await start();

    await vi.waitFor(() => expect(transport.callsTo("sendMessage")).toHaveLength(1));
    expect(transport.callsTo("sendReaction").map((c) => c.args[1])).toEqual(["$during-join"]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("stays silent in rooms it was not configured for", async () => {
    const bot = await start();

    const outcome = await bot.dispatcher.handleEvent(
      makeRoomMessage({ roomId: OTHER_ROOM_ID, timestamp: Date.now() + 60_000 }),
    );

    expect(outcome).toEqual({ kind: "discarded", reason: "unauthorized-room" });
    expect(transport.callsTo("sendMessage")).toHaveLength(0);
  });

  it("ignores messages sent before it started", async () => {
    const bot = await start();

    const outcome = await bot.dispatcher.handleEvent(makeRoomMessage({ timestamp: bot.state.startedAt }));

    expect(outcome).toEqual({ kind: "discarded", reason: "before-start" });
  });

  it("requests the room key for an undecryptable message", async () => {
    await start();

    transport.events.emit("event", makeDecryptionFailure());

    await vi.waitFor(() => expect(transport.callsTo("sendToDevice")).toHaveLength(1));
    expect(transport.callsTo("sendToDevice")[0]?.args[0]).toBe("m.room_key_request");
  });

  it("stops the transport once on repeated shutdown", async () => {
    const bot = await start();

    await Promise.all([bot.shutdown(), bot.shutdown()]);
    await bot.stopped;

    expect(transport.callsTo("stop")).toHaveLength(1);
  });

  it("stops listening to the transport after shutdown", async () => {
    const bot = await start();

    await bot.shutdown();

    expect(transport.events.emit("event", makeRoomMessage({ timestamp: Date.now() + 60_000 }))).toBe(false);
    expect(transport.events.emit("disconnected", "late")).toBe(false);
  });

  it("stops listening when the transport fails to start", async () => {
    transport.failures.set("start", new Error("sync failed"));

    await expect(start()).rejects.toThrow("sync failed");

    expect(transport.events.emit("event", makeRoomMessage())).toBe(false);
  });

  it("refuses to start without credentials", async () => {
    await expect(
      startBot({
        config: makeConfig(),
        logger: silentLogger(),
        credentialStore: new CredentialStore(silentLogger(), { filePath: join(tempDir, "none.json") }),
        createTransport: () => transport,
        env: {},
        handleSignals: false,
      }),
    ).rejects.toThrow("No Matrix credentials found");
    expect(transport.callsTo("start")).toHaveLength(0);
  });

  it("refuses a default translation no provider serves", async () => {
    await expect(
      startBot({
        config: makeConfig({ bot: { defaultTranslation: "niv" } }),
        logger: silentLogger(),
        createTransport: () => transport,
        env: { MATRIX_ACCESS_TOKEN: "test-token" },
        handleSignals: false,
      }),
    ).rejects.toThrow('Unsupported default translation "niv"');
  });
});
