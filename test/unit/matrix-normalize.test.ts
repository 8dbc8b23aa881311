import { describe, it, expect } from "vitest";
import {
  type MatrixEventLike,
  normalizeDecryptionFailure,
  normalizeMatrixMessage,
} from "../../src/channels/matrix/normalize.js";

interface FakeEventInit {
  type?: string;
  content?: Record<string, unknown>;
  wire?: Record<string, unknown>;
  sender?: string;
  id?: string;
  roomId?: string;
  ts?: number;
}

function makeEvent(init: FakeEventInit = {}): MatrixEventLike {
  const content = init.content ?? { msgtype: "m.text", body: "John 3:16" };
  return {
    getType: () => init.type ?? "m.room.message",
    getContent: () => content,
    getWireContent: () => init.wire ?? content,
    getSender: () => ("sender" in init ? init.sender : "@alice:test.local"),
    getId: () => ("id" in init ? init.id : "$event-1"),
    getRoomId: () => ("roomId" in init ? init.roomId : "!bible:test.local"),
    getTs: () => init.ts ?? 1_700_000_001_000,
  };
}

describe("normalizeMatrixMessage", () => {
  it("normalizes a text message", () => {
    expect(normalizeMatrixMessage(makeEvent())).toEqual({
      kind: "room-message",
      roomId: "!bible:test.local",
      senderId: "@alice:test.local",
      eventId: "$event-1",
      timestamp: 1_700_000_001_000,
      body: "John 3:16",
    });
  });

  it("ignores other event types", () => {
    expect(normalizeMatrixMessage(makeEvent({ type: "m.room.member" }))).toBeNull();
  });

  it("ignores notices and media", () => {
    expect(normalizeMatrixMessage(makeEvent({ content: { msgtype: "m.notice", body: "hi" } }))).toBeNull();
    expect(normalizeMatrixMessage(makeEvent({ content: { msgtype: "m.image", body: "x.png" } }))).toBeNull();
  });

  it("ignores edits", () => {
    const content = { msgtype: "m.text", body: "* John 3:17", "m.new_content": { msgtype: "m.text", body: "John 3:17" } };
    expect(normalizeMatrixMessage(makeEvent({ content }))).toBeNull();
  });

  it("requires a body and identifiers", () => {
    expect(normalizeMatrixMessage(makeEvent({ content: { msgtype: "m.text" } }))).toBeNull();
    expect(normalizeMatrixMessage(makeEvent({ sender: undefined }))).toBeNull();
    expect(normalizeMatrixMessage(makeEvent({ id: undefined }))).toBeNull();
    expect(normalizeMatrixMessage(makeEvent({ roomId: undefined }))).toBeNull();
  });
});

describe("normalizeDecryptionFailure", () => {
  it("reads the session fields from the encrypted wire content", () => {
    const event = makeEvent({
      type: "m.room.encrypted",
      content: { msgtype: "m.bad.encrypted", body: "** Unable to decrypt **" },
      wire: {
        algorithm: "m.megolm.v1.aes-sha2",
        session_id: "session-abc",
        sender_key: "curve-key",
        ciphertext: "opaque",
      },
    });

    expect(normalizeDecryptionFailure(event)).toEqual({
      kind: "decryption-failure",
      roomId: "!bible:test.local",
      senderId: "@alice:test.local",
      eventId: "$event-1",
      algorithm: "m.megolm.v1.aes-sha2",
      sessionId: "session-abc",
      senderKey: "curve-key",
    });
  });

  it("leaves missing session fields undefined", () => {
    const failure = normalizeDecryptionFailure(makeEvent({ wire: { algorithm: "m.megolm.v1.aes-sha2" } }));
    expect(failure?.sessionId).toBeUndefined();
    expect(failure?.senderKey).toBeUndefined();
  });

  it("needs the room, sender and event id", () => {
    expect(normalizeDecryptionFailure(makeEvent({ roomId: undefined }))).toBeNull();
  });
});
