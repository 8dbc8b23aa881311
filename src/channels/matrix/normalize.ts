import type { DecryptionFailure, RoomMessage } from "../adapter.js";

/** The slice of a matrix-js-sdk MatrixEvent the normalizers read. */
export interface MatrixEventLike {
  getType(): string;
  getContent(): Record<string, unknown>;
  getWireContent(): Record<string, unknown>;
  getSender(): string | undefined;
  getId(): string | undefined;
  getRoomId(): string | undefined;
  getTs(): number;
}

function stringField(content: Record<string, unknown>, key: string): string | undefined {
  const value = content[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Plain-text room messages only; edits, notices and media are ignored. */
export function normalizeMatrixMessage(event: MatrixEventLike): RoomMessage | null {
  if (event.getType() !== "m.room.message") return null;

  const content = event.getContent();
  if (content["msgtype"] !== "m.text") return null;
  if (content["m.new_content"] !== undefined) return null;

  const body = content["body"];
  const roomId = event.getRoomId();
  const senderId = event.getSender();
  const eventId = event.getId();
  if (typeof body !== "string" || !roomId || !senderId || !eventId) return null;

  return {
    kind: "room-message",
    roomId,
    senderId,
    eventId,
    timestamp: event.getTs(),
    body,
  };
}

export function normalizeDecryptionFailure(event: MatrixEventLike): DecryptionFailure | null {
  const roomId = event.getRoomId();
  const senderId = event.getSender();
  const eventId = event.getId();
  if (!roomId || !senderId || !eventId) return null;

  const wire = event.getWireContent();
  return {
    kind: "decryption-failure",
    roomId,
    senderId,
    eventId,
    algorithm: stringField(wire, "algorithm"),
    sessionId: stringField(wire, "session_id"),
    senderKey: stringField(wire, "sender_key"),
  };
}
