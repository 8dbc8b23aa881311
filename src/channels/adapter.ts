import type { TypedEventEmitter } from "../utils/typed-emitter.js";

export interface RoomMessage {
  readonly kind: "room-message";
  readonly roomId: string;
  readonly senderId: string;
  readonly eventId: string;
  /** Server-assigned origin timestamp, ms since epoch. */
  readonly timestamp: number;
  readonly body: string;
}

export interface Invite {
  readonly kind: "invite";
  readonly roomId: string;
}

export interface DecryptionFailure {
  readonly kind: "decryption-failure";
  readonly roomId: string;
  readonly eventId: string;
  readonly senderId: string;
  /** Wire content of the encrypted event, needed to build a key request. */
  readonly algorithm?: string;
  readonly sessionId?: string;
  readonly senderKey?: string;
}

export type InboundEvent = RoomMessage | Invite | DecryptionFailure;

export interface OutboundMessage {
  readonly body: string;
  /** Rendered as org.matrix.custom.html when present. */
  readonly html?: string;
}

/** Outcome of the transport's own key-request path. */
export type RoomKeyRequestResult = "requested" | "duplicate" | "unsupported";

/** userId -> deviceId ("*" for all devices) -> content */
export type ToDeviceMessages = Map<string, Map<string, Record<string, unknown>>>;

export type TransportEvents = {
  event: [event: InboundEvent];
  error: [err: Error];
  connected: [];
  disconnected: [reason?: string];
};

export class TransportSendFailure extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportSendFailure";
  }
}

/**
 * What the bot needs from a chat network. Implementations normalize their
 * native events into {@link InboundEvent} and emit them on `events`.
 */
export interface Transport {
  readonly id: string;
  readonly events: TypedEventEmitter<TransportEvents>;
  /** Own user id, known once started. */
  readonly userId: string;
  /** Whether end-to-end encryption was initialized. */
  readonly encryptionEnabled: boolean;

  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;

  joinRoom(roomId: string): Promise<void>;
  joinedRooms(): Promise<string[]>;
  /** Resolves "#alias:server" to a room id, or undefined when it does not exist. */
  resolveAlias(alias: string): Promise<string | undefined>;

  sendReaction(roomId: string, eventId: string, key: string): Promise<void>;
  sendMessage(roomId: string, message: OutboundMessage): Promise<{ eventId: string }>;
  sendToDevice(type: string, messages: ToDeviceMessages): Promise<void>;
  requestRoomKey?(failure: DecryptionFailure): Promise<RoomKeyRequestResult>;
}
