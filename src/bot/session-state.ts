import type { Logger } from "../logging/logger.js";
import type { RoomMessage, Transport } from "../channels/adapter.js";

const PLACEHOLDER_MARKERS = ["example.org", "your_room_id", "your_homeserver_domain"];

export type RejectReason = "unauthorized-room" | "own-message" | "before-start";

type MessageOrigin = Pick<RoomMessage, "roomId" | "senderId" | "timestamp">;

export function isPlaceholderRoom(room: string): boolean {
  return PLACEHOLDER_MARKERS.some((marker) => room.includes(marker));
}

export function isRoomAlias(room: string): boolean {
  return room.startsWith("#");
}

export interface SessionStateOptions {
  /** Configured room ids and aliases, in config order. */
  readonly rooms: readonly string[];
  readonly selfId: string;
  /** Start watermark; events at or before it are historical. */
  readonly startedAt?: number;
}

/**
 * The bot's identity, its authorized rooms and the start watermark. Aliases
 * are resolved once by {@link resolveAliases}; every membership check after
 * that is against concrete room ids only.
 */
export class SessionState {
  readonly selfId: string;
  readonly startedAt: number;
  private readonly configured: readonly string[];
  private authorized = new Set<string>();

  constructor(
    opts: SessionStateOptions,
    private readonly transport: Transport,
    private readonly logger: Logger,
  ) {
    this.configured = opts.rooms;
    this.selfId = opts.selfId;
    this.startedAt = opts.startedAt ?? Date.now();
  }

  get rooms(): string[] {
    return [...this.authorized];
  }

  async resolveAliases(): Promise<string[]> {
    const resolved: string[] = [];

    for (const entry of this.configured) {
      if (!isRoomAlias(entry)) {
        resolved.push(entry);
        continue;
      }
      if (isPlaceholderRoom(entry)) {
        this.logger.debug({ room: entry }, "Skipping placeholder room alias");
        continue;
      }

      try {
        const roomId = await this.transport.resolveAlias(entry);
        if (roomId) {
          this.logger.info({ alias: entry, roomId }, "Resolved room alias");
          resolved.push(roomId);
        } else {
          this.logger.warn({ alias: entry }, "Could not resolve room alias; dropping it");
        }
      } catch (err) {
        this.logger.warn({ err, alias: entry }, "Could not resolve room alias; dropping it");
      }
    }

    this.authorized = new Set(resolved);
    return this.rooms;
  }

  /** Join every authorized room the transport is not already in. */
  async ensureJoined(): Promise<string[]> {
    const joined = new Set(await this.transport.joinedRooms());
    const newlyJoined: string[] = [];

    for (const roomId of this.authorized) {
      if (isPlaceholderRoom(roomId)) {
        this.logger.debug({ room: roomId }, "Skipping placeholder room id");
        continue;
      }
      if (joined.has(roomId)) {
        this.logger.debug({ room: roomId }, "Already in room");
        continue;
      }
      try {
        await this.transport.joinRoom(roomId);
        newlyJoined.push(roomId);
        this.logger.info({ room: roomId }, "Joined room");
      } catch (err) {
        this.logger.error({ err, room: roomId }, "Failed to join room");
      }
    }

    return newlyJoined;
  }

  isAuthorized(roomId: string): boolean {
    return this.authorized.has(roomId);
  }

  accepts(msg: MessageOrigin): boolean {
    return this.rejectReason(msg) === undefined;
  }

  /** Why a message is dropped before parsing, or undefined when it is not. */
  rejectReason(msg: MessageOrigin): RejectReason | undefined {
    if (!this.isAuthorized(msg.roomId)) return "unauthorized-room";
    if (msg.senderId === this.selfId) return "own-message";
    if (msg.timestamp <= this.startedAt) return "before-start";
    return undefined;
  }
}
