import {
  ClientEvent,
  type MatrixClient,
  MatrixError,
  type MatrixEvent,
  MatrixEventEvent,
  type Room,
  RoomEvent,
  SyncState,
  createClient,
} from "matrix-js-sdk";
import type { Logger } from "../../logging/logger.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import type {
  OutboundMessage,
  ToDeviceMessages,
  Transport,
  TransportEvents,
} from "../adapter.js";
import { normalizeDecryptionFailure, normalizeMatrixMessage } from "./normalize.js";
import * as send from "./send.js";

const INITIAL_SYNC_LIMIT = 1;

export interface MatrixTransportOptions {
  readonly homeserver: string;
  readonly userId: string;
  readonly accessToken: string;
  readonly deviceId?: string;
  readonly e2ee: boolean;
  readonly logger: Logger;
}

export class MatrixTransport implements Transport {
  readonly id = "matrix";
  readonly events = new TypedEventEmitter<TransportEvents>();

  private client: MatrixClient | null = null;
  private cryptoReady = false;
  private readonly logger: Logger;

  constructor(private readonly opts: MatrixTransportOptions) {
    this.logger = opts.logger.child({ transport: "matrix" });
  }

  get userId(): string {
    return this.client?.getUserId() ?? this.opts.userId;
  }

  get encryptionEnabled(): boolean {
    return this.cryptoReady;
  }

  async start(signal?: AbortSignal): Promise<void> {
    const client = createClient({
      baseUrl: this.opts.homeserver,
      accessToken: this.opts.accessToken,
      userId: this.opts.userId,
      deviceId: this.opts.deviceId,
    });
    this.client = client;

    if (this.opts.e2ee) await this.initCrypto(client);

    client.on(RoomEvent.Timeline, (event, _room, toStartOfTimeline) => {
      if (toStartOfTimeline) return;
      if (event.isEncrypted()) {
        // With crypto running these arrive through Decrypted once decryption settles.
        if (this.cryptoReady) return;
        const failure = normalizeDecryptionFailure(event);
        if (failure) this.events.emit("event", failure);
        return;
      }
      const msg = normalizeMatrixMessage(event);
      if (msg) this.events.emit("event", msg);
    });

    client.on(MatrixEventEvent.Decrypted, (event) => this.onDecrypted(event));

    client.on(RoomEvent.MyMembership, (room: Room, membership: string) => {
      if (membership === "invite") this.events.emit("event", { kind: "invite", roomId: room.roomId });
    });

    client.on(ClientEvent.Sync, (state: SyncState) => {
      if (state === SyncState.Error) {
        this.events.emit("error", new Error("Matrix sync failed; the client keeps retrying"));
      }
    });

    signal?.addEventListener("abort", () => client.stopClient(), { once: true });

    const synced = this.waitForFirstSync(client, signal);
    await client.startClient({ initialSyncLimit: INITIAL_SYNC_LIMIT });
    await synced;
    this.logger.info({ userId: this.userId, e2ee: this.cryptoReady }, "Matrix client synced");
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    if (!this.client) return;
    this.client.stopClient();
    this.client.removeAllListeners();
    this.client = null;
    this.events.emit("disconnected", "stopped");
  }

  async joinRoom(roomId: string): Promise<void> {
    await this.requireClient().joinRoom(roomId);
  }

  async joinedRooms(): Promise<string[]> {
    const response = await this.requireClient().getJoinedRooms();
    return response.joined_rooms;
  }

  async resolveAlias(alias: string): Promise<string | undefined> {
    try {
      const response = await this.requireClient().getRoomIdForAlias(alias);
      return response.room_id;
    } catch (err) {
      if (err instanceof MatrixError && err.httpStatus === 404) return undefined;
      throw err;
    }
  }

  async sendReaction(roomId: string, eventId: string, key: string): Promise<void> {
    await send.sendReaction(this.requireClient(), roomId, eventId, key, { logger: this.logger });
  }

  async sendMessage(roomId: string, message: OutboundMessage): Promise<{ eventId: string }> {
    return send.sendText(this.requireClient(), roomId, message, { logger: this.logger });
  }

  async sendToDevice(type: string, messages: ToDeviceMessages): Promise<void> {
    await send.sendToDevice(this.requireClient(), type, messages, { logger: this.logger });
  }

  private async initCrypto(client: MatrixClient): Promise<void> {
    if (!this.opts.deviceId) {
      this.logger.warn("E2EE is enabled but the credential has no device id; run `versebot auth login` again");
      return;
    }
    try {
      // In-memory store: Node has no IndexedDB, so keys are re-shared after a restart.
      await client.initRustCrypto({ useIndexedDB: false });
      this.cryptoReady = true;
    } catch (err) {
      this.logger.error({ err }, "Failed to initialize end-to-end encryption; continuing without it");
    }
  }

  private onDecrypted(event: MatrixEvent): void {
    if (event.isDecryptionFailure()) {
      const failure = normalizeDecryptionFailure(event);
      if (failure) this.events.emit("event", failure);
      return;
    }
    const msg = normalizeMatrixMessage(event);
    if (msg) this.events.emit("event", msg);
  }

  private waitForFirstSync(client: MatrixClient, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onSync = (state: SyncState): void => {
        if (state !== SyncState.Prepared && state !== SyncState.Syncing) return;
        client.off(ClientEvent.Sync, onSync);
        resolve();
      };
      client.on(ClientEvent.Sync, onSync);
      signal?.addEventListener(
        "abort",
        () => {
          client.off(ClientEvent.Sync, onSync);
          reject(new Error("Aborted before the first sync completed"));
        },
        { once: true },
      );
    });
  }

  private requireClient(): MatrixClient {
    if (!this.client) throw new Error("Matrix transport not started");
    return this.client;
  }
}
