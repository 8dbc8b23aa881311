import { randomUUID } from "node:crypto";
import type {
  DecryptionFailure,
  InboundEvent,
  Invite,
  OutboundMessage,
  RoomMessage,
  ToDeviceMessages,
  Transport,
} from "../channels/adapter.js";
import type { Logger } from "../logging/logger.js";
import type { ProviderGateway } from "../providers/gateway.js";
import type { LookupResult, Passage } from "../providers/types.js";
import { PassageCache } from "../scripture/passage-cache.js";
import {
  REACTION_KEY,
  buildReplies,
  escapeHtml,
  normalizePassageText,
} from "../scripture/format.js";
import { type ReferenceResolver, type ScriptureReference, passageQuery } from "../scripture/resolver.js";
import type { RejectReason, SessionState } from "./session-state.js";

export const ERROR_PASSAGE_NOT_FOUND =
  "Error: The requested passage could not be found. Please check the book, chapter, and verse.";

const ROOM_KEY_REQUEST = "m.room_key_request";
const DEFAULT_KEY_REQUEST_MEMORY = 1024;

export type DiscardReason =
  | RejectReason
  | "no-match"
  | "empty-passage"
  | "uninvited-room"
  | "e2ee-disabled"
  | "duplicate-key-request";

export type ErrorKind =
  | "not-found"
  | "credential-missing"
  | "unavailable"
  | "send-failed"
  | "join-failed"
  | "key-request-failed";

export type DispatchOutcome =
  | { readonly kind: "discarded"; readonly reason: DiscardReason }
  | { readonly kind: "delivered"; readonly action: "reply"; readonly messages: number }
  | { readonly kind: "delivered"; readonly action: "join" }
  | { readonly kind: "delivered"; readonly action: "key-request"; readonly path: "transport" | "to-device" }
  | { readonly kind: "errored"; readonly error: ErrorKind };

export interface DispatcherOptions {
  readonly maxMessageLength: number;
  readonly splitMessageLength?: number;
  readonly preservePoetry?: boolean;
  readonly e2eeEnabled: boolean;
  /** Own device id, stamped on fallback key requests. */
  readonly deviceId?: string;
  /** How many failed event ids to remember for key-request de-duplication. */
  readonly keyRequestMemory?: number;
}

export interface DispatcherDeps {
  readonly transport: Transport;
  readonly state: SessionState;
  readonly resolver: ReferenceResolver;
  readonly gateway: ProviderGateway;
  readonly cache: PassageCache;
  readonly logger: Logger;
}

/**
 * Per-event pipeline: filter, parse, look up (cache, then provider), react
 * and reply. Handlers suspend on provider calls and outbound sends, so
 * events may interleave at those points; the cache and the in-flight map are
 * the only state shared between them.
 */
export class Dispatcher {
  private readonly transport: Transport;
  private readonly state: SessionState;
  private readonly resolver: ReferenceResolver;
  private readonly gateway: ProviderGateway;
  private readonly cache: PassageCache;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<LookupResult>>();
  private readonly keyRequested = new Set<string>();

  constructor(
    deps: DispatcherDeps,
    private readonly opts: DispatcherOptions,
  ) {
    this.transport = deps.transport;
    this.state = deps.state;
    this.resolver = deps.resolver;
    this.gateway = deps.gateway;
    this.cache = deps.cache;
    this.logger = deps.logger;
  }

  handleEvent(event: InboundEvent): Promise<DispatchOutcome> {
    switch (event.kind) {
      case "room-message":
        return this.handleMessage(event);
      case "invite":
        return this.handleInvite(event);
      case "decryption-failure":
        return this.handleDecryptionFailure(event);
    }
  }

  async handleMessage(msg: RoomMessage): Promise<DispatchOutcome> {
    const log = this.logger.child({ room: msg.roomId, event: msg.eventId });

    const rejected = this.state.rejectReason(msg);
    if (rejected) {
      log.debug({ reason: rejected }, "Message discarded");
      return { kind: "discarded", reason: rejected };
    }

    const parsed = this.resolver.parse(msg.body);
    if (parsed.kind === "no-match") return { kind: "discarded", reason: "no-match" };

    const ref = parsed.reference;
    const query = passageQuery(ref);
    log.info({ query, translation: ref.translation }, "Detected scripture reference");

    const result = await this.lookup(query, ref.translation);
    if (result.kind !== "found") {
      return this.reportFailure(msg.roomId, ref, result, log);
    }

    return this.deliver(msg, result.passage, log);
  }

  async handleInvite(invite: Invite): Promise<DispatchOutcome> {
    if (!this.state.isAuthorized(invite.roomId)) {
      this.logger.warn({ room: invite.roomId }, "Ignoring invite for a room that is not configured");
      return { kind: "discarded", reason: "uninvited-room" };
    }

    this.logger.info({ room: invite.roomId }, "Accepting invite for configured room");
    try {
      await this.transport.joinRoom(invite.roomId);
      return { kind: "delivered", action: "join" };
    } catch (err) {
      this.logger.error({ err, room: invite.roomId }, "Failed to join room after invite");
      return { kind: "errored", error: "join-failed" };
    }
  }

  /**
   * Ask for the missing room key once per failed event: through the
   * transport's own key-request path when it has one, or with a raw
   * m.room_key_request to-device message when that path is missing or
   * reports a request already pending.
   */
  async handleDecryptionFailure(failure: DecryptionFailure): Promise<DispatchOutcome> {
    const log = this.logger.child({ room: failure.roomId, event: failure.eventId });

    if (!this.opts.e2eeEnabled) {
      log.warn("Received an encrypted message but matrix.e2ee.enabled is false; it cannot be decrypted");
      return { kind: "discarded", reason: "e2ee-disabled" };
    }
    if (this.keyRequested.has(failure.eventId)) {
      return { kind: "discarded", reason: "duplicate-key-request" };
    }
    this.rememberKeyRequest(failure.eventId);
    log.warn("Failed to decrypt event; requesting room key");

    try {
      if (this.transport.requestRoomKey) {
        const result = await this.transport.requestRoomKey(failure);
        if (result === "requested") {
          log.info("Requested room key through the transport");
          return { kind: "delivered", action: "key-request", path: "transport" };
        }
        log.debug({ result }, "Transport key request not sent; falling back to to-device");
      }

      const messages = this.buildKeyRequest(failure);
      if (!messages) {
        log.warn("Encrypted event lacks the session fields needed for a key request");
        return { kind: "errored", error: "key-request-failed" };
      }
      await this.transport.sendToDevice(ROOM_KEY_REQUEST, messages);
      log.info("Requested room key through to-device message");
      return { kind: "delivered", action: "key-request", path: "to-device" };
    } catch (err) {
      log.error({ err }, "Failed to request room key");
      return { kind: "errored", error: "key-request-failed" };
    }
  }

  /** Cache first; concurrent misses for the same key share one provider call. */
  private lookup(query: string, translation: string): Promise<LookupResult> {
    const cached = this.cache.get(query, translation);
    if (cached) return Promise.resolve({ kind: "found", passage: cached });

    const key = PassageCache.key(query, translation);
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const request = this.gateway
      .fetch(query, translation)
      .then((result) => {
        if (result.kind === "found") this.cache.put(query, translation, result.passage);
        return result;
      })
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, request);
    return request;
  }

  private async deliver(msg: RoomMessage, passage: Passage, log: Logger): Promise<DispatchOutcome> {
    const preservePoetry = this.opts.preservePoetry ?? false;
    if (normalizePassageText(passage.text, preservePoetry).length === 0) {
      log.warn({ reference: passage.reference }, "Provider returned an empty passage");
      return { kind: "discarded", reason: "empty-passage" };
    }

    try {
      await this.transport.sendReaction(msg.roomId, msg.eventId, REACTION_KEY);
    } catch (err) {
      log.warn({ err }, "Failed to send reaction");
    }

    const replies = buildReplies(passage.text, passage.reference, {
      maxMessageLength: this.opts.maxMessageLength,
      splitMessageLength: this.opts.splitMessageLength,
      preservePoetry,
    });

    for (const [index, reply] of replies.entries()) {
      try {
        await this.transport.sendMessage(msg.roomId, reply);
      } catch (err) {
        log.error({ err, part: index + 1, parts: replies.length }, "Failed to send scripture reply");
        return { kind: "errored", error: "send-failed" };
      }
    }

    log.info({ reference: passage.reference, parts: replies.length }, "Sent scripture");
    return { kind: "delivered", action: "reply", messages: replies.length };
  }

  private async reportFailure(
    roomId: string,
    ref: ScriptureReference,
    result: Exclude<LookupResult, { kind: "found" }>,
    log: Logger,
  ): Promise<DispatchOutcome> {
    const query = passageQuery(ref);
    switch (result.kind) {
      case "not-found":
        log.warn({ query, translation: ref.translation }, "Passage not found");
        break;
      case "credential-missing":
        log.warn({ query, translation: ref.translation, provider: result.provider }, "Provider credential missing");
        break;
      case "unavailable":
        log.warn({ query, translation: ref.translation, reason: result.reason }, "Provider unavailable");
        break;
    }

    const text =
      result.kind === "credential-missing"
        ? credentialMissingMessage(ref)
        : ERROR_PASSAGE_NOT_FOUND;
    const message: OutboundMessage = { body: text, html: escapeHtml(text) };

    try {
      await this.transport.sendMessage(roomId, message);
    } catch (err) {
      log.error({ err }, "Failed to send error message");
      return { kind: "errored", error: "send-failed" };
    }
    return { kind: "errored", error: result.kind };
  }

  private buildKeyRequest(failure: DecryptionFailure): ToDeviceMessages | undefined {
    if (!failure.algorithm || !failure.sessionId) return undefined;

    const content: Record<string, unknown> = {
      action: "request",
      body: {
        algorithm: failure.algorithm,
        room_id: failure.roomId,
        session_id: failure.sessionId,
        ...(failure.senderKey ? { sender_key: failure.senderKey } : {}),
      },
      request_id: randomUUID(),
      requesting_device_id: this.opts.deviceId ?? "",
    };
    return new Map([[failure.senderId, new Map([["*", content]])]]);
  }

  private rememberKeyRequest(eventId: string): void {
    this.keyRequested.add(eventId);
    const limit = this.opts.keyRequestMemory ?? DEFAULT_KEY_REQUEST_MEMORY;
    for (const oldest of this.keyRequested) {
      if (this.keyRequested.size <= limit) break;
      this.keyRequested.delete(oldest);
    }
  }
}

function credentialMissingMessage(ref: ScriptureReference): string {
  const suggestion = ref.translation === "kjv" ? "" : ` (Try: ${passageQuery(ref)} kjv)`;
  return `The ${ref.translation.toUpperCase()} translation requires an API key that is not configured.${suggestion}`;
}
