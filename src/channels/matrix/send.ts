import { EventType, type MatrixClient, MatrixError, MsgType, RelationType } from "matrix-js-sdk";
import type { Logger } from "../../logging/logger.js";
import { errorMessage } from "../../utils/errors.js";
import { retry } from "../../utils/retry.js";
import { TransportSendFailure, type OutboundMessage, type ToDeviceMessages } from "../adapter.js";
import { escapeHtml } from "../../scripture/format.js";

/** The client calls outbound sends go through. */
export type MatrixSender = Pick<MatrixClient, "sendEvent" | "sendMessage" | "sendToDevice">;

const DEFAULT_RETRY_AFTER_MS = 1_000;
const MAX_RATE_LIMIT_RETRIES = 3;

/** Base backoff for a 429 response, or undefined for any other error. */
export function rateLimitDelay(err: unknown): number | undefined {
  if (!(err instanceof MatrixError) || err.httpStatus !== 429) return undefined;
  const retryAfter: unknown = err.data["retry_after_ms"];
  return typeof retryAfter === "number" && retryAfter > 0 ? retryAfter : DEFAULT_RETRY_AFTER_MS;
}

export interface RateLimitOptions {
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Run a send, retrying only on 429 with exponential backoff and jitter.
 * Anything that still fails surfaces as a TransportSendFailure.
 */
export async function withRateLimitRetry<T>(
  what: string,
  op: () => Promise<T>,
  opts: RateLimitOptions,
): Promise<T> {
  try {
    return await retry(() => op(), {
      maxAttempts: MAX_RATE_LIMIT_RETRIES + 1,
      shouldRetry: (err) => rateLimitDelay(err) !== undefined,
      baseDelayFor: rateLimitDelay,
      onRetry: (_err, attempt, delayMs) => {
        opts.logger.warn({ attempt, delayMs: Math.round(delayMs) }, `Rate limited sending ${what}; backing off`);
      },
      sleep: opts.sleep,
    });
  } catch (err) {
    if (err instanceof TransportSendFailure) throw err;
    const status = err instanceof MatrixError ? err.httpStatus : undefined;
    const reason = errorMessage(err);
    throw new TransportSendFailure(`Failed to send ${what}: ${reason}`, status, { cause: err });
  }
}

export async function sendReaction(
  client: MatrixSender,
  roomId: string,
  eventId: string,
  key: string,
  opts: RateLimitOptions,
): Promise<void> {
  await withRateLimitRetry(
    "reaction",
    () =>
      client.sendEvent(roomId, EventType.Reaction, {
        "m.relates_to": { rel_type: RelationType.Annotation, event_id: eventId, key },
      }),
    opts,
  );
}

export async function sendText(
  client: MatrixSender,
  roomId: string,
  message: OutboundMessage,
  opts: RateLimitOptions,
): Promise<{ eventId: string }> {
  const response = await withRateLimitRetry(
    "message",
    () =>
      client.sendMessage(roomId, {
        msgtype: MsgType.Text,
        body: message.body,
        format: "org.matrix.custom.html",
        formatted_body: message.html ?? escapeHtml(message.body),
      }),
    opts,
  );
  return { eventId: response.event_id };
}

export async function sendToDevice(
  client: MatrixSender,
  type: string,
  messages: ToDeviceMessages,
  opts: RateLimitOptions,
): Promise<void> {
  await withRateLimitRetry("to-device message", () => client.sendToDevice(type, messages), opts);
}
