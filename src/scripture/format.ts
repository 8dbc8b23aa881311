import { chunkText } from "../utils/text-chunker.js";

export const REACTION_KEY = "✅";
export const MESSAGE_SUFFIX = " 🕊️✝️";
export const TRUNCATION_MARKER = "...";
export const FALLBACK_BODY = "[Message too long]";
/** Below this the last chunk of a split reply is not worth sending. */
export const MIN_PRACTICAL_CHUNK_SIZE = 8;

export interface ReplyFormatOptions {
  readonly maxMessageLength: number;
  /** 0 disables splitting. */
  readonly splitMessageLength?: number;
  readonly preservePoetry?: boolean;
}

export interface ReplyMessage {
  readonly body: string;
  readonly html: string;
}

/**
 * Collapse provider whitespace. In poetry mode line breaks survive, with runs
 * of blank lines reduced to one; otherwise everything becomes single spaces.
 */
export function normalizePassageText(text: string, preservePoetry = false): string {
  if (!preservePoetry) return text.replace(/\s+/g, " ").trim();

  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Fit the reference label into what `maxLength` leaves after the suffix,
 * the " - " separator and the smallest possible body. Returns undefined when
 * the label has to be dropped.
 */
export function trimReference(
  reference: string,
  maxLength: number,
  reserveFallback = true,
): string | undefined {
  const minBody = reserveFallback ? FALLBACK_BODY.length : 1;
  const budget = maxLength - MESSAGE_SUFFIX.length - 3 - minBody;
  if (budget <= 0 || reference.length === 0) return undefined;
  if (reference.length <= budget) return reference;
  if (budget < TRUNCATION_MARKER.length) return undefined;

  const keep = budget - TRUNCATION_MARKER.length;
  if (keep === 0) return undefined;
  return reference.slice(0, keep) + TRUNCATION_MARKER;
}

function footer(reference: string | undefined): string {
  return reference ? ` - ${reference}${MESSAGE_SUFFIX}` : MESSAGE_SUFFIX;
}

function toHtml(text: string, preservePoetry: boolean): string {
  const escaped = escapeHtml(text);
  return preservePoetry ? escaped.replace(/\n/g, "<br />") : escaped;
}

function render(text: string, tail: string, preservePoetry: boolean): ReplyMessage {
  return {
    body: text + tail,
    html: toHtml(text, preservePoetry) + escapeHtml(tail),
  };
}

function singleReply(
  text: string,
  reference: string,
  opts: ReplyFormatOptions,
): ReplyMessage {
  const max = opts.maxMessageLength;
  const poetry = opts.preservePoetry ?? false;
  const tail = footer(trimReference(reference, max));

  if (text.length + tail.length <= max) return render(text, tail, poetry);

  const maxText = max - tail.length - TRUNCATION_MARKER.length;
  if (maxText > 0) {
    return render(text.slice(0, maxText).trimEnd() + TRUNCATION_MARKER, tail, poetry);
  }
  return render(FALLBACK_BODY, tail, poetry);
}

/**
 * Build the outgoing message(s) for a resolved passage. Only the last
 * message carries " - <reference>" and the suffix, and no message exceeds
 * `maxMessageLength` (measured in UTF-16 code units).
 */
export function buildReplies(
  passageText: string,
  reference: string,
  opts: ReplyFormatOptions,
): ReplyMessage[] {
  const poetry = opts.preservePoetry ?? false;
  const text = normalizePassageText(passageText, poetry);
  const max = opts.maxMessageLength;
  const split = Math.min(opts.splitMessageLength ?? 0, max);

  if (split <= 0 || text.length <= split) return [singleReply(text, reference, opts)];

  const tail = footer(trimReference(reference, max, false));
  const lastLimit = Math.max(1, Math.min(split, max - tail.length));
  if (lastLimit < MIN_PRACTICAL_CHUNK_SIZE) return [singleReply(text, reference, opts)];

  const chunks = chunkText(text, split);
  const last = chunks.pop() ?? "";
  // The final chunk shares its room with the footer, so it may need re-splitting.
  const lastParts = chunkText(last, lastLimit);
  const final = lastParts.pop() ?? "";

  return [
    ...[...chunks, ...lastParts].map((chunk) => render(chunk, "", poetry)),
    render(final, tail, poetry),
  ];
}
