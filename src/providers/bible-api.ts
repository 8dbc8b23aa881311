import { z } from "zod";
import { getJson } from "./http.js";
import type { FetchFn, LookupResult, PassageProvider } from "./types.js";

const BIBLE_API_URL = "https://bible-api.com/";

/** Public-domain editions served without a key. */
export const BIBLE_API_TRANSLATIONS = ["kjv", "web", "asv", "bbe", "darby", "ylt"] as const;

const bibleApiResponseSchema = z.object({
  reference: z.string().optional(),
  text: z.string().optional(),
});

export interface BibleApiProviderOptions {
  readonly timeoutMs?: number;
  readonly fetchImpl?: FetchFn;
}

/** "John 3:16" -> "John%203:16" (the colon stays readable). */
export function encodeReference(query: string): string {
  return encodeURIComponent(query).replace(/%3A/gi, ":");
}

export class BibleApiProvider implements PassageProvider {
  readonly id = "bible-api";
  readonly translations: readonly string[] = BIBLE_API_TRANSLATIONS;

  constructor(private readonly opts: BibleApiProviderOptions = {}) {}

  async fetch(query: string, translation: string): Promise<LookupResult> {
    const url = `${BIBLE_API_URL}${encodeReference(query)}?translation=${encodeURIComponent(translation.toLowerCase())}`;
    const response = await getJson(url, {
      timeoutMs: this.opts.timeoutMs,
      fetchImpl: this.opts.fetchImpl,
    });

    switch (response.kind) {
      case "failed":
        return { kind: "unavailable", reason: response.reason };
      case "http-error":
        if (response.status === 404) return { kind: "not-found" };
        return { kind: "unavailable", reason: `bible-api.com responded ${response.status}` };
      case "ok":
        break;
    }

    const parsed = bibleApiResponseSchema.safeParse(response.body);
    if (!parsed.success) return { kind: "unavailable", reason: "unexpected bible-api.com response shape" };

    const text = parsed.data.text?.trim() ?? "";
    if (text.length === 0) return { kind: "not-found" };

    return {
      kind: "found",
      passage: { text, reference: parsed.data.reference?.trim() || query },
    };
  }
}
