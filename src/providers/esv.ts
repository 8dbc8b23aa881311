import { z } from "zod";
import { getJson } from "./http.js";
import type { FetchFn, LookupResult, PassageProvider } from "./types.js";

const ESV_API_URL = "https://api.esv.org/v3/passage/text/";

const esvResponseSchema = z.object({
  canonical: z.string().optional(),
  passages: z.array(z.string()).optional(),
});

export interface EsvProviderOptions {
  readonly apiKey?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: FetchFn;
}

export class EsvProvider implements PassageProvider {
  readonly id = "esv";
  readonly translations = ["esv"] as const;

  constructor(private readonly opts: EsvProviderOptions = {}) {}

  async fetch(query: string): Promise<LookupResult> {
    const apiKey = this.opts.apiKey?.trim();
    if (!apiKey) return { kind: "credential-missing", provider: this.id };

    const url = new URL(ESV_API_URL);
    url.searchParams.set("q", query);
    for (const flag of [
      "include-headings",
      "include-footnotes",
      "include-verse-numbers",
      "include-short-copyright",
      "include-passage-references",
    ]) {
      url.searchParams.set(flag, "false");
    }

    const response = await getJson(url, {
      headers: { Authorization: `Token ${apiKey}` },
      timeoutMs: this.opts.timeoutMs,
      fetchImpl: this.opts.fetchImpl,
    });

    switch (response.kind) {
      case "failed":
        return { kind: "unavailable", reason: response.reason };
      case "http-error":
        if (response.status === 401 || response.status === 403) {
          return { kind: "credential-missing", provider: this.id };
        }
        return { kind: "unavailable", reason: `ESV API responded ${response.status}` };
      case "ok":
        break;
    }

    const parsed = esvResponseSchema.safeParse(response.body);
    if (!parsed.success) return { kind: "unavailable", reason: "unexpected ESV response shape" };

    const text = (parsed.data.passages ?? []).join(" ").trim();
    if (text.length === 0) return { kind: "not-found" };

    return {
      kind: "found",
      passage: { text, reference: parsed.data.canonical?.trim() || query },
    };
  }
}
