import type { ApiKeysConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../utils/errors.js";
import { BibleApiProvider } from "./bible-api.js";
import { EsvProvider } from "./esv.js";
import type { FetchFn, LookupResult, PassageProvider } from "./types.js";

/**
 * Routes each lookup to the single provider registered for its translation.
 * A failing provider is reported as-is; there is no fallback to another.
 */
export class ProviderGateway {
  private readonly byTranslation = new Map<string, PassageProvider>();

  constructor(
    providers: readonly PassageProvider[],
    private readonly logger: Logger,
  ) {
    for (const provider of providers) {
      for (const code of provider.translations) {
        const key = code.toLowerCase();
        if (!this.byTranslation.has(key)) this.byTranslation.set(key, provider);
      }
    }
  }

  translations(): string[] {
    return [...this.byTranslation.keys()];
  }

  supports(translation: string): boolean {
    return this.byTranslation.has(translation.toLowerCase());
  }

  async fetch(query: string, translation: string): Promise<LookupResult> {
    const code = translation.toLowerCase();
    const provider = this.byTranslation.get(code);
    if (!provider) {
      return { kind: "unavailable", reason: `no provider serves translation "${code}"` };
    }

    const started = Date.now();
    let result: LookupResult;
    try {
      result = await provider.fetch(query, code);
    } catch (err) {
      this.logger.error({ err, provider: provider.id, query, translation: code }, "Provider threw");
      return { kind: "unavailable", reason: errorMessage(err) };
    }

    this.logger.debug(
      { provider: provider.id, query, translation: code, outcome: result.kind, ms: Date.now() - started },
      "Provider lookup finished",
    );
    return result;
  }
}

export interface ProviderSetup {
  readonly apiKeys: ApiKeysConfig;
  readonly timeoutMs: number;
  readonly fetchImpl?: FetchFn;
}

/** ESV through api.esv.org, the public-domain editions through bible-api.com. */
export function createProviderGateway(setup: ProviderSetup, logger: Logger): ProviderGateway {
  const http = { timeoutMs: setup.timeoutMs, fetchImpl: setup.fetchImpl };
  return new ProviderGateway(
    [new EsvProvider({ ...http, apiKey: setup.apiKeys.esv }), new BibleApiProvider(http)],
    logger.child({ component: "providers" }),
  );
}
