export interface Passage {
  readonly text: string;
  /** Canonical label as returned by the provider, e.g. "John 3:16". */
  readonly reference: string;
}

export type LookupResult =
  | { readonly kind: "found"; readonly passage: Passage }
  | { readonly kind: "not-found" }
  | { readonly kind: "credential-missing"; readonly provider: string }
  | { readonly kind: "unavailable"; readonly reason: string };

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface PassageProvider {
  readonly id: string;
  /** Lowercase translation codes this provider serves. */
  readonly translations: readonly string[];
  fetch(query: string, translation: string): Promise<LookupResult>;
}
