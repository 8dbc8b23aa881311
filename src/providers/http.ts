import { errorMessage } from "../utils/errors.js";
import type { FetchFn } from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface JsonRequestOptions {
  readonly headers?: Record<string, string>;
  readonly timeoutMs?: number;
  readonly fetchImpl?: FetchFn;
}

export type JsonResponse =
  | { readonly kind: "ok"; readonly status: number; readonly body: unknown }
  | { readonly kind: "http-error"; readonly status: number }
  | { readonly kind: "failed"; readonly reason: string };

/** GET a JSON document. Never throws: transport problems become `failed`. */
export async function getJson(url: string | URL, options?: JsonRequestOptions): Promise<JsonResponse> {
  const fetchImpl = options?.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      headers: { Accept: "application/json", ...options?.headers },
      signal: controller.signal,
    });
    if (!response.ok) return { kind: "http-error", status: response.status };

    const text = await response.text();
    try {
      return { kind: "ok", status: response.status, body: JSON.parse(text) };
    } catch {
      return { kind: "failed", reason: "invalid JSON in response" };
    }
  } catch (err) {
    if (controller.signal.aborted) {
      return { kind: "failed", reason: `timed out after ${timeoutMs}ms` };
    }
    return { kind: "failed", reason: errorMessage(err) };
  } finally {
    clearTimeout(timeout);
  }
}
