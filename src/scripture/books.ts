import { readFileSync } from "node:fs";
import { z } from "zod";
import type { UnknownBookPolicy } from "../config/types.js";

const DEFAULT_BOOKS_URL = new URL("../../data/books.json", import.meta.url);

const bookTableSchema = z.object({
  books: z.array(
    z.object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
    }),
  ),
});

export type BookEntry = z.infer<typeof bookTableSchema>["books"][number];

/** Lookup key: lowercase, no dots, no whitespace ("1 Cor." -> "1cor"). */
export function compactBookKey(name: string): string {
  return name.toLowerCase().replace(/\./g, "").replace(/\s+/g, "");
}

/** "song  of songs." -> "Song Of Songs" */
export function titleCaseBook(name: string): string {
  return name
    .replace(/\./g, "")
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

export class BookTable {
  private readonly byKey = new Map<string, string>();

  constructor(entries: readonly BookEntry[]) {
    for (const entry of entries) {
      this.byKey.set(compactBookKey(entry.name), entry.name);
      for (const alias of entry.aliases) {
        this.byKey.set(compactBookKey(alias), entry.name);
      }
    }
  }

  get size(): number {
    return this.byKey.size;
  }

  lookup(name: string): string | undefined {
    return this.byKey.get(compactBookKey(name));
  }
}

export function loadBookTable(source: URL | string = DEFAULT_BOOKS_URL): BookTable {
  const raw: unknown = JSON.parse(readFileSync(source, "utf-8"));
  return new BookTable(bookTableSchema.parse(raw).books);
}

/**
 * Canonical book name for `name`. Under the lenient policy an unknown name
 * is echoed back title-cased and left for the provider to reject; under the
 * strict policy it is refused.
 */
export function normalizeBook(
  name: string,
  table: BookTable,
  policy: UnknownBookPolicy = "lenient",
): string | undefined {
  const canonical = table.lookup(name);
  if (canonical) return canonical;
  if (policy === "strict") return undefined;
  const fallback = titleCaseBook(name);
  return fallback.length > 0 ? fallback : undefined;
}
