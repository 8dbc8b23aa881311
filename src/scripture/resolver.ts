import type { UnknownBookPolicy } from "../config/types.js";
import { type BookTable, normalizeBook } from "./books.js";

export interface ScriptureReference {
  /** Canonical (or, under the lenient policy, title-cased) book name. */
  readonly book: string;
  /** "3:16", "3:16-18" or a bare chapter such as "23". */
  readonly chapterVerse: string;
  readonly translation: string;
  /** True when the message named the translation itself. */
  readonly explicitTranslation: boolean;
}

export type ParseResult =
  | { readonly kind: "match"; readonly reference: ScriptureReference }
  | { readonly kind: "no-match" };

export interface ResolverOptions {
  readonly books: BookTable;
  readonly defaultTranslation: string;
  /** Translation codes a message may name explicitly. */
  readonly translations: readonly string[];
  readonly detectAnywhere?: boolean;
  readonly unknownBookPolicy?: UnknownBookPolicy;
}

/** "John 3:16" style locator, as sent to providers and used as cache key. */
export function passageQuery(ref: ScriptureReference): string {
  return `${ref.book} ${ref.chapterVerse}`;
}

interface Grammar {
  readonly pattern: RegExp;
  /** Chapter-only references never fall back to a title-cased book. */
  readonly requiresKnownBook: boolean;
}

const NO_MATCH: ParseResult = { kind: "no-match" };

const BOOK = String.raw`((?:[1-3]\s*)?[a-z][a-z.]*(?:\s+[a-z][a-z.]*)*?)`;
const CHAPTER_VERSE = String.raw`(\d+:\d+(?:[-–]\d+)?)`;
const CHAPTER = String.raw`(\d+)`;
const COMMAND = String.raw`[!/](?:bible|verse)\s+`;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parses message bodies into scripture references. Grammars are tried in
 * order and the first one whose book resolves wins:
 *
 *   !bible <book> <chapter:verse[-verse]> [translation]
 *   !bible <book> <chapter> [translation]
 *   <book> <chapter:verse[-verse]> [translation]
 *   <book> <chapter> [translation]
 *
 * With `detectAnywhere` the body is instead searched for the first
 * `<known book> <chapter:verse>` inside longer text.
 */
export class ReferenceResolver {
  private readonly grammars: Grammar[];
  private readonly anywhere: RegExp;
  private readonly books: BookTable;
  private readonly defaultTranslation: string;
  private readonly detectAnywhere: boolean;
  private readonly policy: UnknownBookPolicy;

  constructor(opts: ResolverOptions) {
    this.books = opts.books;
    this.defaultTranslation = opts.defaultTranslation.toLowerCase();
    this.detectAnywhere = opts.detectAnywhere ?? false;
    this.policy = opts.unknownBookPolicy ?? "lenient";

    const codes = [...new Set(opts.translations.map((t) => t.toLowerCase()))]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    const translation =
      codes.length > 0 ? String.raw`(?:\s+(${codes.join("|")}))?` : "()";

    const whole = (prefix: string, locator: string): RegExp =>
      new RegExp(`^${prefix}${BOOK}\\s+${locator}${translation}$`, "i");

    this.grammars = [
      { pattern: whole(COMMAND, CHAPTER_VERSE), requiresKnownBook: false },
      { pattern: whole(COMMAND, CHAPTER), requiresKnownBook: true },
      { pattern: whole("", CHAPTER_VERSE), requiresKnownBook: false },
      { pattern: whole("", CHAPTER), requiresKnownBook: true },
    ];

    const anywhereTranslation =
      codes.length > 0 ? String.raw`(?:\s+(${codes.join("|")})(?!\w))?` : "()";
    this.anywhere = new RegExp(
      String.raw`(?:^|[^\w])((?:[1-3]\s?)?[a-z][a-z.]*(?:\s+of\s+[a-z]+)?)\s+` +
        CHAPTER_VERSE +
        anywhereTranslation +
        String.raw`(?![\w:])`,
      "gi",
    );
  }

  parse(body: string): ParseResult {
    const text = body.trim();
    if (text.length === 0) return NO_MATCH;
    return this.detectAnywhere ? this.search(text) : this.matchWhole(text);
  }

  normalizeBook(name: string): string | undefined {
    return normalizeBook(name, this.books, this.policy);
  }

  private matchWhole(text: string): ParseResult {
    for (const grammar of this.grammars) {
      const match = grammar.pattern.exec(text);
      if (!match) continue;

      const [, rawBook = "", locator = "", token] = match;
      const book = this.resolveBook(rawBook, grammar.requiresKnownBook);
      if (!book) continue;

      return this.toMatch(book, locator, token);
    }
    return NO_MATCH;
  }

  private search(text: string): ParseResult {
    // Free text is noisy, so only books from the table count here.
    for (const match of text.matchAll(this.anywhere)) {
      const [, rawBook = "", locator = "", token] = match;
      const book = this.books.lookup(rawBook);
      if (book) return this.toMatch(book, locator, token);
    }
    return NO_MATCH;
  }

  private resolveBook(rawBook: string, requiresKnownBook: boolean): string | undefined {
    const known = this.books.lookup(rawBook);
    if (known) return known;
    if (requiresKnownBook) return undefined;
    // A title-cased echo is only plausible for a single (optionally numbered) word.
    if (!/^(?:[1-3]\s*)?[a-z.]+$/i.test(rawBook.trim())) return undefined;
    return normalizeBook(rawBook, this.books, this.policy);
  }

  private toMatch(book: string, locator: string, token: string | undefined): ParseResult {
    const translation = token ? token.toLowerCase() : this.defaultTranslation;
    return {
      kind: "match",
      reference: {
        book,
        chapterVerse: locator.replace("–", "-"),
        translation,
        explicitTranslation: Boolean(token),
      },
    };
  }
}
