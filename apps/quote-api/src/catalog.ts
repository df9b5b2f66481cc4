import type { Quote } from "@quote-api/types";
import seed from "../data/quotes.json";
import { CatalogError, TagNotFoundError } from "./errors";

export interface CatalogOptions {
  /** Returns a number in [0, 1). Swap in a seeded source for tests. */
  random?: () => number;
}

// ─── Quote Catalog ────────────────────────────────────────
// Built once at boot, never written to afterwards, so every request
// handler can share the same instance without locking.
export class QuoteCatalog {
  private readonly quotes: readonly Quote[];
  private readonly rng: () => number;

  constructor(quotes: readonly Quote[], options: CatalogOptions = {}) {
    if (quotes.length === 0) {
      throw new CatalogError("Quote catalog must contain at least one quote");
    }

    this.quotes = Object.freeze(quotes.map((quote, index) => freezeQuote(quote, index)));
    this.rng = options.random ?? Math.random;
  }

  get size(): number {
    return this.quotes.length;
  }

  random(): Quote {
    const index = Math.min(Math.floor(this.rng() * this.quotes.length), this.quotes.length - 1);
    return this.quotes[index];
  }

  /**
   * Exact tag match after lowercasing the input. Keeps catalog order.
   * @throws TagNotFoundError when nothing matches; the message echoes `tag` unchanged.
   */
  byTag(tag: string): readonly Quote[] {
    const wanted = tag.toLowerCase();
    const matches = this.quotes.filter((quote) => quote.tags.includes(wanted));

    if (matches.length === 0) throw new TagNotFoundError(tag);
    return matches;
  }

  all(): readonly Quote[] {
    return this.quotes;
  }
}

function freezeQuote(quote: Quote, index: number): Quote {
  if (typeof quote.text !== "string" || quote.text.trim() === "") {
    throw new CatalogError(`Quote #${index} has an empty text`);
  }
  if (typeof quote.author !== "string" || quote.author.trim() === "") {
    throw new CatalogError(`Quote #${index} has an empty author`);
  }
  if (!Array.isArray(quote.tags)) {
    throw new CatalogError(`Quote #${index} has no tag list`);
  }
  for (const tag of quote.tags) {
    if (typeof tag !== "string" || tag !== tag.toLowerCase()) {
      throw new CatalogError(`Quote #${index} has a tag that is not lowercase: ${String(tag)}`);
    }
  }

  return Object.freeze({
    text: quote.text,
    author: quote.author,
    tags: Object.freeze([...quote.tags]),
  });
}

export function loadDefaultCatalog(options?: CatalogOptions): QuoteCatalog {
  return new QuoteCatalog(seed, options);
}
