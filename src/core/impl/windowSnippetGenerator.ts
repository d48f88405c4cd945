import type { Term } from "../types.js";
import type { SnippetGenerator, SnippetOptions } from "../snippet.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Fixed-size word window around the first query match.
 *
 * Words are the raw content split on single spaces; a word matches when its
 * lowercased form, with non-word characters then removed, equals a query term.
 */
export class WindowSnippetGenerator implements SnippetGenerator {
  private readonly windowSize: number;
  private readonly lead: number;
  private readonly openTag: string;
  private readonly closeTag: string;
  private readonly ellipsis: string;

  constructor(options: SnippetOptions = {}) {
    this.windowSize = options.windowSize ?? 30;
    this.lead = options.lead ?? 10;
    this.openTag = options.openTag ?? "<strong>";
    this.closeTag = options.closeTag ?? "</strong>";
    this.ellipsis = options.ellipsis ?? "...";
  }

  generate(content: string, queryTerms: readonly Term[]): string {
    const words = content.split(" ");
    const start = this.windowStart(words, new Set(queryTerms));

    const snippet = this.highlight(words.slice(start, start + this.windowSize).join(" "), queryTerms);
    return start + this.windowSize < words.length ? snippet + this.ellipsis : snippet;
  }

  /** Index of the first word of the window. */
  private windowStart(words: readonly string[], terms: ReadonlySet<Term>): number {
    if (terms.size === 0) return 0;
    const idx = words.findIndex((w) => terms.has(w.toLowerCase().replace(/\W/g, "")));
    return idx < 0 ? 0 : Math.max(0, idx - this.lead);
  }

  private highlight(text: string, queryTerms: readonly Term[]): string {
    const distinct = Array.from(new Set(queryTerms)).filter((t) => t.length > 0);
    if (!distinct.length) return text;

    // one pass, so inserted markup is never matched again
    const re = new RegExp(`\\b(?:${distinct.map(escapeRegExp).join("|")})\\b`, "gi");
    return text.replace(re, (m) => `${this.openTag}${m}${this.closeTag}`);
  }
}
