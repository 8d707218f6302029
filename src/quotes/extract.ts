/**
 * extract.ts
 *
 * Turns quote cards into Quote records.
 * - readQuoteCards runs inside the browser, handed to $$eval by either library
 * - the rest cleans up what came back, in Node
 */

import type { CardSelectors, Quote, RawQuote } from './types';

// Minimal view of a DOM element; Element satisfies it, and so do test fakes.
export interface TextNode {
  textContent: string | null;
}

export interface CardNode {
  querySelector(selectors: string): TextNode | null;
  querySelectorAll(selectors: string): ArrayLike<TextNode>;
}

// Serialized and evaluated in the page: it must not reference anything outside its own body.
export function readQuoteCards(cards: CardNode[], sel: CardSelectors): RawQuote[] {
  return cards.map((quoteCard) => ({
    text: quoteCard.querySelector(sel.text)?.textContent ?? '',
    author: quoteCard.querySelector(sel.author)?.textContent ?? '',
    tags: Array.from(quoteCard.querySelectorAll(sel.tag)).map((tag) => tag.textContent ?? ''),
  }));
}

// The site wraps every quote in typographic quote marks
export function normalizeQuoteText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[“"]/, '')
    .replace(/[”"]$/, '')
    .trim();
}

export function toQuote(raw: RawQuote): Quote {
  return {
    text: normalizeQuoteText(raw.text),
    author: raw.author.replace(/\s+/g, ' ').trim(),
    tags: raw.tags.map((t) => t.trim()).filter(Boolean),
  };
}

export function toQuotes(raws: RawQuote[]): Quote[] {
  return raws.map(toQuote).filter((q) => q.text.length > 0);
}
