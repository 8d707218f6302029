/**
 * format.ts
 * How the demos print what they found.
 */

import type { Quote } from './types';

export function formatQuote(quote: Quote, index: number): string {
  const tags = quote.tags.length > 0 ? ` [${quote.tags.join(', ')}]` : '';
  return `${index}. ${quote.text}\n   by ${quote.author}${tags}`;
}

export function formatSummary(label: string, count: number): string {
  return `${label}: ${count} ${count === 1 ? 'quote' : 'quotes'}`;
}

export function printQuotes(label: string, quotes: Quote[], print: (line: string) => void = console.log): void {
  print(formatSummary(label, quotes.length));
  quotes.forEach((q, i) => print(formatQuote(q, i + 1)));
}
