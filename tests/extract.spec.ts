import { expect, test } from '@playwright/test';
import { normalizeQuoteText, readQuoteCards, toQuote, toQuotes, type CardNode, type TextNode } from '../src/quotes/extract';
import { card } from '../src/quotes/selectors';

// Stand-in for a quote card: maps a selector to the text of the nodes it matches
function fakeCard(nodes: Record<string, string[]>): CardNode {
  const find = (selector: string): TextNode[] => (nodes[selector] ?? []).map((textContent) => ({ textContent }));
  return {
    querySelector: (selector) => find(selector)[0] ?? null,
    querySelectorAll: (selector) => find(selector),
  };
}

test.describe('readQuoteCards', () => {
  test('reads text, author and tags from each card', () => {
    const cards = [
      fakeCard({
        'span.text': ['“Ship it.”'],
        'small.author': ['Ada Example'],
        'a.tag': ['work', 'shipping'],
      }),
      fakeCard({ 'span.text': ['“Second.”'], 'small.author': ['Bo Sample'] }),
    ];

    expect(readQuoteCards(cards, card)).toEqual([
      { text: '“Ship it.”', author: 'Ada Example', tags: ['work', 'shipping'] },
      { text: '“Second.”', author: 'Bo Sample', tags: [] },
    ]);
  });

  test('reads missing nodes as empty strings', () => {
    expect(readQuoteCards([fakeCard({})], card)).toEqual([{ text: '', author: '', tags: [] }]);
  });

  test('reads a node with null textContent as empty', () => {
    const nullText: CardNode = {
      querySelector: () => ({ textContent: null }),
      querySelectorAll: () => [{ textContent: null }],
    };
    expect(readQuoteCards([nullText], card)).toEqual([{ text: '', author: '', tags: [''] }]);
  });
});

test.describe('normalizeQuoteText', () => {
  test('strips the typographic quote marks and collapses whitespace', () => {
    expect(normalizeQuoteText('  “Hello   there,\n world.”  ')).toBe('Hello there, world.');
  });

  test('strips straight quote marks too', () => {
    expect(normalizeQuoteText('"Plain."')).toBe('Plain.');
  });

  test('only strips one mark at each end', () => {
    expect(normalizeQuoteText('““Nested””')).toBe('“Nested”');
  });

  test('leaves unquoted text alone', () => {
    expect(normalizeQuoteText('No marks here')).toBe('No marks here');
  });
});

test.describe('toQuote / toQuotes', () => {
  test('cleans up text, author and tags', () => {
    expect(toQuote({ text: '“A  line.”', author: '  Ada\n Example ', tags: [' a ', '', 'b'] })).toEqual({
      text: 'A line.',
      author: 'Ada Example',
      tags: ['a', 'b'],
    });
  });

  test('drops quotes without text', () => {
    const quotes = toQuotes([
      { text: '“”', author: 'Nobody', tags: [] },
      { text: '“Kept.”', author: 'Somebody', tags: [] },
    ]);
    expect(quotes).toEqual([{ text: 'Kept.', author: 'Somebody', tags: [] }]);
  });
});
