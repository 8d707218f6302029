/**
 * selectors.ts
 *
 * Every selector and path the demos use against the practice site.
 * Both libraries read from here so the two renditions of a demo look at the same nodes.
 */

import type { CardSelectors } from './types';

export const paths = {
  home: '/',
  login: '/login',
  scroll: '/scroll',
  js: '/js/',
  apiQuotes: '/api/quotes',
} as const;

export const card: CardSelectors = {
  text: 'span.text',
  author: 'small.author',
  tag: 'a.tag',
};

export const selectors = {
  quote: 'div.quote',
  quoteText: 'div.quote span.text',
  nextLink: 'li.next > a',
  topTags: '.tags-box .tag-item a',
  username: '#username',
  password: '#password',
  submit: 'input[type="submit"]',
  logoutLink: 'a[href="/logout"]',
} as const;

export const xpaths = {
  author: '//div[@class="quote"]//small[@class="author"]',
} as const;

export function siteUrl(baseUrl: string, path: string): string {
  return new URL(path, baseUrl).toString();
}
