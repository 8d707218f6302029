/**
 * api.ts
 *
 * Client for the JSON endpoint behind the /scroll page.
 *
 * - /api/quotes?page=N returns one page of quotes plus a has_next flag
 * - responses are validated with zod before anything reads them
 * - fetchAllApiQuotes walks the pages the same way the scroll page does
 */

import { z } from 'zod';
import { UniqueCollector } from './collector';
import { toQuote } from './extract';
import { paths, siteUrl } from './selectors';
import type { ApiQuotesPage, DemoConfig, Quote } from './types';

// Playwright's APIRequestContext satisfies this, so does a test fake.
export interface JsonRequester {
  get(
    url: string,
    options?: { headers?: { [key: string]: string } },
  ): Promise<{ status(): number; json(): Promise<unknown> }>;
}

const ApiQuoteSchema = z.object({
  text: z.string(),
  author: z.object({
    name: z.string(),
    slug: z.string().optional(),
    goodreads_link: z.string().optional(),
  }),
  tags: z.array(z.string()),
});

const ApiQuotesPageSchema = z.object({
  has_next: z.boolean(),
  page: z.number().int(),
  quotes: z.array(ApiQuoteSchema),
  tag: z.string().nullable().optional(),
  top_ten: z.boolean().optional(),
});

export function buildApiQuotesUrl(baseUrl: string, page: number): string {
  const u = new URL(siteUrl(baseUrl, paths.apiQuotes));
  u.searchParams.set('page', String(page));
  return u.toString();
}

export async function fetchApiQuotesPage(
  requester: JsonRequester,
  cfg: DemoConfig,
  page: number,
): Promise<ApiQuotesPage> {
  const res = await requester.get(buildApiQuotesUrl(cfg.baseUrl, page), {
    headers: { 'X-Requested-With': 'XMLHttpRequest' },
  });

  if (res.status() !== 200) {
    throw new Error(`quotes API returned HTTP ${res.status()}`);
  }

  const body = ApiQuotesPageSchema.parse(await res.json());
  return {
    page: body.page,
    hasNext: body.has_next,
    quotes: body.quotes.map((q) => toQuote({ text: q.text, author: q.author.name, tags: q.tags })),
  };
}

// Walk pages 1..maxPages, stopping early when the API says there is no next page.
export async function fetchAllApiQuotes(
  requester: JsonRequester,
  cfg: DemoConfig,
  onPage?: (page: ApiQuotesPage) => void,
): Promise<Quote[]> {
  const collector = new UniqueCollector<Quote>((q) => q.text);

  for (let page = 1; page <= cfg.maxPages; page++) {
    const result = await fetchApiQuotesPage(requester, cfg, page);
    collector.addAll(result.quotes);
    onPage?.(result);
    if (!result.hasNext) break;
  }
  return collector.items();
}
