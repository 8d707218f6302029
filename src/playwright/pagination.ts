/**
 * pagination.ts
 *
 * Playwright: start on the home page and keep clicking "Next" until the
 * link disappears or MAX_PAGES pages have been read.
 *
 *   npm run pw:pages
 */

import type { Page } from '@playwright/test';
import { UniqueCollector } from '../quotes/collector';
import { loadConfig } from '../quotes/config';
import { exitOnFailure, requireElement } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPlaywrightPage } from './browser';

export async function scrapeAllPages(page: Page, cfg: DemoConfig, log: Logger): Promise<Quote[]> {
  const collector = new UniqueCollector<Quote>((q) => q.text);
  await page.goto(siteUrl(cfg.baseUrl, paths.home));

  for (let pageNum = 1; pageNum <= cfg.maxPages; pageNum++) {
    await page.locator(selectors.quote).first().waitFor();
    const added = collector.addAll(toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card)));
    log.info(`Page ${pageNum}: +${added} (total ${collector.size})`);

    const next = page.locator(selectors.nextLink);
    if ((await next.count()) === 0) break;

    // waitForLoadState alone can resolve on the page being left; wait for the new URL instead
    const href = requireElement(await next.getAttribute('href'), selectors.nextLink, page.url());
    await next.click();
    await page.waitForURL(new URL(href, page.url()).toString(), { waitUntil: 'domcontentloaded' });
  }
  return collector.items();
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    printQuotes('All pages', await scrapeAllPages(page, cfg, log));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/pagination'));
}
