/**
 * pagination.ts
 *
 * Puppeteer: start on the home page and keep clicking "Next" until the
 * link disappears or MAX_PAGES pages have been read.
 *
 *   npm run pptr:pages
 */

import type { Page } from 'puppeteer-core';
import { UniqueCollector } from '../quotes/collector';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPuppeteerPage } from './browser';

export async function scrapeAllPages(page: Page, cfg: DemoConfig, log: Logger): Promise<Quote[]> {
  const collector = new UniqueCollector<Quote>((q) => q.text);
  await page.goto(siteUrl(cfg.baseUrl, paths.home), { waitUntil: 'domcontentloaded' });

  for (let pageNum = 1; pageNum <= cfg.maxPages; pageNum++) {
    await page.waitForSelector(selectors.quote);
    const added = collector.addAll(toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card)));
    log.info(`Page ${pageNum}: +${added} (total ${collector.size})`);

    const next = await page.$(selectors.nextLink);
    if (!next) break;
    await next.dispose();

    await Promise.all([page.waitForNavigation({ waitUntil: 'domcontentloaded' }), page.click(selectors.nextLink)]);
  }
  return collector.items();
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Puppeteer');

  await withPuppeteerPage(cfg, log, async (page) => {
    printQuotes('All pages', await scrapeAllPages(page, cfg, log));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('puppeteer/pagination'));
}
