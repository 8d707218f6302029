/**
 * js-rendered.ts
 *
 * Puppeteer: /js/ builds its quote cards with client-side script; wait for
 * them to be attached before reading.
 *
 *   npm run pptr:js
 */

import type { Page } from 'puppeteer-core';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPuppeteerPage } from './browser';

export async function scrapeRenderedQuotes(page: Page, cfg: DemoConfig, log: Logger): Promise<Quote[]> {
  await page.goto(siteUrl(cfg.baseUrl, paths.js), { waitUntil: 'domcontentloaded' });
  await page.waitForSelector(selectors.quote);
  log.info(`Quote cards rendered on ${page.url()}`);

  return toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card));
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Puppeteer');

  await withPuppeteerPage(cfg, log, async (page) => {
    printQuotes('Rendered by JavaScript', await scrapeRenderedQuotes(page, cfg, log));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('puppeteer/js-rendered'));
}
