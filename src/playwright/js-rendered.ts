/**
 * js-rendered.ts
 *
 * Playwright: /js/ ships an empty container and builds the quote cards with
 * client-side script, so the cards only exist after that script has run.
 *
 *   npm run pw:js
 */

import type { Page } from '@playwright/test';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPlaywrightPage } from './browser';

export async function scrapeRenderedQuotes(page: Page, cfg: DemoConfig, log: Logger): Promise<Quote[]> {
  await page.goto(siteUrl(cfg.baseUrl, paths.js));
  await page.waitForSelector(selectors.quote, { state: 'attached' });
  log.info(`Quote cards rendered on ${page.url()}`);

  return toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card));
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    printQuotes('Rendered by JavaScript', await scrapeRenderedQuotes(page, cfg, log));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/js-rendered'));
}
