/**
 * scrape-quotes.ts
 *
 * Playwright: open the home page, read every quote card, then read the
 * authors a second time through XPath and the top-ten tag list.
 *
 *   npm run pw:quotes
 */

import type { Page } from '@playwright/test';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl, xpaths } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPlaywrightPage } from './browser';

export type HomePageResult = {
  quotes: Quote[];
  authors: string[];
  topTags: string[];
};

export async function scrapeHomePage(page: Page, cfg: DemoConfig, log: Logger): Promise<HomePageResult> {
  const url = siteUrl(cfg.baseUrl, paths.home);
  await page.goto(url);
  log.info(`Opened ${url} (title: ${await page.title()})`);

  await page.locator(selectors.quote).first().waitFor();
  const quotes = toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card));

  // Same authors, located by XPath instead of CSS
  const authorTexts = await page.locator(`xpath=${xpaths.author}`).allTextContents();
  const authors = [...new Set(authorTexts.map((a) => a.trim()))];

  const topTags = (await page.locator(selectors.topTags).allTextContents()).map((t) => t.trim());

  return { quotes, authors, topTags };
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    const { quotes, authors, topTags } = await scrapeHomePage(page, cfg, log);
    printQuotes('Home page', quotes);
    console.log(`Authors (XPath): ${authors.join(', ')}`);
    console.log(`Top tags: ${topTags.join(', ')}`);
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/scrape-quotes'));
}
