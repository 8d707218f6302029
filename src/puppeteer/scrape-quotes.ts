/**
 * scrape-quotes.ts
 *
 * Puppeteer: open the home page, read every quote card, then read the
 * authors a second time through XPath and the top-ten tag list.
 *
 *   npm run pptr:quotes
 */

import type { Page } from 'puppeteer-core';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { readQuoteCards, toQuotes } from '../quotes/extract';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { card, paths, selectors, siteUrl, xpaths } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPuppeteerPage } from './browser';

export type HomePageResult = {
  quotes: Quote[];
  authors: string[];
  topTags: string[];
};

export async function scrapeHomePage(page: Page, cfg: DemoConfig, log: Logger): Promise<HomePageResult> {
  const url = siteUrl(cfg.baseUrl, paths.home);
  await page.goto(url, { waitUntil: 'domcontentloaded' });
  log.info(`Opened ${url} (title: ${await page.title()})`);

  await page.waitForSelector(selectors.quote);
  const quotes = toQuotes(await page.$$eval(selectors.quote, readQuoteCards, card));

  // Same authors, located by XPath instead of CSS
  const authorSelector: string = `xpath/${xpaths.author}`;
  const authorTexts = await page.$$eval(authorSelector, (nodes) =>
    nodes.map((node) => node.textContent ?? ''),
  );
  const authors = [...new Set(authorTexts.map((a) => a.trim()))];

  const topTags = await page.$$eval(selectors.topTags, (links) => links.map((link) => (link.textContent ?? '').trim()));

  return { quotes, authors, topTags };
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Puppeteer');

  await withPuppeteerPage(cfg, log, async (page) => {
    const { quotes, authors, topTags } = await scrapeHomePage(page, cfg, log);
    printQuotes('Home page', quotes);
    console.log(`Authors (XPath): ${authors.join(', ')}`);
    console.log(`Top tags: ${topTags.join(', ')}`);
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('puppeteer/scrape-quotes'));
}
