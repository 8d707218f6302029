/**
 * api-quotes.ts
 *
 * Playwright: skip the DOM and read the JSON the /scroll page is built from,
 * using page.request so calls share the browser context's cookies.
 *
 *   npm run pw:api
 */

import type { Page } from '@playwright/test';
import { fetchAllApiQuotes } from '../quotes/api';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { printQuotes } from '../quotes/format';
import { createLogger, type Logger } from '../quotes/log';
import { paths, siteUrl } from '../quotes/selectors';
import type { DemoConfig, Quote } from '../quotes/types';
import { withPlaywrightPage } from './browser';

export async function readQuotesApi(page: Page, cfg: DemoConfig, log: Logger): Promise<Quote[]> {
  await page.goto(siteUrl(cfg.baseUrl, paths.scroll));

  return fetchAllApiQuotes(page.request, cfg, (p) =>
    log.info(`API page ${p.page}: ${p.quotes.length} quotes (has next: ${p.hasNext})`),
  );
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    printQuotes('Quotes API', await readQuotesApi(page, cfg, log));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/api-quotes'));
}
