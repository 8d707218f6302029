/**
 * infinite-scroll.ts
 *
 * Playwright: the /scroll page appends quotes as you reach the bottom.
 * Scroll, wait, read every quote text, and stop once a few scrolls in a row
 * bring nothing new (or SCROLL_MAX is hit).
 *
 *   npm run pw:scroll
 */

import type { Page } from '@playwright/test';
import { UniqueCollector, scrollUntilExhausted } from '../quotes/collector';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { normalizeQuoteText } from '../quotes/extract';
import { createLogger, type Logger } from '../quotes/log';
import { paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig, ScrollOutcome } from '../quotes/types';
import { withPlaywrightPage } from './browser';

async function visibleQuoteTexts(page: Page): Promise<string[]> {
  const texts = await page.locator(selectors.quoteText).allTextContents();
  return texts.map(normalizeQuoteText).filter(Boolean);
}

export async function scrollAllQuotes(page: Page, cfg: DemoConfig, log: Logger): Promise<ScrollOutcome<string>> {
  await page.goto(siteUrl(cfg.baseUrl, paths.scroll));
  await page.locator(selectors.quote).first().waitFor();

  const collector = new UniqueCollector<string>();
  collector.addAll(await visibleQuoteTexts(page));
  log.info(`Initial load: ${collector.size} quotes`);

  return scrollUntilExhausted(
    collector,
    async () => {
      await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await page.waitForTimeout(cfg.scrollPauseMs);
      return visibleQuoteTexts(page);
    },
    cfg,
    (r) => log.info(`Scroll ${r.round}: +${r.added} (total ${r.total}, idle ${r.idleRounds})`),
  );
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    const outcome = await scrollAllQuotes(page, cfg, log);
    console.log(`Stopped by ${outcome.stoppedBy} after ${outcome.scrolls} scrolls, ${outcome.items.length} unique quotes`);
    outcome.items.forEach((text, i) => console.log(`${i + 1}. ${text}`));
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/infinite-scroll'));
}
