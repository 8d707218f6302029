/**
 * puppeteer-demos.spec.ts
 *
 * Runs the Puppeteer demos in the Chromium that Playwright installs, against
 * the in-memory fixture site. Skipped when no Chromium is installed.
 */

import { expect, test } from '@playwright/test';
import { withPuppeteerPage } from '../src/puppeteer/browser';
import { scrollAllQuotes } from '../src/puppeteer/infinite-scroll';
import { scrapeRenderedQuotes } from '../src/puppeteer/js-rendered';
import { logIn } from '../src/puppeteer/login';
import { scrapeAllPages } from '../src/puppeteer/pagination';
import { scrapeHomePage } from '../src/puppeteer/scrape-quotes';
import { loadConfig } from '../src/quotes/config';
import { createLogger, type LogSink } from '../src/quotes/log';
import { FixtureSite, OFFSITE_ORIGIN, SITE_ORIGIN, installedChromium, scrollTexts, servePuppeteer } from './support/site';

const chromiumPath = installedChromium();

const fixtureEnv = {
  QUOTES_BASE_URL: SITE_ORIGIN,
  CHROME_PATH: chromiumPath,
  SCROLL_PAUSE_MS: '200',
  SCROLL_IDLE_ROUNDS: '2',
  SCROLL_MAX: '10',
  DEMO_USERNAME: 'reader',
  DEMO_PASSWORD: 'test-secret',
};
const cfg = loadConfig(fixtureEnv);

function recordingSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
}

test.describe('Puppeteer demos on the fixture site', () => {
  test.skip(!chromiumPath, 'needs Chromium: npx playwright install chromium');

  test('home page: quotes, XPath authors and top tags', async () => {
    const site = new FixtureSite();
    const log = createLogger('Puppeteer', recordingSink());

    const result = await withPuppeteerPage(cfg, log, async (page) => {
      await servePuppeteer(page, site);
      return scrapeHomePage(page, cfg, log);
    });

    expect(result).toEqual({
      quotes: [
        { text: 'Page one, first.', author: 'Ada Example', tags: ['work', 'life'] },
        { text: 'Page one, second.', author: 'Bo Sample', tags: [] },
      ],
      authors: ['Ada Example', 'Bo Sample'],
      topTags: ['work', 'life'],
    });
    expect(site.failures).toEqual([]);
  });

  test('pagination follows the next link to the last page and dedupes', async () => {
    const site = new FixtureSite();
    const log = createLogger('Puppeteer', recordingSink());

    const quotes = await withPuppeteerPage(cfg, log, async (page) => {
      await servePuppeteer(page, site);
      return scrapeAllPages(page, cfg, log);
    });

    expect(quotes.map((q) => q.text)).toEqual(['Page one, first.', 'Page one, second.', 'Page two, only.', 'Page three, only.']);
    expect(site.pathsRequested().filter((p) => p !== '/favicon.ico')).toEqual(['/', '/page/2/', '/page/3/']);
  });

  test('pagination stops at MAX_PAGES', async () => {
    const site = new FixtureSite();
    const limited = loadConfig({ ...fixtureEnv, MAX_PAGES: '2' });
    const log = createLogger('Puppeteer', recordingSink());

    const quotes = await withPuppeteerPage(limited, log, async (page) => {
      await servePuppeteer(page, site);
      return scrapeAllPages(page, limited, log);
    });

    expect(quotes.map((q) => q.text)).toEqual(['Page one, first.', 'Page one, second.', 'Page two, only.']);
    expect(site.pathsRequested()).not.toContain('/page/3/');
  });

  test('login types into the form, submits and finds the Logout link', async () => {
    const site = new FixtureSite();
    const log = createLogger('Puppeteer', recordingSink());

    const linkText = await withPuppeteerPage(cfg, log, async (page) => {
      await servePuppeteer(page, site);
      return logIn(page, cfg, log);
    });

    expect(linkText).toBe('Logout');
    expect(site.requests.find((r) => r.method === 'POST')).toEqual({
      method: 'POST',
      path: '/login',
      postData: 'username=reader&password=test-secret',
    });
  });

  test('infinite scroll collects every card once and stops when nothing new arrives', async () => {
    const site = new FixtureSite();
    const log = createLogger('Puppeteer', recordingSink());

    const outcome = await withPuppeteerPage(cfg, log, async (page) => {
      await servePuppeteer(page, site);
      return scrollAllQuotes(page, cfg, log);
    });

    expect(outcome.items).toEqual(scrollTexts);
    expect(outcome.stoppedBy).toBe('idle');
  });

  test('infinite scroll stops at SCROLL_MAX', async () => {
    const site = new FixtureSite();
    const capped = loadConfig({ ...fixtureEnv, SCROLL_MAX: '1' });
    const log = createLogger('Puppeteer', recordingSink());

    const outcome = await withPuppeteerPage(capped, log, async (page) => {
      await servePuppeteer(page, site);
      return scrollAllQuotes(page, capped, log);
    });

    expect(outcome).toEqual({ items: scrollTexts.slice(0, 4), scrolls: 1, stoppedBy: 'cap' });
  });

  test('script-rendered cards are read once they appear', async () => {
    const site = new FixtureSite();
    const log = createLogger('Puppeteer', recordingSink());

    const quotes = await withPuppeteerPage(cfg, log, async (page) => {
      await servePuppeteer(page, site);
      return scrapeRenderedQuotes(page, cfg, log);
    });

    expect(quotes).toEqual([
      { text: 'Rendered one.', author: 'Js Author', tags: ['js'] },
      { text: 'Rendered two.', author: 'Js Author', tags: [] },
    ]);
  });

  test('site guard aborts the off-site stylesheet and lets the site one load', async () => {
    const site = new FixtureSite();
    const sink = recordingSink();

    const { failed, finished } = await withPuppeteerPage(cfg, createLogger('Puppeteer', sink), async (page) => {
      await servePuppeteer(page, site);
      const failedUrls: string[] = [];
      const finishedUrls: string[] = [];
      page.on('requestfailed', (req) => failedUrls.push(req.url()));
      page.on('requestfinished', (req) => finishedUrls.push(req.url()));

      await page.goto(`${SITE_ORIGIN}/guard`, { waitUntil: 'load' });
      return { failed: failedUrls, finished: finishedUrls };
    });

    expect(failed).toEqual([`${OFFSITE_ORIGIN}/font.css`]);
    expect(finished).toContain(`${SITE_ORIGIN}/static/site.css`);
    expect(sink.lines).toContain(`[WARN] [Puppeteer] Blocked off-site request: ${OFFSITE_ORIGIN}/font.css`);
  });
});
