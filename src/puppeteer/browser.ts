/**
 * browser.ts
 *
 * Launches an installed Chrome through puppeteer-core (CHROME_PATH, or the
 * stable channel when unset), hands a ready page to the demo and always closes it.
 */

import puppeteer, { type ContinueRequestOverrides, type ErrorCode, type Page } from 'puppeteer-core';
import type { Logger } from '../quotes/log';
import { decideRoute, routePolicyFor } from '../quotes/safety';
import { withResource } from '../quotes/session';
import type { DemoConfig, RoutePolicy } from '../quotes/types';

// Cooperative interception: a handler voting with a higher priority wins over the guard
export const GUARD_PRIORITY = 0;

// The parts of Puppeteer's HTTPRequest the guard touches
export interface GuardedRequest {
  url(): string;
  isInterceptResolutionHandled(): boolean;
  continueRequestOverrides(): ContinueRequestOverrides;
  abort(errorCode: ErrorCode, priority: number): Promise<void>;
  continue(overrides: ContinueRequestOverrides, priority: number): Promise<void>;
}

export function guardRequest(request: GuardedRequest, policy: RoutePolicy, log: Logger): void {
  if (request.isInterceptResolutionHandled()) return;

  const url = request.url();
  const decision = decideRoute(url, policy);
  if (decision === 'abort') log.warn(`Blocked off-site request: ${url}`);

  const settled =
    decision === 'abort'
      ? request.abort('blockedbyclient', GUARD_PRIORITY)
      : request.continue(request.continueRequestOverrides(), GUARD_PRIORITY);
  settled.catch((err: unknown) => log.warn(`Could not resolve request ${url}: ${String(err)}`));
}

async function installSiteGuard(page: Page, cfg: DemoConfig, log: Logger) {
  const policy = routePolicyFor(cfg);

  await page.setRequestInterception(true);
  page.on('request', (request) => guardRequest(request, policy, log));
}

export async function withPuppeteerPage<T>(
  cfg: DemoConfig,
  log: Logger,
  use: (page: Page) => Promise<T>,
): Promise<T> {
  return withResource(
    () =>
      puppeteer.launch({
        headless: cfg.headless,
        slowMo: cfg.slowMoMs,
        ...(cfg.chromePath ? { executablePath: cfg.chromePath } : { channel: 'chrome' as const }),
      }),
    (browser) => browser.close(),
    async (browser) => {
      const page = await browser.newPage();
      page.setDefaultTimeout(cfg.timeoutMs);

      if (cfg.blockThirdParty) await installSiteGuard(page, cfg, log);

      log.info(`Browser ready (headless=${cfg.headless})`);
      return use(page);
    },
  );
}
