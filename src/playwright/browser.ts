/**
 * browser.ts
 *
 * Launches Chromium through Playwright, hands a ready page to the demo,
 * and closes the browser afterwards no matter how the demo ended.
 */

import { chromium, type Page } from '@playwright/test';
import type { Logger } from '../quotes/log';
import { decideRoute, routePolicyFor } from '../quotes/safety';
import { withResource } from '../quotes/session';
import type { DemoConfig, RoutePolicy } from '../quotes/types';

// The parts of Playwright's Route the guard touches
export interface GuardedRoute {
  request(): { url(): string };
  abort(errorCode?: string): Promise<void>;
  continue(): Promise<void>;
}

export async function guardRoute(route: GuardedRoute, policy: RoutePolicy, log: Logger): Promise<void> {
  const url = route.request().url();
  if (decideRoute(url, policy) === 'abort') {
    log.warn(`Blocked off-site request: ${url}`);
    return route.abort('blockedbyclient');
  }
  return route.continue();
}

async function installSiteGuard(page: Page, cfg: DemoConfig, log: Logger) {
  const policy = routePolicyFor(cfg);
  await page.route('**/*', (route) => guardRoute(route, policy, log));
}

export async function withPlaywrightPage<T>(
  cfg: DemoConfig,
  log: Logger,
  use: (page: Page) => Promise<T>,
): Promise<T> {
  return withResource(
    () => chromium.launch({ headless: cfg.headless, slowMo: cfg.slowMoMs }),
    (browser) => browser.close(),
    async (browser) => {
      const context = await browser.newContext();
      const page = await context.newPage();
      page.setDefaultTimeout(cfg.timeoutMs);

      if (cfg.blockThirdParty) await installSiteGuard(page, cfg, log);

      log.info(`Browser ready (headless=${cfg.headless})`);
      return use(page);
    },
  );
}
