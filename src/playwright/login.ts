/**
 * login.ts
 *
 * Playwright: fill in the login form and confirm the session by waiting for
 * the Logout link. With STORAGE_STATE_PATH set, the logged-in cookies are
 * saved so later runs can reuse them via storageState.
 *
 *   npm run pw:login
 */

import type { Page } from '@playwright/test';
import { loadConfig } from '../quotes/config';
import { exitOnFailure } from '../quotes/errors';
import { createLogger, type Logger } from '../quotes/log';
import { paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig } from '../quotes/types';
import { withPlaywrightPage } from './browser';

export async function logIn(page: Page, cfg: DemoConfig, log: Logger): Promise<string> {
  await page.goto(siteUrl(cfg.baseUrl, paths.login));

  await page.locator(selectors.username).fill(cfg.username);
  await page.locator(selectors.password).fill(cfg.password);
  await page.locator(selectors.submit).click();

  const logout = page.locator(selectors.logoutLink);
  await logout.waitFor({ state: 'visible' });
  log.info(`Logged in as ${cfg.username}, landed on ${page.url()}`);

  if (cfg.storageStatePath) {
    await page.context().storageState({ path: cfg.storageStatePath });
    log.info(`Saved storage state to ${cfg.storageStatePath}`);
  }
  return (await logout.innerText()).trim();
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Playwright');

  await withPlaywrightPage(cfg, log, async (page) => {
    const linkText = await logIn(page, cfg, log);
    console.log(`Login succeeded: "${linkText}" link is shown`);
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('playwright/login'));
}
