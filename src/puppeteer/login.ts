/**
 * login.ts
 *
 * Puppeteer: type into the login form, submit, and confirm the session by
 * finding the Logout link on the page the form redirects to.
 *
 *   npm run pptr:login
 */

import type { Page } from 'puppeteer-core';
import { loadConfig } from '../quotes/config';
import { exitOnFailure, requireElement } from '../quotes/errors';
import { createLogger, type Logger } from '../quotes/log';
import { paths, selectors, siteUrl } from '../quotes/selectors';
import type { DemoConfig } from '../quotes/types';
import { withPuppeteerPage } from './browser';

export async function logIn(page: Page, cfg: DemoConfig, log: Logger): Promise<string> {
  await page.goto(siteUrl(cfg.baseUrl, paths.login), { waitUntil: 'domcontentloaded' });

  await page.type(selectors.username, cfg.username);
  await page.type(selectors.password, cfg.password);
  await Promise.all([page.waitForNavigation({ waitUntil: 'domcontentloaded' }), page.click(selectors.submit)]);

  const logout = requireElement(await page.$(selectors.logoutLink), selectors.logoutLink, page.url());
  log.info(`Logged in as ${cfg.username}, landed on ${page.url()}`);

  return (await logout.evaluate((link) => link.textContent ?? '')).trim();
}

async function main() {
  const cfg = loadConfig();
  const log = createLogger('Puppeteer');

  await withPuppeteerPage(cfg, log, async (page) => {
    const linkText = await logIn(page, cfg, log);
    console.log(`Login succeeded: "${linkText}" link is shown`);
  });
}

if (require.main === module) {
  main().catch(exitOnFailure('puppeteer/login'));
}
