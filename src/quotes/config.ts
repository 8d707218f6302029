/**
 * config.ts
 * Config for the demos, read from the environment (and .env when present)
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { DemoConfig } from './types';

dotenv.config();

const envBoolean = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));

const envInt = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const envList = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  );

function hasNoPath(url: string): boolean {
  try {
    return new URL(url).pathname === '/';
  } catch {
    return false;
  }
}

const EnvSchema = z.object({
  // demo paths are absolute ('/login'), so a path here would be silently dropped
  QUOTES_BASE_URL: z
    .string()
    .url()
    .refine(hasNoPath, { message: 'QUOTES_BASE_URL must not include a path' })
    .default('https://quotes.toscrape.com'),
  HEADLESS: envBoolean(true),
  SLOW_MO_MS: envInt(0, 0),
  TIMEOUT_MS: envInt(15000, 1),
  SCROLL_PAUSE_MS: envInt(1000, 0),
  SCROLL_MAX: envInt(50, 1),
  SCROLL_IDLE_ROUNDS: envInt(3, 1),
  MAX_PAGES: envInt(10, 1),
  DEMO_USERNAME: z.string().min(1).default('demo'),
  DEMO_PASSWORD: z.string().min(1).default('demo'),
  BLOCK_THIRD_PARTY: envBoolean(true),
  ALLOWED_HOSTS: envList,
  CHROME_PATH: z.string().min(1).optional(),
  STORAGE_STATE_PATH: z.string().min(1).optional(),
});

// Credentials are passed through exactly as given; every other value is trimmed
const VERBATIM = new Set(['DEMO_USERNAME', 'DEMO_PASSWORD']);

// Empty strings count as unset so a blank line in .env falls back to the default
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v === undefined || v.trim() === '') continue;
    cleaned[k] = VERBATIM.has(k) ? v : v.trim();
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const parsed = EnvSchema.parse(dropBlank(env));
  return {
    baseUrl: parsed.QUOTES_BASE_URL,
    headless: parsed.HEADLESS,
    slowMoMs: parsed.SLOW_MO_MS,
    timeoutMs: parsed.TIMEOUT_MS,
    scrollPauseMs: parsed.SCROLL_PAUSE_MS,
    maxScrolls: parsed.SCROLL_MAX,
    maxIdleRounds: parsed.SCROLL_IDLE_ROUNDS,
    maxPages: parsed.MAX_PAGES,
    username: parsed.DEMO_USERNAME,
    password: parsed.DEMO_PASSWORD,
    blockThirdParty: parsed.BLOCK_THIRD_PARTY,
    allowedHosts: parsed.ALLOWED_HOSTS,
    chromePath: parsed.CHROME_PATH,
    storageStatePath: parsed.STORAGE_STATE_PATH,
  };
}

// returns the settings used when nothing is overridden
export function getDefaultConfig(): DemoConfig {
  return loadConfig({});
}
