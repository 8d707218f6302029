/**
 * types.ts
 *
 * Shared TypeScript types used by the Playwright and Puppeteer demos.
 *
 */

export type Quote = {
  text: string;
  author: string;
  tags: string[];
};

// Quote as read straight from the DOM, before any cleanup
export type RawQuote = {
  text: string;
  author: string;
  tags: string[];
};

export type CardSelectors = {
  text: string;
  author: string;
  tag: string;
};

export type DemoConfig = {
  baseUrl: string;
  headless: boolean;
  slowMoMs: number;
  timeoutMs: number;
  scrollPauseMs: number;
  maxScrolls: number;
  maxIdleRounds: number;
  maxPages: number;
  username: string;
  password: string;
  blockThirdParty: boolean;
  allowedHosts: string[];
  chromePath?: string;
  storageStatePath?: string;
};

export type ScrollLimits = {
  maxScrolls: number;
  maxIdleRounds: number;
};

export type ScrollRound = {
  round: number;
  added: number;
  total: number;
  idleRounds: number;
};

export type ScrollOutcome<T> = {
  items: T[];
  scrolls: number;
  stoppedBy: 'idle' | 'cap';
};

export type RoutePolicy = {
  origin: string;
  allowedHosts: string[];
};

export type RouteDecision = 'continue' | 'abort';

export type ApiQuotesPage = {
  page: number;
  hasNext: boolean;
  quotes: Quote[];
};
