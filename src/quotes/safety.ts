/**
 * safety.ts
 *
 * Network guardrails keeping every demo on the practice site.
 * - data: and blob: URLs load normally
 * - requests to the site origin (any method, the login form posts) load normally
 * - requests to ALLOWED_HOSTS load normally
 * - anything else is aborted
 *
 * Each library's browser module wires decideRoute into its own interception API.
 */

import type { DemoConfig, RouteDecision, RoutePolicy } from './types';

export function routePolicyFor(cfg: DemoConfig): RoutePolicy {
  return { origin: new URL(cfg.baseUrl).origin, allowedHosts: cfg.allowedHosts };
}

export function decideRoute(url: string, policy: RoutePolicy): RouteDecision {
  if (url.startsWith('data:') || url.startsWith('blob:')) return 'continue';

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 'abort';
  }

  if (parsed.origin === policy.origin) return 'continue';
  if (policy.allowedHosts.includes(parsed.hostname)) return 'continue';
  return 'abort';
}
