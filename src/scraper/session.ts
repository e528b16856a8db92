import { chromium, Browser, BrowserContext, Cookie } from 'playwright-core';
import { SessionCookie } from '../types/index.js';
import { hostOf } from '../utils/urls.js';
import { logger } from '../utils/logger.js';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface LaunchOptions {
  headless: boolean;
  /** Installed browser to drive, e.g. "chrome" or "msedge". */
  channel?: string;
}

export async function launchBrowser(options: LaunchOptions): Promise<Browser> {
  return chromium.launch({ headless: options.headless, channel: options.channel });
}

export function toSessionCookies(cookies: Cookie[]): SessionCookie[] {
  return cookies.map((c) => ({ name: c.name, value: c.value, domain: c.domain, path: c.path }));
}

/** Cookies without a domain are scoped to the host of the URL being fetched. */
export function toContextCookies(cookies: SessionCookie[], url: string) {
  const fallbackDomain = hostOf(url).split(':')[0];
  return cookies
    .filter((c) => c.name && c.value)
    .map((c) => ({
      name: c.name,
      value: c.value,
      domain: c.domain.replace(/^\./, '') || fallbackDomain,
      path: c.path || '/',
    }));
}

export async function openContext(
  browser: Browser,
  cookies: SessionCookie[],
  url: string
): Promise<BrowserContext> {
  const context = await browser.newContext({ userAgent: USER_AGENT });
  const contextCookies = toContextCookies(cookies, url);
  if (contextCookies.length > 0) {
    try {
      await context.addCookies(contextCookies);
    } catch (error) {
      logger.warn(`Failed to inject session cookies: ${error}`);
    }
  }
  return context;
}
