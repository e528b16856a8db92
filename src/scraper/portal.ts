import { Browser } from 'playwright-core';
import { logger } from '../utils/logger.js';
import { BrowserDriver, FetchPageRequest, LoginRequest, LoginResult } from './browser.js';
import { performLogin } from './auth.js';
import { LaunchOptions, launchBrowser, openContext } from './session.js';

/**
 * Playwright-backed browser. One Chromium instance is launched lazily and
 * reused; every fetch gets a fresh context carrying the session cookies.
 */
export class PlaywrightBrowser implements BrowserDriver {
  private browser: Browser | null = null;

  constructor(private readonly options: LaunchOptions) {}

  private async ensureBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = await launchBrowser(this.options);
    }
    return this.browser;
  }

  async login(request: LoginRequest): Promise<LoginResult> {
    let browser: Browser;
    try {
      browser = await this.ensureBrowser();
    } catch (error) {
      return { success: false, cookies: [], error: `Could not launch browser: ${error}` };
    }
    return performLogin(browser, request);
  }

  async fetchPage(request: FetchPageRequest): Promise<string> {
    const browser = await this.ensureBrowser();
    const context = await openContext(browser, request.cookies, request.url);

    try {
      const page = await context.newPage();
      await page.goto(request.url, { waitUntil: 'domcontentloaded', timeout: request.timeoutMs });
      try {
        await page.waitForLoadState('networkidle', { timeout: Math.min(request.timeoutMs, 15000) });
      } catch {
        // Pages with long-polling never go idle; the DOM is already there
        logger.debug(`Network did not go idle for ${request.url}`);
      }
      return await page.content();
    } finally {
      await context.close();
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
