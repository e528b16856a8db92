import { Browser, Page } from 'playwright-core';
import { AuthProfile } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { LoginRequest, LoginResult } from './browser.js';
import { openContext, toSessionCookies } from './session.js';

async function isPresent(page: Page, selector: string, timeout: number): Promise<boolean> {
  try {
    await page.waitForSelector(selector, { timeout });
    return true;
  } catch {
    return false;
  }
}

async function matchesSuccess(page: Page, auth: AuthProfile): Promise<boolean> {
  const url = page.url();
  for (const indicator of auth.successIndicators) {
    if (indicator.urlContains && url.includes(indicator.urlContains)) return true;
    if (indicator.elementPresent && (await isPresent(page, indicator.elementPresent, 5000))) return true;
  }
  return false;
}

async function matchedError(page: Page, auth: AuthProfile): Promise<string | null> {
  const content = (await page.content()).toLowerCase();
  for (const indicator of auth.errorIndicators) {
    if (indicator.textContains && content.includes(indicator.textContains.toLowerCase())) {
      return `Login failed: page contains '${indicator.textContains}'`;
    }
    if (indicator.elementPresent && (await page.locator(indicator.elementPresent).count()) > 0) {
      return 'Login failed: error element present';
    }
  }
  return null;
}

/**
 * Fill the portal's login form with the profile's selectors and decide the
 * outcome from its success and error indicators.
 */
export async function performLogin(browser: Browser, request: LoginRequest): Promise<LoginResult> {
  const { auth, timeoutMs } = request;
  const context = await openContext(browser, [], request.loginUrl);
  const page = await context.newPage();

  try {
    logger.info('Navigating to login page...');
    await page.goto(request.loginUrl, { waitUntil: 'domcontentloaded', timeout: timeoutMs });

    await page.waitForSelector(auth.formSelectors.username, { timeout: timeoutMs });
    await page.fill(auth.formSelectors.username, request.username);
    await page.fill(auth.formSelectors.password, request.password);

    logger.info('Submitting credentials and waiting for redirect...');
    await page.click(auth.formSelectors.submit);
    try {
      await page.waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch {
      logger.debug('Network did not go idle after login; checking indicators anyway');
    }
    await page.waitForTimeout(2000);

    if (await matchesSuccess(page, auth)) {
      const cookies = toSessionCookies(await context.cookies());
      return { success: true, cookies, error: null };
    }

    const error = (await matchedError(page, auth)) ?? `Login failed: redirected to ${page.url()}`;
    return { success: false, cookies: [], error };
  } catch (error) {
    logger.error(`Login failed: ${error}`);
    return { success: false, cookies: [], error: `Login error: ${error}` };
  } finally {
    await context.close();
  }
}
