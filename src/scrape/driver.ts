/**
 * driver.ts
 *
 * Playwright-backed BrowserDriver.
 * - launches headless Chromium and owns it for the whole run
 * - wraps navigation failures and a missing browser install in our error types
 * - withDriver() guarantees the browser is closed on every exit path
 */

import { chromium, errors } from 'playwright';
import type { Browser, BrowserType, Locator, Page } from 'playwright';
import { DriverNotFoundError, NavigationError, isMissingExecutableError, messageOf } from './errors';
import type { BrowserDriver, DriverSession, LaunchDriver, Logger, ScrapeConfig } from './types';

export class PlaywrightDriver implements BrowserDriver<Locator> {
  constructor(private readonly page: Page) {}

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url);
    } catch (err) {
      throw new NavigationError(url, err);
    }
  }

  // Gives the page until the default timeout to render the element
  async waitFor(selector: string): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'attached' });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async findAll(selector: string): Promise<Locator[]> {
    return this.page.locator(selector).all();
  }

  async text(element: Locator, subselector: string): Promise<string | null> {
    const match = element.locator(subselector);
    if ((await match.count()) === 0) return null;
    return ((await match.first().textContent()) ?? '').trim();
  }
}

export async function openBrowser(
  cfg: ScrapeConfig,
  browserType: Pick<BrowserType, 'launch'> = chromium,
): Promise<Browser> {
  try {
    return await browserType.launch({ headless: cfg.headless });
  } catch (err) {
    if (isMissingExecutableError(err)) {
      throw new DriverNotFoundError(
        'Chromium is not installed for Playwright. Run `npx playwright install chromium` first.',
        { cause: err },
      );
    }
    throw err;
  }
}

export const launchPlaywrightDriver: LaunchDriver<Locator> = async (cfg) => {
  const browser = await openBrowser(cfg);
  try {
    const page = await browser.newPage();
    page.setDefaultNavigationTimeout(cfg.pageTimeoutMs);
    page.setDefaultTimeout(cfg.pageTimeoutMs);
    return { driver: new PlaywrightDriver(page), close: () => browser.close() };
  } catch (err) {
    await browser.close();
    throw err;
  }
};

// Acquire a browser session, hand its driver to fn, and always release it.
// A failed close after fn threw is only logged so the original error surfaces.
export async function withDriver<E, T>(
  launch: LaunchDriver<E>,
  cfg: ScrapeConfig,
  fn: (driver: BrowserDriver<E>) => Promise<T>,
  log: Logger = console,
): Promise<T> {
  const session: DriverSession<E> = await launch(cfg);
  let result: T;
  try {
    result = await fn(session.driver);
  } catch (err) {
    try {
      await session.close();
    } catch (closeErr) {
      log.warn(`Failed to close browser: ${messageOf(closeErr)}`);
    }
    throw err;
  }
  await session.close();
  return result;
}
