import { chromium, errors, type Browser, type Locator, type Page } from 'playwright-core';
import {
  ClickInterceptedError,
  DriverLaunchError,
  FormPilotError,
  NavigationTimeoutError,
} from '../errors.js';
import {
  describeQuery,
  type BrowserDriver,
  type DriverElement,
  type DriverLaunchOptions,
  type DriverScrollOptions,
  type ElementQuery,
} from './types.js';

const DEFAULT_VIEWPORT = { width: 1280, height: 900 };
const DEFAULT_CLICK_TIMEOUT_MS = 5000;
const MATCH_ATTRIBUTE = 'data-formpilot-match';

/**
 * Playwright reports a covered element as "<x> intercepts pointer events"
 * while it retries, then times out. Those are the only click failures the
 * script fallback can fix.
 */
export function isInterceptionError(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  return /intercepts pointer events|does not receive pointer events|outside of the viewport/i.test(msg);
}

function locate(root: Page | Locator, query: ElementQuery): Locator {
  if ('css' in query) return root.locator(query.css);
  if ('xpath' in query) return root.locator(`xpath=${query.xpath}`);
  if ('role' in query) return root.getByRole(query.role, { name: query.name, exact: query.exact ?? false });
  return root.getByText(query.text, { exact: query.exact ?? false });
}

class PlaywrightElement implements DriverElement {
  constructor(
    private readonly locator: Locator,
    private readonly clickTimeoutMs: number,
  ) {}

  async queryAll(query: ElementQuery): Promise<DriverElement[]> {
    const found = await locate(this.locator, query).all();
    return found.map((l) => new PlaywrightElement(l, this.clickTimeoutMs));
  }

  async click(): Promise<void> {
    try {
      await this.locator.click({ timeout: this.clickTimeoutMs });
    } catch (err) {
      if (isInterceptionError(err)) {
        throw new ClickInterceptedError(err instanceof Error ? err.message : String(err));
      }
      throw err;
    }
  }

  async scriptClick(): Promise<void> {
    await this.locator.evaluate((el) => {
      if (el instanceof HTMLElement) {
        el.click();
      } else {
        el.dispatchEvent(new MouseEvent('click', { bubbles: true, cancelable: true }));
      }
    });
  }

  async scrollIntoView(options: DriverScrollOptions = {}): Promise<void> {
    const behavior = options.behavior ?? 'smooth';
    await this.locator.evaluate(
      (el, b) => el.scrollIntoView({ behavior: b, block: 'center' }),
      behavior,
    );
  }

  getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  async textContent(): Promise<string> {
    return (await this.locator.textContent()) ?? '';
  }

  isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  clear(): Promise<void> {
    return this.locator.clear();
  }

  type(text: string): Promise<void> {
    return this.locator.pressSequentially(text);
  }
}

/**
 * One Chromium browser with one page. Launched per submission and closed
 * when the submission ends.
 */
export class PlaywrightDriver implements BrowserDriver {
  readonly type = 'playwright' as const;
  private browser: Browser | null = null;
  private _page: Page | null = null;
  private clickTimeoutMs = DEFAULT_CLICK_TIMEOUT_MS;
  private matchCounter = 0;

  async launch(options: DriverLaunchOptions): Promise<void> {
    if (this.browser) return;

    try {
      this.browser = await chromium.launch({
        headless: options.headless,
        args: ['--disable-notifications', '--disable-extensions', '--disable-dev-shm-usage'],
      });
      this._page = await this.browser.newPage({ viewport: options.viewport ?? DEFAULT_VIEWPORT });
    } catch (err) {
      await this.close();
      throw new DriverLaunchError(err);
    }
    this.clickTimeoutMs = options.clickTimeoutMs ?? DEFAULT_CLICK_TIMEOUT_MS;
  }

  async close(): Promise<void> {
    const page = this._page;
    const browser = this.browser;
    this._page = null;
    this.browser = null;
    await page?.close().catch(() => undefined);
    await browser?.close();
  }

  isActive(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }

  private get page(): Page {
    if (!this._page) {
      throw new FormPilotError('The browser page has not been initialised yet.', 'driver_not_started');
    }
    return this._page;
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async waitFor(query: ElementQuery, timeoutMs: number): Promise<void> {
    try {
      await locate(this.page, query).first().waitFor({ state: 'attached', timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(describeQuery(query), timeoutMs);
      }
      throw err;
    }
  }

  async queryAll(query: ElementQuery): Promise<DriverElement[]> {
    const found = await locate(this.page, query).all();
    return found.map((l) => new PlaywrightElement(l, this.clickTimeoutMs));
  }

  async findContainingAncestor(text: string, containerSelector: string): Promise<DriverElement | null> {
    const token = `m${++this.matchCounter}`;
    // Tag the container so a Locator can address it after the scan.
    const marked = await this.page.evaluate(
      ({ label, container, attr, value }) => {
        const match = Array.from(document.querySelectorAll('div')).find(
          (el) => (el.textContent ?? '').includes(label) && el.closest(container) !== null,
        );
        const target = match?.closest(container);
        if (!target) return false;
        target.setAttribute(attr, value);
        return true;
      },
      { label: text, container: containerSelector, attr: MATCH_ATTRIBUTE, value: token },
    );
    if (!marked) return null;
    return new PlaywrightElement(
      this.page.locator(`[${MATCH_ATTRIBUTE}="${token}"]`).first(),
      this.clickTimeoutMs,
    );
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }
}
