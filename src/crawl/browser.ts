import type { Browser, Page } from "playwright";

export const SCROLL_TO_BOTTOM_SCRIPT = "window.scrollTo(0, document.body.scrollHeight);";

/**
 * The only browser capabilities discovery relies on. Anything that can load a
 * page, run a script, read text and list link targets will do.
 */
export interface BrowsingSession {
  open(url: string): Promise<void>;
  executeScript(script: string): Promise<void>;
  readText(selector: string): Promise<string>;
  /** Absolute `href` of every element matching the selector, in document order. */
  findElements(selector: string): Promise<string[]>;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  headless: boolean;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  timeoutMs: number;
}

export class PlaywrightBrowsingSession implements BrowsingSession {
  private readonly browser: Browser;
  private readonly page: Page;

  private constructor(browser: Browser, page: Page) {
    this.browser = browser;
    this.page = page;
  }

  static async launch(options: BrowserLaunchOptions): Promise<PlaywrightBrowsingSession> {
    // loaded lazily so commands that never open a browser do not pay for it
    const { chromium } = await import("playwright");
    const browser = await chromium.launch({ headless: options.headless });
    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        ignoreHTTPSErrors: options.ignoreHttpsErrors,
      });
      const page = await context.newPage();
      page.setDefaultTimeout(options.timeoutMs);
      page.setDefaultNavigationTimeout(options.timeoutMs);
      return new PlaywrightBrowsingSession(browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async open(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "load" });
  }

  async executeScript(script: string): Promise<void> {
    await this.page.evaluate(script);
  }

  async readText(selector: string): Promise<string> {
    const text = await this.page.locator(selector).first().textContent();
    if (text === null) {
      throw new Error(`No text content for selector ${selector}`);
    }
    return text;
  }

  async findElements(selector: string): Promise<string[]> {
    const baseUrl = this.page.url();
    const hrefs: string[] = [];
    for (const element of await this.page.locator(selector).all()) {
      const href = await element.getAttribute("href");
      if (href) {
        hrefs.push(new URL(href, baseUrl).toString());
      }
    }
    return hrefs;
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
