import { chromium, errors, type Browser, type Locator, type Page } from "playwright";
import type { EnvironmentConfig } from "../config/schema.js";
import type { BrowserDriver, DriverFactory, WaitCondition } from "./types.js";

const FORM_TAGS = new Set(["input", "textarea", "select"]);

/**
 * Browser Driver Facade over a Playwright page. Handles are `nth()` locators,
 * so every use re-queries the live DOM.
 */
export class PlaywrightDriver implements BrowserDriver<Locator> {
  constructor(private readonly page: Page) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const response = await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: timeoutMs,
    });
    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${response.status()} ${response.statusText()} for ${url}`);
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async query(selector: string, scope?: Locator): Promise<Locator[]> {
    const base = scope ? scope.locator(selector) : this.page.locator(selector);
    const count = await base.count();
    return Array.from({ length: count }, (_, i) => base.nth(i));
  }

  isVisible(element: Locator): Promise<boolean> {
    return element.isVisible();
  }

  async isEnabled(element: Locator): Promise<boolean> {
    try {
      return await element.isEnabled({ timeout: 1000 });
    } catch (error) {
      // Detached between query and probe: treat as not actionable.
      if (error instanceof errors.TimeoutError) return false;
      throw error;
    }
  }

  attribute(element: Locator, name: string): Promise<string | null> {
    return element.getAttribute(name);
  }

  tagName(element: Locator): Promise<string> {
    return element.evaluate((el) => el.tagName.toLowerCase());
  }

  fill(element: Locator, text: string): Promise<void> {
    return element.fill(text);
  }

  click(element: Locator): Promise<void> {
    return element.click();
  }

  async selectOption(element: Locator, value: string): Promise<void> {
    await element.selectOption({ label: value });
  }

  async textOf(element: Locator): Promise<string> {
    if (FORM_TAGS.has(await this.tagName(element))) {
      return element.inputValue();
    }
    return (await element.innerText()).trim();
  }

  async waitFor(condition: WaitCondition, timeoutMs: number): Promise<boolean> {
    try {
      switch (condition.kind) {
        case "selector":
          await this.page
            .locator(condition.selector)
            .first()
            .waitFor({ state: "visible", timeout: timeoutMs });
          break;
        case "url":
          await this.page.waitForURL((url) => url.href.includes(condition.includes), {
            timeout: timeoutMs,
          });
          break;
        case "network-idle":
          await this.page.waitForLoadState("networkidle", { timeout: timeoutMs });
          break;
      }
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return false;
      throw error;
    }
  }

  check(condition: WaitCondition): Promise<boolean> {
    switch (condition.kind) {
      case "selector":
        return this.page.locator(condition.selector).first().isVisible();
      case "url":
        return Promise.resolve(this.page.url().includes(condition.includes));
      case "network-idle":
        // Playwright treats 0 as "no timeout"
        return this.waitFor(condition, 1);
    }
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  pageContent(): Promise<string> {
    return this.page.content();
  }
}

export interface LaunchOptions {
  headed?: boolean;
  viewport?: { width: number; height: number };
}

/**
 * Owns one Chromium process; hands out an isolated context per scenario so
 * no cookies or storage leak between scenarios.
 */
export class PlaywrightLauncher {
  private browser: Browser | undefined;

  constructor(private readonly options: LaunchOptions = {}) {}

  async ensureBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.isConnected()) {
      this.browser = await chromium.launch({ headless: !this.options.headed });
    }
    return this.browser;
  }

  sessionFactory(environment: EnvironmentConfig): DriverFactory<Locator> {
    return async () => {
      const browser = await this.ensureBrowser();
      const context = await browser.newContext({
        viewport: this.options.viewport ?? { width: 1280, height: 720 },
        baseURL: environment.baseUrl,
        httpCredentials: environment.basicAuth,
      });
      const page = await context.newPage();
      return {
        driver: new PlaywrightDriver(page),
        close: () => context.close(),
      };
    };
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = undefined;
    }
  }
}
