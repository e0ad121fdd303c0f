import { chromium, Browser, BrowserContext, ElementHandle, LaunchOptions, Page } from 'playwright-core';
import { DomNode, PageRenderer, RenderedPage } from '../types/renderer';

/**
 * Element handle exposed through the renderer boundary
 */
class PlaywrightNode implements DomNode {
  constructor(private readonly handle: ElementHandle) {}

  async query(selector: string): Promise<DomNode | null> {
    const element = await this.handle.$(selector);
    return element ? new PlaywrightNode(element) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    const elements = await this.handle.$$(selector);
    return elements.map(element => new PlaywrightNode(element));
  }

  text(): Promise<string | null> {
    return this.handle.textContent();
  }

  attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }
}

/**
 * Playwright page exposed through the renderer boundary. `text()` on the
 * page reads the whole body.
 */
export class PlaywrightPage implements RenderedPage {
  constructor(private readonly page: Page) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
  }

  async query(selector: string): Promise<DomNode | null> {
    const element = await this.page.$(selector);
    return element ? new PlaywrightNode(element) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    const elements = await this.page.$$(selector);
    return elements.map(element => new PlaywrightNode(element));
  }

  text(): Promise<string | null> {
    return this.page.textContent('body');
  }

  async attribute(): Promise<string | null> {
    return null;
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

export interface BrowserOptions {
  headless: boolean;
  /** Chromium binary to drive; defaults to the one playwright installs */
  executablePath?: string;
  launchTimeoutMs?: number;
}

/**
 * Headless Chromium session that hands out one page per target
 */
export class PlaywrightRenderer implements PageRenderer {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;

  constructor(private readonly options: BrowserOptions) {}

  /**
   * Launch the browser. Safe to call again: any previous session is closed first.
   */
  async initialize(): Promise<void> {
    console.log('Initializing browser for scraping...');
    await this.cleanup();

    const launchOptions: LaunchOptions = {
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      timeout: this.options.launchTimeoutMs ?? 30000,
      args: [
        '--no-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-extensions',
        '--disable-default-apps',
        '--disable-sync',
        '--disable-translate',
      ],
    };

    try {
      this.browser = await chromium.launch(launchOptions);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      if (errorMsg.includes("Executable doesn't exist")) {
        throw new Error('Chromium is not installed. Install it with playwright or set CHROMIUM_PATH.');
      }
      throw error;
    }

    this.context = await this.browser.newContext({
      userAgent:
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      viewport: { width: 1920, height: 1080 },
      locale: 'ja-JP',
      timezoneId: 'Asia/Tokyo',
      extraHTTPHeaders: {
        'Accept-Language': 'ja,en-US;q=0.7,en;q=0.3',
      },
    });

    console.log('Browser initialized successfully');
  }

  async newPage(): Promise<RenderedPage> {
    if (!this.context) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    return new PlaywrightPage(await this.context.newPage());
  }

  /**
   * Clean up browser resources
   */
  async cleanup(): Promise<void> {
    try {
      if (this.context) {
        await this.context.close();
        this.context = null;
      }
      if (this.browser) {
        await this.browser.close();
        this.browser = null;
      }
    } catch (error) {
      console.log('Cleanup warning (non-fatal):', error instanceof Error ? error.message : error);
      this.context = null;
      this.browser = null;
    }
  }
}
