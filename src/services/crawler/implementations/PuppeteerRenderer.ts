import puppeteer, { Browser, HTTPRequest, Page, TimeoutError } from 'puppeteer-core';
import { IPageRenderer, IRenderedPage } from '../interfaces/IPageRenderer';
import { LoggingUtils } from '../utils/LoggingUtils';
import { NavigationError, describeError } from '../../../utils/errors';

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'font', 'media']);

export interface PuppeteerRendererOptions {
  userAgent: string;
  /** Chrome or Chromium binary; the installed stable Chrome is used when absent */
  executablePath?: string;
}

/**
 * A navigated puppeteer page
 */
class PuppeteerRenderedPage implements IRenderedPage {
  constructor(
    private readonly page: Page,
    readonly finalUrl: string,
    readonly statusCode: number,
    private readonly onClose: (page: Page) => Promise<void>
  ) {}

  content(): Promise<string> {
    return this.page.content();
  }

  evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForNetworkIdle({ timeout: timeoutMs });
  }

  close(): Promise<void> {
    return this.onClose(this.page);
  }
}

/**
 * Page renderer backed by one headless Chrome shared by every visit.
 * Each navigation gets its own tab, closed by the caller.
 */
export class PuppeteerRenderer implements IPageRenderer {
  private readonly logger = LoggingUtils.createTaggedLogger('renderer');
  private browser: Browser | null = null;
  private browserInitPromise: Promise<Browser> | null = null;
  private pages: Set<Page> = new Set();

  constructor(private readonly options: PuppeteerRendererOptions) {}

  /**
   * Initialize the browser instance lazily
   */
  private async initBrowser(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }

    if (this.browserInitPromise) {
      return this.browserInitPromise;
    }

    this.logger.debug('Launching headless browser');

    this.browserInitPromise = puppeteer.launch({
      headless: true,
      ...(this.options.executablePath ? { executablePath: this.options.executablePath } : { channel: 'chrome' as const }),
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu'
      ]
    });

    try {
      this.browser = await this.browserInitPromise;
      return this.browser;
    } catch (error) {
      this.browserInitPromise = null;
      this.logger.error(`Failed to launch browser: ${describeError(error)}`);
      throw error;
    }
  }

  async navigate(url: string, timeoutMs: number): Promise<IRenderedPage> {
    const browser = await this.initBrowser();
    const page = await browser.newPage();
    this.pages.add(page);

    let status: number;
    try {
      await this.configurePage(page);
      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      if (!response) {
        throw new NavigationError(`No response for ${url}`, 'no-response');
      }
      status = response.status();
      if (status >= 400) {
        throw new NavigationError(`Page returned status ${status}`, 'http-status', status);
      }
    } catch (error) {
      await this.closePage(page);
      if (error instanceof NavigationError) {
        throw error;
      }
      if (error instanceof TimeoutError) {
        throw new NavigationError(`Navigation to ${url} timed out after ${timeoutMs}ms`, 'timeout');
      }
      throw new NavigationError(`Navigation to ${url} failed: ${describeError(error)}`, 'connection');
    }

    return new PuppeteerRenderedPage(page, page.url(), status, target => this.closePage(target));
  }

  async cleanup(): Promise<void> {
    await Promise.all([...this.pages].map(page => this.closePage(page)));

    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.browserInitPromise = null;
      this.logger.debug('Browser closed');
    }
  }

  private async configurePage(page: Page): Promise<void> {
    await page.setUserAgent(this.options.userAgent);
    await page.setViewport({ width: 1920, height: 1080, deviceScaleFactor: 1 });

    // Only markup and scripts matter for dates and links
    await page.setRequestInterception(true);
    page.on('request', (request: HTTPRequest) => {
      const settled = BLOCKED_RESOURCE_TYPES.has(request.resourceType()) ? request.abort() : request.continue();
      settled.catch((error: unknown) => this.logger.debug(`Request interception failed: ${describeError(error)}`));
    });
  }

  private async closePage(page: Page): Promise<void> {
    if (!this.pages.delete(page)) {
      return;
    }
    try {
      await page.close();
    } catch (error) {
      this.logger.debug(`Failed to close page: ${describeError(error)}`);
    }
  }
}
