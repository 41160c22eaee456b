import { IPageRenderer, IRenderedPage } from '../../interfaces/IPageRenderer';
import { NavigationError, NavigationFailureKind } from '../../../../utils/errors';

/**
 * One page served by the fake renderer
 */
export interface FakePageConfig {
  html?: string;
  /** Defaults to 200 */
  status?: number;
  /** URL after redirects, defaults to the requested URL */
  finalUrl?: string;
  /** Value returned by script evaluation, 'Static' when absent */
  framework?: string;
  /** Make the network-idle wait reject */
  idleTimeout?: boolean;
  /** Make navigation fail with a NavigationError of this kind */
  failure?: NavigationFailureKind;
}

export class FakeRenderedPage implements IRenderedPage {
  closed = false;
  idleWaits: number[] = [];

  constructor(
    readonly finalUrl: string,
    readonly statusCode: number,
    private readonly config: FakePageConfig
  ) {}

  async content(): Promise<string> {
    return this.config.html ?? '';
  }

  async evaluate(): Promise<unknown> {
    return this.config.framework ?? 'Static';
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    this.idleWaits.push(timeoutMs);
    if (this.config.idleTimeout) {
      throw new Error(`Timed out after ${timeoutMs} ms`);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-process site for crawler tests: URLs map to canned pages,
 * anything else fails to connect
 */
export class FakeSiteRenderer implements IPageRenderer {
  private readonly pages = new Map<string, FakePageConfig>();
  readonly navigations: string[] = [];
  readonly opened: FakeRenderedPage[] = [];
  cleanedUp = false;

  /**
   * @returns this instance for chaining
   */
  addPage(url: string, config: FakePageConfig): FakeSiteRenderer {
    this.pages.set(url, config);
    return this;
  }

  async navigate(url: string): Promise<IRenderedPage> {
    this.navigations.push(url);
    const config = this.pages.get(url);
    if (!config) {
      throw new NavigationError(`Navigation to ${url} failed: net::ERR_CONNECTION_REFUSED`, 'connection');
    }
    const status = config.status ?? 200;
    if (config.failure) {
      throw new NavigationError(`Navigation to ${url} failed`, config.failure, status);
    }
    if (status >= 400) {
      throw new NavigationError(`HTTP ${status} for ${url}`, 'http-status', status);
    }

    const page = new FakeRenderedPage(config.finalUrl ?? url, status, config);
    this.opened.push(page);
    return page;
  }

  async cleanup(): Promise<void> {
    this.cleanedUp = true;
  }
}

/**
 * Minimal HTML page with the given title, body and optional anchors
 */
export function htmlPage(title: string, body: string, links: string[] = []): string {
  const anchors = links.map(href => `<a href="${href}">${href}</a>`).join('\n');
  return `<html><head><title>${title}</title></head><body>${body}\n${anchors}</body></html>`;
}
