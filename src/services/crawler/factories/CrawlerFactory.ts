import { AppConfig } from '../../../config';
import { IPageRenderer } from '../interfaces/IPageRenderer';
import { ILinkVerifier } from '../interfaces/ILinkVerifier';
import { IPageStore } from '../interfaces/IPageStore';
import { CrawlLedger } from '../implementations/CrawlLedger';
import { DateExtractor } from '../implementations/DateExtractor';
import { DefaultLinkExtractor } from '../implementations/DefaultLinkExtractor';
import { DisabledPageStore } from '../implementations/DisabledPageStore';
import { DuplicateClassifier } from '../implementations/DuplicateClassifier';
import { ExternalLinkVerifier } from '../implementations/ExternalLinkVerifier';
import { FilePageStore } from '../implementations/FilePageStore';
import { InMemoryFrontier } from '../implementations/InMemoryFrontier';
import { PuppeteerRenderer } from '../implementations/PuppeteerRenderer';
import { RenderModeDetector } from '../implementations/RenderModeDetector';
import { SiteCrawler } from '../implementations/SiteCrawler';
import { SitemapLocator } from '../implementations/SitemapLocator';

/**
 * Per-site settings that override the run-wide configuration
 */
export interface SiteCrawlSettings {
  /** Directory the site's pages are saved under */
  outputDir: string;
  saveHtml?: boolean;
  enablePagination?: boolean;
}

/**
 * Services shared by every site crawl of a run
 */
export interface SharedServices {
  renderer: IPageRenderer;
  linkVerifier: ILinkVerifier;
}

/**
 * Builds site crawlers with their collaborators wired from the configuration.
 * The renderer and the link verifier are created once and shared by all
 * crawlers of a run; everything else belongs to one site.
 */
export class CrawlerFactory {
  private renderer: IPageRenderer | null;
  private linkVerifier: ILinkVerifier | null;

  /**
   * @param config Run-wide configuration
   * @param services Prebuilt shared services, created from the configuration when absent
   */
  constructor(
    private readonly config: AppConfig,
    services: Partial<SharedServices> = {}
  ) {
    this.renderer = services.renderer ?? null;
    this.linkVerifier = services.linkVerifier ?? null;
  }

  getRenderer(): IPageRenderer {
    if (!this.renderer) {
      this.renderer = new PuppeteerRenderer({
        userAgent: this.config.crawl.userAgent,
        executablePath: this.config.browser.executablePath
      });
    }
    return this.renderer;
  }

  getLinkVerifier(): ILinkVerifier {
    if (!this.linkVerifier) {
      this.linkVerifier = new ExternalLinkVerifier({
        timeoutMs: this.config.linkCheck.timeoutMs,
        userAgent: this.config.crawl.userAgent,
        maxSockets: this.config.linkCheck.concurrency
      });
    }
    return this.linkVerifier;
  }

  createPageStore(settings: SiteCrawlSettings): IPageStore {
    const saveHtml = settings.saveHtml ?? this.config.crawl.saveHtml;
    return saveHtml ? new FilePageStore(settings.outputDir) : new DisabledPageStore();
  }

  /**
   * A crawler with its own frontier, ledger and page store
   */
  createCrawler(settings: SiteCrawlSettings): SiteCrawler {
    const pageStore = this.createPageStore(settings);
    const classifier = new DuplicateClassifier(pageStore, {
      enablePagination: settings.enablePagination ?? this.config.crawl.enablePagination
    });

    return new SiteCrawler(
      {
        renderer: this.getRenderer(),
        pageDetector: new RenderModeDetector({ spaIdleTimeout: this.config.crawl.spaIdleTimeoutMs }),
        linkExtractor: new DefaultLinkExtractor(),
        sitemapLocator: new SitemapLocator(),
        dateExtractor: new DateExtractor(),
        classifier,
        linkVerifier: this.getLinkVerifier(),
        pageStore
      },
      new InMemoryFrontier(),
      new CrawlLedger(),
      {
        maxDepth: this.config.crawl.maxDepth,
        timeout: this.config.crawl.pageTimeoutMs,
        linkCheckConcurrency: this.config.linkCheck.concurrency
      }
    );
  }

  /**
   * Release the shared browser, if one was started
   */
  async cleanup(): Promise<void> {
    if (this.renderer) {
      await this.renderer.cleanup();
    }
  }
}
