import { BaseCrawler } from './BaseCrawler';
import { CrawlLedger } from './CrawlLedger';
import { IPageDetector } from '../interfaces/IPageDetector';
import { IPageRenderer, IRenderedPage } from '../interfaces/IPageRenderer';
import { ILinkExtractor, ISitemapLocator } from '../interfaces/ILinkExtractor';
import { IDateExtractor, IDuplicateClassifier } from '../interfaces/IContentAnalysis';
import { ILinkVerifier } from '../interfaces/ILinkVerifier';
import { IPageStore } from '../interfaces/IPageStore';
import { IUrlQueue } from '../interfaces/IUrlQueue';
import {
  CRAWL_FAILED,
  Classification,
  CrawlOptions,
  CrawlResult,
  CrawlerState,
  FrontierEntry,
  PageMarker,
  SourcePage
} from '../interfaces/types';
import { FileNameUtils } from '../utils/FileNameUtils';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { NavigationError, describeError } from '../../../utils/errors';

/**
 * Collaborators a site crawl is built from
 */
export interface SiteCrawlerDependencies {
  renderer: IPageRenderer;
  pageDetector: IPageDetector;
  linkExtractor: ILinkExtractor;
  sitemapLocator: ISitemapLocator;
  dateExtractor: IDateExtractor;
  classifier: IDuplicateClassifier;
  linkVerifier: ILinkVerifier;
  pageStore: IPageStore;
}

type Attempt =
  | { kind: 'done'; result: CrawlResult }
  | { kind: 'failed'; actualUrl: string; status: number; error: unknown };

const emptyResult = (requestedUrl: string): CrawlResult => ({
  outcome: 'failed',
  requestedUrl,
  actualUrl: requestedUrl,
  status: 0,
  body: '',
  lastUpdated: '',
  title: '',
  savedPath: '',
  internalLinks: [],
  externalLinkStatus: {},
  linkFailures: []
});

/**
 * Breadth-first crawler for one site.
 *
 * The homepage (and the site map it links, when there is one) seeds the
 * frontier. Each page is rendered, classified against the pages already
 * recorded, saved, dated and mined for links; external links are checked once
 * per site. Page failures are recorded and never end the crawl.
 */
export class SiteCrawler extends BaseCrawler {
  /** Titles by requested URL, used to name child directories and source pages */
  private readonly titles = new Map<string, string>();
  /** Save directory of every page by requested URL */
  private readonly directories = new Map<string, string[]>();
  private statuses: number[] = [];

  constructor(
    private readonly deps: SiteCrawlerDependencies,
    urlQueue: IUrlQueue,
    ledger: CrawlLedger,
    options: Partial<CrawlOptions> = {}
  ) {
    super(urlQueue, ledger, options);
  }

  /**
   * @returns Status codes of the homepage, the site map, and every accepted,
   * skipped or failed page, in visit order
   */
  async crawlSite(entryUrl: string, maxDepth: number = this.options.maxDepth): Promise<number[]> {
    if (this.state === CrawlerState.RUNNING) {
      throw new Error('A crawl is already running');
    }
    this.begin();
    this.state = CrawlerState.RUNNING;
    this.titles.clear();
    this.directories.clear();
    this.statuses = [];

    this.logger.info(`Starting crawl of ${entryUrl} (max depth ${maxDepth})`);

    try {
      await this.seedFrontier(entryUrl);

      while (this.state === CrawlerState.RUNNING && this.urlQueue.size() > 0) {
        const next = this.urlQueue.getNext();
        if (!next) {
          break;
        }
        if (this.urlQueue.isVisited(next.url) || next.depth > maxDepth) {
          continue;
        }
        await this.processEntry(next, maxDepth);
      }

      const progress = this.getProgress();
      this.logger.info(
        `Finished crawl of ${entryUrl}: ${progress.crawledUrls} URLs visited, ` +
        `${progress.recordedPages} pages recorded, ${progress.externalLinks} external links`
      );
      this.state = CrawlerState.IDLE;
      return [...this.statuses];
    } catch (error) {
      this.state = CrawlerState.ERROR;
      this.logger.error(`Crawl of ${entryUrl} aborted: ${describeError(error)}`);
      throw error;
    }
  }

  /**
   * Visit the homepage and the site map, then queue the depth-1 links:
   * the site map's main-content links, its page links when the main content
   * has none, or the homepage's links when there is no usable site map
   */
  private async seedFrontier(entryUrl: string): Promise<void> {
    const home = await this.visitTopLevel(entryUrl);
    const homeLinks = home.internalLinks;

    let sitemapUrl: string | null = null;
    if (home.outcome === 'accepted' && home.status < 400) {
      sitemapUrl = this.deps.sitemapLocator.findSitemapLink(HtmlUtils.parse(home.body), home.actualUrl);
    }

    if (sitemapUrl && !this.urlQueue.isVisited(sitemapUrl)) {
      this.logger.info(`Using site map ${sitemapUrl}`);
      const sitemap = await this.visitTopLevel(sitemapUrl);

      let sitemapLinks: string[] = [];
      if (sitemap.outcome === 'accepted') {
        sitemapLinks = this.deps.linkExtractor.extractMainContentLinks(HtmlUtils.parse(sitemap.body), sitemapUrl);
        if (sitemapLinks.length === 0) {
          sitemapLinks = sitemap.internalLinks;
        }
      }

      this.enqueue(sitemapLinks, entryUrl, 1);
      if (this.urlQueue.size() === 0) {
        this.logger.info('Site map yielded no new links, falling back to homepage links');
        this.enqueue(homeLinks, entryUrl, 1);
      }
      return;
    }

    this.enqueue(homeLinks, entryUrl, 1);
  }

  /**
   * Visit a depth-0 page; its status counts whatever the outcome
   */
  private async visitTopLevel(url: string): Promise<CrawlResult> {
    const entry: FrontierEntry = { url, parentUrl: '', depth: 0 };
    this.urlQueue.markVisited(url);
    const result = await this.visit(entry);
    this.urlQueue.markVisited(result.actualUrl);
    this.fold(entry, result);
    this.statuses.push(result.status);
    return result;
  }

  private async processEntry(entry: FrontierEntry, maxDepth: number): Promise<void> {
    this.urlQueue.markVisited(entry.url);
    const result = await this.visit(entry);
    if (result.actualUrl !== entry.url) {
      this.urlQueue.markVisited(result.actualUrl);
    }
    this.fold(entry, result);

    switch (result.outcome) {
      case 'accepted':
        this.statuses.push(result.status);
        if (entry.depth < maxDepth) {
          this.enqueue(result.internalLinks, entry.url, entry.depth + 1);
        }
        break;
      case 'pagination':
        // Sibling list pages belong to the same level as the page that linked them
        if (entry.depth < maxDepth) {
          this.enqueue(result.internalLinks, entry.parentUrl, entry.depth);
        }
        break;
      case 'frameset':
        this.enqueue(result.internalLinks, entry.parentUrl, entry.depth);
        break;
      case 'skipped':
      case 'failed':
        this.statuses.push(result.status);
        break;
      case 'duplicate':
        break;
    }
  }

  /**
   * Record what a visit produced in the ledger
   */
  private fold(entry: FrontierEntry, result: CrawlResult): void {
    const sourcePage = this.sourcePageOf(entry.parentUrl);

    switch (result.outcome) {
      case 'accepted':
      case 'skipped':
        this.titles.set(entry.url, result.title);
        this.ledger.recordPage(result.actualUrl, {
          title: result.title,
          lastUpdated: result.lastUpdated,
          savedPath: result.savedPath,
          httpStatus: result.status,
          depth: entry.depth,
          sourcePage
        });
        break;
      case 'failed':
        this.ledger.recordPage(result.actualUrl, {
          title: '',
          lastUpdated: CRAWL_FAILED,
          savedPath: '',
          httpStatus: result.status,
          depth: entry.depth,
          sourcePage
        });
        break;
      default:
        break;
    }

    for (const failure of result.linkFailures) {
      this.ledger.recordPage(failure.href, {
        title: `[LINK_ERROR] ${failure.href} - ${failure.error}`,
        lastUpdated: CRAWL_FAILED,
        savedPath: '',
        httpStatus: 0,
        depth: entry.depth + 1,
        sourcePage: { title: result.title, url: result.requestedUrl }
      });
    }
  }

  /**
   * Visit one page. Navigation failures of http URLs are retried once over https.
   */
  private async visit(entry: FrontierEntry): Promise<CrawlResult> {
    const { url, depth } = entry;
    const indent = LoggingUtils.indent(depth);
    this.logger.info(`${indent}Crawling (depth ${depth}): ${url}`);

    if (UrlUtils.skippedResourceLocation(url)) {
      this.logger.info(`${indent}-> Skipping file ${url}`);
      return {
        ...emptyResult(url),
        outcome: 'skipped',
        status: 200,
        body: PageMarker.SKIPPED_FILE,
        title: UrlUtils.lastSegment(url) || 'skipped_file'
      };
    }

    const directory = this.directoryFor(url, entry.parentUrl);
    const first = await this.attempt(url, entry, directory);
    if (first.kind === 'done') {
      return first.result;
    }

    let status = first.status;
    const secureUrl = UrlUtils.toSecureScheme(url);
    if (secureUrl) {
      this.logger.info(`${indent}-> Retrying over https: ${secureUrl}`);
      const second = await this.attempt(secureUrl, entry, directory);
      if (second.kind === 'done') {
        return second.result;
      }
      if (second.status > 0) {
        status = second.status;
      }
    }

    this.logger.warn(`${indent}-> Failed to crawl ${url}: ${describeError(first.error)}`);
    return {
      ...emptyResult(url),
      actualUrl: first.actualUrl,
      status,
      body: PageMarker.CRAWL_FAILED
    };
  }

  private async attempt(url: string, entry: FrontierEntry, directory: string[]): Promise<Attempt> {
    let page: IRenderedPage;
    try {
      page = await this.deps.renderer.navigate(url, this.options.timeout);
    } catch (error) {
      const status = error instanceof NavigationError ? error.status : 0;
      return { kind: 'failed', actualUrl: url, status, error };
    }

    try {
      return { kind: 'done', result: await this.processPage(page, url, entry.depth, directory) };
    } catch (error) {
      return { kind: 'failed', actualUrl: page.finalUrl, status: page.statusCode, error };
    } finally {
      await page.close();
    }
  }

  /**
   * Classify, save, date and mine a loaded page
   */
  private async processPage(
    page: IRenderedPage,
    requestedUrl: string,
    depth: number,
    directory: string[]
  ): Promise<CrawlResult> {
    const indent = LoggingUtils.indent(depth + 1);
    const base = { ...emptyResult(requestedUrl), actualUrl: page.finalUrl, status: page.statusCode };

    const mode = await this.deps.pageDetector.detect(page, depth);
    if (mode.type === 'frameset') {
      return {
        ...base,
        outcome: 'frameset',
        body: PageMarker.FRAMESET_CONTAINER,
        title: 'Frameset Container',
        internalLinks: mode.links
      };
    }

    const html = await page.content();
    const document = HtmlUtils.parse(html);
    const title = HtmlUtils.pageTitle(document, requestedUrl);

    const decision = await this.deps.classifier.classify(
      { actualUrl: page.finalUrl, title, html },
      this.ledger.pageRecords
    );

    switch (decision.classification) {
      case Classification.EXACT_DUPLICATE:
        this.logger.info(`${indent}-> Duplicate of ${decision.matchedUrl ?? page.finalUrl}, skipped`);
        return {
          ...base,
          outcome: 'duplicate',
          title,
          body: decision.paginationDisabled ? PageMarker.SKIPPED_PAGINATION : PageMarker.SKIPPED_DUPLICATE
        };
      case Classification.PAGINATION_VARIANT:
        this.logger.info(`${indent}-> Pagination of ${decision.matchedUrl ?? ''}, following its links only`);
        return {
          ...base,
          outcome: 'pagination',
          title,
          body: PageMarker.LIST_PAGINATION,
          internalLinks: this.deps.linkExtractor.extractLinks(document, page.finalUrl).internal
        };
      default:
        break;
    }

    const savedPath = await this.deps.pageStore.save(html, title, directory);
    const lastUpdated = this.deps.dateExtractor.extractLastUpdated(document, depth);
    const links = this.deps.linkExtractor.extractLinks(document, page.finalUrl);
    const externalLinkStatus = await this.checkExternalLinks(links.external, { title, url: requestedUrl });

    this.logger.info(
      `${indent}-> ${title} (${lastUpdated}), ${links.internal.length} internal / ${links.external.length} external links`
    );

    return {
      ...base,
      outcome: 'accepted',
      body: html,
      title,
      lastUpdated,
      savedPath,
      internalLinks: links.internal,
      externalLinkStatus,
      linkFailures: links.failures
    };
  }

  /**
   * Check the links this site has not seen yet; known links reuse their stored status
   */
  private async checkExternalLinks(links: string[], source: SourcePage): Promise<Record<string, number>> {
    const unseen = this.ledger.claimExternalLinks(links, source);
    if (unseen.length > 0) {
      const results = await this.runCancellable(
        unseen.map(link => (signal: AbortSignal) => this.deps.linkVerifier.checkLink(link, signal))
      );
      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          this.ledger.setExternalLinkStatus(unseen[index], result.value);
        } else {
          this.logger.debug(`Link check for ${unseen[index]} did not finish: ${describeError(result.reason)}`);
        }
      });
    }

    const statuses: Record<string, number> = {};
    for (const link of links) {
      statuses[link] = this.ledger.externalLinkStatus(link);
    }
    return statuses;
  }

  private enqueue(links: string[], parentUrl: string, depth: number): void {
    this.urlQueue.addBulk(
      links
        .filter(link => !this.urlQueue.isVisited(link))
        .map(link => ({ url: link, parentUrl, depth }))
    );
  }

  /**
   * Top-level pages go in the site folder; every other page goes in a
   * `<parent title>_links` folder below its parent's folder
   */
  private directoryFor(url: string, parentUrl: string): string[] {
    if (!parentUrl) {
      this.directories.set(url, []);
      return [];
    }
    const parentDirectory = this.directories.get(parentUrl) ?? [];
    const parentTitle = this.titles.get(parentUrl) ?? (UrlUtils.lastPathSegment(parentUrl) || 'page');
    const directory = [...parentDirectory, FileNameUtils.linksDirectoryName(parentTitle)];
    this.directories.set(url, directory);
    return directory;
  }

  private sourcePageOf(parentUrl: string): SourcePage | null {
    if (!parentUrl) {
      return null;
    }
    return { title: this.titles.get(parentUrl) ?? '', url: parentUrl };
  }
}
