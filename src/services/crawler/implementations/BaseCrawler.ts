import { ICrawler } from '../interfaces/ICrawler';
import { IUrlQueue } from '../interfaces/IUrlQueue';
import {
  CrawlOptions,
  CrawlProgress,
  CrawlerState,
  ExternalLinkRecord,
  PageRecord,
  PageSummary
} from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { TaskGroup } from '../utils/TaskGroup';
import { CrawlLedger } from './CrawlLedger';

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  maxDepth: 2,
  timeout: 15000,
  linkCheckConcurrency: 20
};

/**
 * Abstract base class for crawler implementations
 * Provides common functionality and state management for all crawlers
 */
export abstract class BaseCrawler implements ICrawler {
  protected state: CrawlerState = CrawlerState.IDLE;
  protected options: CrawlOptions;
  protected logger = LoggingUtils.createTaggedLogger('crawler');
  /** Link checks in flight, cancelled by stop() */
  protected activeGroup: TaskGroup | null = null;

  /**
   * @param urlQueue Frontier of pages still to visit
   * @param ledger Records of the site being crawled
   * @param options Default crawl options
   */
  constructor(
    protected readonly urlQueue: IUrlQueue,
    protected readonly ledger: CrawlLedger,
    options: Partial<CrawlOptions> = {}
  ) {
    this.options = {
      ...DEFAULT_CRAWL_OPTIONS,
      ...options
    };
  }

  abstract crawlSite(entryUrl: string, maxDepth?: number): Promise<number[]>;

  get currentState(): CrawlerState {
    return this.state;
  }

  /**
   * Stop the current crawl after the page being visited.
   * Cannot be resumed after stopping
   */
  async stop(): Promise<void> {
    if (this.state === CrawlerState.RUNNING) {
      this.logger.info('Stopping crawler');
      this.state = CrawlerState.STOPPING;
      this.activeGroup?.cancel();
    } else {
      this.logger.warn(`Cannot stop crawler in state: ${this.state}`);
    }
  }

  getProgress(): CrawlProgress {
    return {
      crawledUrls: this.urlQueue.visitedCount(),
      pendingUrls: this.urlQueue.size(),
      recordedPages: this.ledger.pageRecords.size,
      externalLinks: this.ledger.externalLinkRecords.size
    };
  }

  getPageRecords(): ReadonlyMap<string, PageRecord> {
    return this.ledger.pageRecords;
  }

  getExternalLinks(): ReadonlyMap<string, ExternalLinkRecord> {
    return this.ledger.externalLinkRecords;
  }

  getSummary(): PageSummary {
    return this.ledger.toSummary();
  }

  /**
   * Reset per-site state before a new crawl
   */
  protected begin(): void {
    this.urlQueue.clear();
    this.ledger.clear();
  }

  /**
   * Run tasks in a group that stop() can cancel
   */
  protected async runCancellable<T>(
    tasks: Array<(signal: AbortSignal) => Promise<T>>
  ): Promise<Array<PromiseSettledResult<T>>> {
    const group = new TaskGroup(this.options.linkCheckConcurrency);
    this.activeGroup = group;
    if (this.state !== CrawlerState.RUNNING) {
      group.cancel();
    }
    try {
      return await group.run(tasks);
    } finally {
      this.activeGroup = null;
    }
  }
}
