import { CrawlProgress, ExternalLinkRecord, PageRecord, PageSummary } from './types';

/**
 * Interface for crawler implementations that audit one site.
 */
export interface ICrawler {
  /**
   * Crawl a site breadth-first from its entry page
   * @param entryUrl The homepage to start from
   * @param maxDepth Largest link distance from the entry page that is visited,
   * the configured default when omitted
   * @returns HTTP status codes of the pages that count toward the tally, in visit order
   */
  crawlSite(entryUrl: string, maxDepth?: number): Promise<number[]>;

  /**
   * Abort the running crawl after the current page; pending link checks are cancelled
   */
  stop(): Promise<void>;

  getProgress(): CrawlProgress;

  getPageRecords(): ReadonlyMap<string, PageRecord>;

  getExternalLinks(): ReadonlyMap<string, ExternalLinkRecord>;

  /**
   * Sorted summary in the page_summary.json layout
   */
  getSummary(): PageSummary;
}
