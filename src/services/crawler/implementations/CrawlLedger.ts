import {
  CRAWL_FAILED,
  ExternalLinkRecord,
  NO_DATE,
  PageRecord,
  PageSummary,
  SourcePage
} from '../interfaces/types';
import { DateExtractor } from './DateExtractor';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * A page or external link that did not answer with 200
 */
export interface ProblemLink {
  problematicUrl: string;
  status: number;
  /** Page that linked to it, empty for top-level pages */
  parentUrl: string;
}

export interface ProblemLinks {
  errorPages: ProblemLink[];
  errorExternalLinks: ProblemLink[];
}

/**
 * Sort bucket for a page's lastUpdated value: real dates first, sentinels last
 */
const dateBucket = (lastUpdated: string): number => {
  if (DateExtractor.parseIsoDate(lastUpdated) !== null) {
    return 0;
  }
  if (lastUpdated === NO_DATE) {
    return 2;
  }
  if (lastUpdated === CRAWL_FAILED) {
    return 3;
  }
  return 1;
};

const statusClass = (status: number): number => {
  if (status >= 200 && status < 300) return 0;
  if (status >= 300 && status < 400) return 1;
  if (status >= 400 && status < 500) return 2;
  if (status >= 500) return 3;
  return 4;
};

const compareCodePoints = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Per-site record of every recorded page and every external link seen.
 * Pages are keyed by post-redirect URL and a written record is never replaced;
 * external links keep the first page that referenced them.
 */
export class CrawlLedger {
  private readonly pages = new Map<string, PageRecord>();
  private readonly externalLinks = new Map<string, ExternalLinkRecord>();
  private readonly logger = LoggingUtils.createTaggedLogger('ledger');

  /**
   * @returns false when the URL already has a record, which is kept
   */
  recordPage(url: string, record: PageRecord): boolean {
    if (this.pages.has(url)) {
      this.logger.warn(`Page ${url} is already recorded, ignoring "${record.title}"`);
      return false;
    }
    this.pages.set(url, record);
    return true;
  }

  hasPage(url: string): boolean {
    return this.pages.has(url);
  }

  get pageRecords(): ReadonlyMap<string, PageRecord> {
    return this.pages;
  }

  get externalLinkRecords(): ReadonlyMap<string, ExternalLinkRecord> {
    return this.externalLinks;
  }

  /**
   * Register external links referenced by a page
   * @returns The links not seen before, in input order, each registered
   * with status 0 until a check result is stored
   */
  claimExternalLinks(urls: readonly string[], source: SourcePage): string[] {
    const claimed: string[] = [];
    for (const url of urls) {
      if (this.externalLinks.has(url)) {
        continue;
      }
      this.externalLinks.set(url, { status: 0, sourcePage: { ...source } });
      claimed.push(url);
    }
    return claimed;
  }

  setExternalLinkStatus(url: string, status: number): void {
    const record = this.externalLinks.get(url);
    if (record) {
      record.status = status;
    }
  }

  /**
   * @returns The stored status, 0 for unknown links
   */
  externalLinkStatus(url: string): number {
    return this.externalLinks.get(url)?.status ?? 0;
  }

  /**
   * Pages ordered by last-updated date (newest first, then undatable, then
   * `[no date]`, then failures); external links ordered by status class
   * (2xx, 3xx, 4xx, 5xx, unreachable) and then by URL
   */
  toSummary(): PageSummary {
    const pages = Array.from(this.pages.entries());
    pages.sort(([, a], [, b]) => {
      const bucketA = dateBucket(a.lastUpdated);
      const bucketB = dateBucket(b.lastUpdated);
      if (bucketA !== bucketB) {
        return bucketA - bucketB;
      }
      return bucketA === 0 ? compareCodePoints(b.lastUpdated, a.lastUpdated) : 0;
    });

    const links = Array.from(this.externalLinks.entries());
    links.sort(([urlA, a], [urlB, b]) =>
      statusClass(a.status) - statusClass(b.status) || compareCodePoints(urlA, urlB));

    return {
      page_summary: Object.fromEntries(pages),
      external_links: Object.fromEntries(links)
    };
  }

  clear(): void {
    this.pages.clear();
    this.externalLinks.clear();
  }
}

/**
 * Pages and external links whose status is anything but 200
 */
export function extractProblemLinks(summary: PageSummary): ProblemLinks {
  const errorPages = Object.entries(summary.page_summary)
    .filter(([, record]) => record.httpStatus !== 200)
    .map(([url, record]) => ({
      problematicUrl: url,
      status: record.httpStatus,
      parentUrl: record.sourcePage?.url ?? ''
    }));

  const errorExternalLinks = Object.entries(summary.external_links)
    .filter(([, record]) => record.status !== 200)
    .map(([url, record]) => ({
      problematicUrl: url,
      status: record.status,
      parentUrl: record.sourcePage.url
    }));

  return { errorPages, errorExternalLinks };
}
