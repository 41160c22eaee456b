/**
 * Common types and enums for the crawler service
 */

/**
 * Date sentinels written into PageRecord.lastUpdated
 */
export const NO_DATE = '[no date]';
export const CRAWL_FAILED = '[crawl failed]';

/**
 * Body markers emitted for pages whose content was not saved as a regular page
 */
export enum PageMarker {
  SKIPPED_FILE = '[SKIPPED_FILE]',
  FRAMESET_CONTAINER = '[FRAMESET_CONTAINER]',
  SKIPPED_DUPLICATE = '[SKIPPED_DUPLICATE]',
  SKIPPED_PAGINATION = '[SKIPPED_PAGINATION]',
  LIST_PAGINATION = '[LIST_PAGINATION]',
  CRAWL_FAILED = '[CRAWL_FAILED]'
}

/**
 * A not-yet-visited page waiting in the frontier
 */
export interface FrontierEntry {
  url: string;
  /** Page the link was discovered on, empty for top-level pages */
  parentUrl: string;
  depth: number;
}

export interface SourcePage {
  title: string;
  url: string;
}

/**
 * One recorded page, keyed by its post-redirect URL in the ledger
 */
export interface PageRecord {
  readonly title: string;
  readonly lastUpdated: string;
  readonly savedPath: string;
  readonly httpStatus: number;
  readonly depth: number;
  readonly sourcePage: SourcePage | null;
}

/**
 * Reachability of one off-site URL. Only the first referencing page is kept.
 */
export interface ExternalLinkRecord {
  status: number;
  readonly sourcePage: SourcePage;
}

/**
 * Shape written to page_summary.json
 */
export interface PageSummary {
  page_summary: Record<string, PageRecord>;
  external_links: Record<string, ExternalLinkRecord>;
}

/**
 * An anchor whose href could not be resolved
 */
export interface LinkParseFailure {
  /** The raw href */
  href: string;
  error: string;
}

export type DateTier = 'keyword' | 'generic' | 'meta';

export interface DateCandidate {
  /** Matched text or metadata value the date came from */
  raw: string;
  /** YYYY-MM-DD, or YYYY-MM-01 when only year and month were captured */
  normalized: string;
  tier: DateTier;
}

/**
 * Result of render-mode detection on a loaded page
 */
export type RenderMode =
  | { type: 'static' }
  | { type: 'spa'; framework: string }
  | { type: 'frameset'; links: string[] };

export enum Classification {
  NEW = 'new',
  EXACT_DUPLICATE = 'exact_duplicate',
  PAGINATION_VARIANT = 'pagination_variant',
  DISTINCT = 'distinct'
}

export interface ClassificationResult {
  classification: Classification;
  /** Ledger URL the decision was made against, if any */
  matchedUrl?: string;
  /** True when a pagination variant was downgraded because pagination is disabled */
  paginationDisabled?: boolean;
}

/**
 * How a single page visit ended, as seen by the traversal loop
 */
export type VisitOutcome =
  | 'accepted'
  | 'duplicate'
  | 'pagination'
  | 'skipped'
  | 'frameset'
  | 'failed';

/**
 * Transient per-page result folded into the ledgers by the crawler
 */
export interface CrawlResult {
  outcome: VisitOutcome;
  requestedUrl: string;
  actualUrl: string;
  /** HTTP status, 0 when no response was received */
  status: number;
  /** Saved HTML, or one of the PageMarker values */
  body: string;
  lastUpdated: string;
  title: string;
  savedPath: string;
  /** Same-site links to enqueue (frame sources for framesets) */
  internalLinks: string[];
  /** Status of every external link referenced by the page */
  externalLinkStatus: Record<string, number>;
  /** Anchors whose href could not be resolved */
  linkFailures: LinkParseFailure[];
}

/**
 * Options for crawling one site
 */
export interface CrawlOptions {
  /** Default for crawlSite when no depth is given */
  maxDepth: number;
  /** Per-page navigation timeout in milliseconds */
  timeout: number;
  /** Maximum simultaneous external link checks for one page */
  linkCheckConcurrency: number;
}

/**
 * Crawl progress information
 */
export interface CrawlProgress {
  crawledUrls: number;
  pendingUrls: number;
  recordedPages: number;
  externalLinks: number;
}

/**
 * Crawler state enum
 */
export enum CrawlerState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  ERROR = 'ERROR'
}
