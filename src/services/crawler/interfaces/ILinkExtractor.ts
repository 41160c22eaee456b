import { IHtmlDocument } from './IHtmlDocument';
import { LinkParseFailure } from './types';

export interface ExtractedLinks {
  /** Same-host links, fragment removed, first occurrence order */
  internal: string[];
  /** Off-site http(s) links, fragment removed, de-duplicated */
  external: string[];
  failures: LinkParseFailure[];
}

/**
 * Interface for link extraction.
 * Implementations resolve anchors against the page URL and split them into
 * same-site and off-site links.
 */
export interface ILinkExtractor {
  /**
   * Extract all anchors of a page
   * @param document Parsed page
   * @param pageUrl Post-redirect URL of the page, used to resolve and to decide what is internal
   */
  extractLinks(document: IHtmlDocument, pageUrl: string): ExtractedLinks;

  /**
   * Extract internal links from the main content region of an index page
   * @returns Links found in the region, empty when no region has any
   */
  extractMainContentLinks(document: IHtmlDocument, pageUrl: string): string[];
}

/**
 * Finds the site-map / site-index page linked from a homepage.
 */
export interface ISitemapLocator {
  /**
   * @returns Absolute URL without fragment, or null when the page links no site map
   */
  findSitemapLink(document: IHtmlDocument, pageUrl: string): string | null;
}
