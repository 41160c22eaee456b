import { IHtmlDocument } from '../interfaces/IHtmlDocument';
import { ExtractedLinks, ILinkExtractor } from '../interfaces/ILinkExtractor';
import { LinkParseFailure } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { describeError } from '../../../utils/errors';

/**
 * Content regions of an index page, most specific first
 */
export const MAIN_CONTENT_SELECTORS: readonly string[] = [
  'main', '[role="main"]',
  '#main', '#content', '#main-content', '#index_main',
  '.main', '.content', '.main-content', '.main_content', '.article',
  '#CCMS_Content', '.group.page-content',
  '[id*="main"]', '[id*="content"]', '[id*="index"]',
  '[class*="main"]', '[class*="content"]', '[class*="article"]'
];

const WEB_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Default implementation of the link extractor
 */
export class DefaultLinkExtractor implements ILinkExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('link-extractor');

  constructor(private readonly mainContentSelectors: readonly string[] = MAIN_CONTENT_SELECTORS) {}

  /**
   * Extract and classify all anchors of a page
   * @param document The parsed page
   * @param pageUrl The post-redirect URL, used for resolving and for the same-site check
   * @returns Unique internal and external links plus the hrefs that could not be resolved
   */
  extractLinks(document: IHtmlDocument, pageUrl: string): ExtractedLinks {
    const host = UrlUtils.extractHost(pageUrl);
    const internal = new Set<string>();
    const external = new Set<string>();
    const failures: LinkParseFailure[] = [];

    for (const { href } of document.anchors()) {
      if (!UrlUtils.isNavigableHref(href)) {
        continue;
      }

      let resolved: URL;
      try {
        resolved = new URL(href, pageUrl);
      } catch (error) {
        this.logger.debug(`Unresolvable link ${href}: ${describeError(error)}`);
        failures.push({ href, error: describeError(error) });
        continue;
      }

      const link = UrlUtils.stripFragment(resolved.toString());
      if (resolved.host === host) {
        internal.add(link);
      } else if (WEB_PROTOCOLS.has(resolved.protocol)) {
        external.add(link);
      }
    }

    return { internal: [...internal], external: [...external], failures };
  }

  /**
   * Extract same-site links from the first content region that has any
   * @param document The parsed index page
   * @param pageUrl URL of the index page
   */
  extractMainContentLinks(document: IHtmlDocument, pageUrl: string): string[] {
    const region = document.firstRegionAnchors(this.mainContentSelectors);
    if (!region) {
      this.logger.debug(`No content region with links on ${pageUrl}`);
      return [];
    }

    const host = UrlUtils.extractHost(pageUrl);
    const links = new Set<string>();
    for (const { href } of region.anchors) {
      if (!UrlUtils.isNavigableHref(href)) {
        continue;
      }
      try {
        const resolved = new URL(href, pageUrl);
        if (resolved.host === host) {
          links.add(UrlUtils.stripFragment(resolved.toString()));
        }
      } catch (error) {
        this.logger.debug(`Skipping invalid URL ${href}: ${describeError(error)}`);
      }
    }

    this.logger.debug(`Found ${links.size} links in content region ${region.selector} of ${pageUrl}`);
    return [...links];
  }
}
