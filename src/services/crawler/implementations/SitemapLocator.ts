import { IHtmlDocument } from '../interfaces/IHtmlDocument';
import { ISitemapLocator } from '../interfaces/ILinkExtractor';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { describeError } from '../../../utils/errors';

/** Matched against href, title and text */
const HREF_KEYWORDS = ['sitemap', 'webmap'];
/** Matched against title and text only */
const LABEL_KEYWORDS = ['sitemap', 'webmap', '網站導覽', '網頁導覽'];

/**
 * Finds the site-map link of a homepage by keyword
 */
export class SitemapLocator implements ISitemapLocator {
  private readonly logger = LoggingUtils.createTaggedLogger('crawler');

  findSitemapLink(document: IHtmlDocument, pageUrl: string): string | null {
    for (const anchor of document.anchors()) {
      const href = anchor.href.toLowerCase();
      if (href.startsWith('#')) {
        continue;
      }

      const title = anchor.title.toLowerCase();
      const text = anchor.text.toLowerCase();
      const matches =
        HREF_KEYWORDS.some(keyword => href.includes(keyword)) ||
        LABEL_KEYWORDS.some(keyword => title.includes(keyword) || text.includes(keyword));
      if (!matches) {
        continue;
      }

      try {
        const sitemapUrl = UrlUtils.stripFragment(UrlUtils.resolveUrl(anchor.href, pageUrl));
        this.logger.info(`Found site map link: ${sitemapUrl}`);
        return sitemapUrl;
      } catch (error) {
        this.logger.debug(`Ignoring unresolvable site map link ${anchor.href}: ${describeError(error)}`);
      }
    }
    return null;
  }
}
