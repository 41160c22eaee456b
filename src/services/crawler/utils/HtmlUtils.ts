import * as cheerio from 'cheerio';
import { AnchorInfo, IHtmlDocument } from '../interfaces/IHtmlDocument';

const NON_TEXT_ELEMENTS = 'script, style, noscript';
const TEXT_NODE = 3;

/**
 * IHtmlDocument backed by a cheerio tree
 */
export class CheerioDocument implements IHtmlDocument {
  private readonly $: cheerio.CheerioAPI;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  title(): string | null {
    const title = this.$('title').first().text().trim();
    return title || null;
  }

  clone(): IHtmlDocument {
    return new CheerioDocument(this.$.html());
  }

  removeElements(tagNames: readonly string[]): number {
    if (tagNames.length === 0) {
      return 0;
    }
    const matched = this.$(tagNames.join(', '));
    const count = matched.length;
    matched.remove();
    return count;
  }

  removeByClassKeyword(keywords: readonly string[]): number {
    const $ = this.$;
    const lowered = keywords.map(keyword => keyword.toLowerCase());
    const noisy = $('[class]').filter((_, element) => {
      const classNames = ($(element).attr('class') ?? '').toLowerCase();
      return lowered.some(keyword => classNames.includes(keyword));
    });
    const count = noisy.length;
    noisy.remove();
    return count;
  }

  hasBody(): boolean {
    return this.$('body').length > 0;
  }

  textNodes(): string[] {
    const $ = this.$;
    const scope = this.hasBody() ? $('body').first() : $.root().children();
    const texts: string[] = [];

    const pushText = (text: string): void => {
      const trimmed = text.trim();
      if (trimmed) {
        texts.push(trimmed);
      }
    };

    scope.contents().each((_, node) => {
      if (node.nodeType === TEXT_NODE) {
        pushText($(node).text());
      }
    });
    scope
      .find('*')
      .not(NON_TEXT_ELEMENTS)
      .contents()
      .each((_, node) => {
        if (node.nodeType === TEXT_NODE) {
          pushText($(node).text());
        }
      });

    return texts;
  }

  metaContent(key: string): string | null {
    const $ = this.$;
    for (const attribute of ['property', 'name']) {
      const meta = $('meta').filter((_, element) => $(element).attr(attribute) === key).first();
      const content = meta.attr('content');
      if (content !== undefined) {
        return content;
      }
    }
    return null;
  }

  anchors(): AnchorInfo[] {
    const $ = this.$;
    const anchors: AnchorInfo[] = [];
    $('a[href]').each((_, element) => {
      const anchor = $(element);
      anchors.push(CheerioDocument.anchorInfo(anchor.attr('href'), anchor.attr('title'), anchor.text()));
    });
    return anchors;
  }

  firstRegionAnchors(selectors: readonly string[]): { selector: string; anchors: AnchorInfo[] } | null {
    const $ = this.$;
    for (const selector of selectors) {
      const anchors: AnchorInfo[] = [];
      try {
        $(selector).first().find('a[href]').each((_, element) => {
          const anchor = $(element);
          anchors.push(CheerioDocument.anchorInfo(anchor.attr('href'), anchor.attr('title'), anchor.text()));
        });
      } catch (error) {
        // Unsupported selector syntax, try the next one
        continue;
      }

      if (anchors.length > 0) {
        return { selector, anchors };
      }
    }
    return null;
  }

  frameSources(): string[] {
    const $ = this.$;
    const sources: string[] = [];
    $('frame').each((_, element) => {
      const src = $(element).attr('src');
      if (src) {
        sources.push(src);
      }
    });
    return sources;
  }

  textPreview(length: number): string {
    const copy = cheerio.load(this.$.html());
    copy('script, style').remove();
    return HtmlUtils.collapseWhitespace(copy.root().text()).slice(0, length);
  }

  private static anchorInfo(href: string | undefined, title: string | undefined, text: string): AnchorInfo {
    return { href: href ?? '', title: title ?? '', text: text.trim() };
  }
}

/**
 * Utilities for handling HTML content in the crawler service
 */
export class HtmlUtils {
  /**
   * Parse HTML into the document capability used across the crawler
   */
  static parse(html: string): IHtmlDocument {
    return new CheerioDocument(html);
  }

  /**
   * First `length` characters of the visible text, used to compare two pages
   * that share a title
   */
  static contentPreview(html: string, length: number): string {
    if (!html) {
      return '';
    }
    return HtmlUtils.parse(html).textPreview(length);
  }

  static collapseWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
  }

  /**
   * Page title with the fallbacks used for naming saved files:
   * the last URL segment, then "index"
   */
  static pageTitle(document: IHtmlDocument, url: string): string {
    const title = document.title();
    if (title) {
      return title;
    }
    const parts = url.split('/');
    return parts[parts.length - 1] || 'index';
  }
}
