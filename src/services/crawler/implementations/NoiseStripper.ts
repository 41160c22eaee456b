import { IHtmlDocument } from '../interfaces/IHtmlDocument';

/**
 * Landmark elements that carry site chrome rather than page content
 */
export const NOISE_TAGS: readonly string[] = ['header', 'nav', 'aside', 'footer'];

/**
 * Class-name fragments of footer, navigation and counter widgets.
 * Matched as case-insensitive substrings of the class attribute.
 */
export const NOISE_CLASS_KEYWORDS: readonly string[] = [
  'base-footer', 'site-footer', 'footer-container', 'footer-wrapper', 'footer-bottom',
  'site-info', 'colophon', 'copyright', 'update-time', 'visit-count',
  'nav', 'navigation', 'navbar', 'nav-menu', 'main-nav', 'site-nav',
  'breadcrumb', 'sidebar', 'menu', 'top-menu'
];

/**
 * Removes navigation and footer chrome before a page's text is scanned for dates
 */
export class NoiseStripper {
  constructor(
    private readonly tags: readonly string[] = NOISE_TAGS,
    private readonly classKeywords: readonly string[] = NOISE_CLASS_KEYWORDS
  ) {}

  /**
   * @returns A stripped copy; the given document is left untouched
   */
  strip(document: IHtmlDocument): IHtmlDocument {
    const stripped = document.clone();
    stripped.removeElements(this.tags);
    stripped.removeByClassKeyword(this.classKeywords);
    return stripped;
  }
}
