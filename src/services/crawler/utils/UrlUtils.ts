import { URL } from 'url';

/**
 * Query keys that mark a listing page as one page of a paginated list
 */
export const PAGINATION_PARAMS: ReadonlySet<string> = new Set([
  'page', 'pagesize', 'offset', 'limit', 'start', 'count', 'p', 'pn'
]);

/**
 * Downloads and media that are never navigated
 */
export const SKIPPED_EXTENSIONS: readonly string[] = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ods', '.odt', '.ppt', '.pptx',
  '.zip', '.rar', '.7z', '.tar', '.gz',
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.svg', '.webp', '.ico',
  '.mp4', '.avi', '.mov', '.wmv', '.flv', '.webm', '.mkv',
  '.mp3', '.wav', '.flac', '.aac', '.ogg',
  '.txt', '.csv', '.json', '.xml'
];

const NON_NAVIGABLE_PREFIXES = ['#', 'javascript:', 'mailto:', 'tel:'];

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Removes the fragment from a URL string without otherwise rewriting it
   */
  static stripFragment(url: string): string {
    const index = url.indexOf('#');
    return index === -1 ? url : url.slice(0, index);
  }

  /**
   * Host (with port) of a URL, or null if it cannot be parsed
   */
  static extractHost(url: string): string | null {
    try {
      return new URL(url).host;
    } catch (error) {
      return null;
    }
  }

  static isValid(url: string): boolean {
    try {
      new URL(url);
      return true;
    } catch (error) {
      return false;
    }
  }

  /**
   * Resolves an href against a base URL
   * @throws TypeError when the href cannot be resolved
   */
  static resolveUrl(href: string, baseUrl: string): string {
    return new URL(href, baseUrl).toString();
  }

  /**
   * Anchors that never lead to another document
   */
  static isNavigableHref(href: string): boolean {
    const trimmed = href.trim().toLowerCase();
    if (trimmed === '') {
      return false;
    }
    return !NON_NAVIGABLE_PREFIXES.some(prefix => trimmed.startsWith(prefix));
  }

  /**
   * Number of non-empty path segments: `/` has 0, `/a/b.html` has 2
   */
  static pathSegmentCount(url: string): number {
    try {
      return new URL(url).pathname.split('/').filter(Boolean).length;
    } catch (error) {
      return 0;
    }
  }

  /**
   * True when any query key is a known pagination parameter (case-insensitive)
   */
  static hasPaginationParams(url: string): boolean {
    try {
      const keys = Array.from(new URL(url).searchParams.keys());
      return keys.some(key => PAGINATION_PARAMS.has(key.toLowerCase()));
    } catch (error) {
      return false;
    }
  }

  /**
   * Detects downloads and media by path suffix or by an extension anywhere in the query
   * @returns 'path' or 'query' for where the extension was seen, null for a regular page
   */
  static skippedResourceLocation(url: string): 'path' | 'query' | null {
    let pathname: string;
    let query: string;
    try {
      const parsed = new URL(url);
      pathname = parsed.pathname.toLowerCase();
      query = parsed.search.toLowerCase();
    } catch (error) {
      return null;
    }

    if (SKIPPED_EXTENSIONS.some(ext => pathname.endsWith(ext))) {
      return 'path';
    }
    if (SKIPPED_EXTENSIONS.some(ext => query.includes(ext))) {
      return 'query';
    }
    return null;
  }

  /**
   * The https variant of an http URL, or null for any other scheme
   */
  static toSecureScheme(url: string): string | null {
    return url.startsWith('http://') ? `https://${url.slice('http://'.length)}` : null;
  }

  /**
   * Last path segment, used to name pages without a title
   */
  static lastSegment(url: string): string {
    const parts = UrlUtils.stripFragment(url).split('/');
    return parts[parts.length - 1] ?? '';
  }

  /**
   * Last segment of the URL path, empty for directory URLs and unparsable input
   */
  static lastPathSegment(url: string): string {
    try {
      const segments = new URL(url).pathname.split('/');
      return segments[segments.length - 1] ?? '';
    } catch (error) {
      return '';
    }
  }

  /**
   * Folder name for a site: its host with dots replaced
   */
  static siteFolderName(url: string): string {
    const host = UrlUtils.extractHost(url);
    return (host ?? 'site').replace(/[.:]/g, '_');
  }
}
