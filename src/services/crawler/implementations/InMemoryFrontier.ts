import { IUrlQueue } from '../interfaces/IUrlQueue';
import { FrontierEntry } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * In-memory FIFO frontier with the visited set of one site crawl.
 * URLs are kept as discovered; the crawler strips fragments before enqueueing.
 */
export class InMemoryFrontier implements IUrlQueue {
  private queue: FrontierEntry[] = [];
  private visited: Set<string> = new Set();
  private readonly logger = LoggingUtils.createTaggedLogger('frontier');

  /**
   * Add an entry to the back of the queue
   * @param entry The URL with its parent and depth
   */
  add(entry: FrontierEntry): void {
    if (!UrlUtils.isValid(entry.url) || this.isVisited(entry.url)) {
      return;
    }

    this.queue.push({ ...entry });
    this.logger.debug(`Queued ${entry.url} (depth: ${entry.depth})`);
  }

  /**
   * Add several entries at once, keeping their order
   */
  addBulk(entries: FrontierEntry[]): void {
    const accepted = entries.filter(({ url }) => UrlUtils.isValid(url) && !this.isVisited(url));
    this.queue.push(...accepted.map(entry => ({ ...entry })));
    this.logger.debug(`Queued ${accepted.length} of ${entries.length} URLs in bulk`);
  }

  getNext(): FrontierEntry | null {
    return this.queue.shift() ?? null;
  }

  size(): number {
    return this.queue.length;
  }

  markVisited(url: string): void {
    this.visited.add(url);
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  visitedCount(): number {
    return this.visited.size;
  }

  /**
   * Reset queue and visited set for a new crawl
   */
  clear(): void {
    this.queue = [];
    this.visited.clear();
    this.logger.debug('Frontier cleared');
  }
}
