import { FrontierEntry } from './types';

/**
 * Interface for the crawl frontier.
 * Implementations keep entries in FIFO order and own the visited set of one
 * site crawl.
 */
export interface IUrlQueue {
  /**
   * Append an entry to the back of the queue
   * @param entry The URL with its parent and depth
   */
  add(entry: FrontierEntry): void;

  /**
   * Append several entries, preserving their order
   */
  addBulk(entries: FrontierEntry[]): void;

  /**
   * Remove and return the oldest entry
   * @returns The next entry, or null if the queue is empty
   */
  getNext(): FrontierEntry | null;

  size(): number;

  /**
   * Mark a URL as visited. The visited set only grows.
   */
  markVisited(url: string): void;

  isVisited(url: string): boolean;

  visitedCount(): number;

  /**
   * Empty the queue and the visited set before a new crawl
   */
  clear(): void;
}
