/**
 * A navigated page held open by the renderer.
 */
export interface IRenderedPage {
  /** URL after redirects */
  readonly finalUrl: string;
  readonly statusCode: number;

  /** Serialized DOM as currently rendered */
  content(): Promise<string>;

  /** Evaluate a script expression in the page and return its value */
  evaluate(script: string): Promise<unknown>;

  /**
   * Resolve once network activity has been quiet, or reject on timeout
   */
  waitForNetworkIdle(timeoutMs: number): Promise<void>;

  close(): Promise<void>;
}

/**
 * Fetch/render capability the crawler is built on.
 * Implementations load pages in a real browser engine.
 */
export interface IPageRenderer {
  /**
   * Load a URL
   * @param url The URL to load
   * @param timeoutMs Navigation timeout
   * @throws NavigationError when nothing could be loaded
   */
  navigate(url: string, timeoutMs: number): Promise<IRenderedPage>;

  /**
   * Release the browser engine
   */
  cleanup(): Promise<void>;
}
