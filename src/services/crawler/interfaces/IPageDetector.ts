import { IRenderedPage } from './IPageRenderer';
import { RenderMode } from './types';

/**
 * Interface for render-mode detection.
 * Implementations inspect a loaded page and decide whether it is a static
 * page, a single-page application that needs extra settle time, or a legacy
 * frameset whose content lives in other documents.
 */
export interface IPageDetector {
  /**
   * Classify a loaded page. For SPAs the implementation also performs the
   * bounded network-idle wait before returning.
   * @param page A navigated page handle
   * @param depth Crawl depth, used for log indentation
   */
  detect(page: IRenderedPage, depth: number): Promise<RenderMode>;
}
