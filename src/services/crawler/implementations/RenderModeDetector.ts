import { IPageDetector } from '../interfaces/IPageDetector';
import { IRenderedPage } from '../interfaces/IPageRenderer';
import { RenderMode } from '../interfaces/types';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { describeError } from '../../../utils/errors';

/**
 * Evaluated in the page. Returns the framework name or 'Static'.
 */
export const FRAMEWORK_PROBE = `(() => {
  if (window.React || window.__REACT_DEVTOOLS_GLOBAL_HOOK__ || document.querySelector('[data-reactroot], #__next')) {
    return 'React';
  }
  if (window.Vue || window.__VUE__ || document.querySelector('[data-v-app], #__nuxt')) {
    return 'Vue';
  }
  if (window.angular || document.querySelector('.ng-version, [ng-version], app-root')) {
    return 'Angular';
  }
  return 'Static';
})()`;

const STATIC = 'Static';

export interface RenderModeDetectorOptions {
  /** Upper bound on the network-idle wait for client-rendered pages */
  spaIdleTimeout?: number;
}

/**
 * Tells static pages, client-rendered applications and legacy framesets apart.
 * Framesets are checked first, on the served markup; framework markers are
 * probed in the running page.
 */
export class RenderModeDetector implements IPageDetector {
  private readonly logger = LoggingUtils.createTaggedLogger('render-mode');
  private readonly spaIdleTimeout: number;

  constructor(options: RenderModeDetectorOptions = {}) {
    this.spaIdleTimeout = options.spaIdleTimeout ?? 5000;
  }

  async detect(page: IRenderedPage, depth: number): Promise<RenderMode> {
    const indent = LoggingUtils.indent(depth + 1);

    const frameSources = HtmlUtils.parse(await page.content()).frameSources();
    if (frameSources.length > 0) {
      this.logger.info(`${indent}-> Frameset detected`);
      return { type: 'frameset', links: this.resolveFrames(frameSources, page.finalUrl) };
    }

    const probe = await page.evaluate(FRAMEWORK_PROBE);
    const framework = typeof probe === 'string' ? probe : STATIC;
    if (framework === STATIC) {
      this.logger.debug(`${indent}-> Static page`);
      return { type: 'static' };
    }

    this.logger.info(`${indent}-> ${framework} application, waiting for network idle`);
    try {
      await page.waitForNetworkIdle(this.spaIdleTimeout);
      this.logger.debug(`${indent}-> ${framework} rendering settled`);
    } catch (error) {
      this.logger.info(`${indent}-> ${framework} idle wait ended early (${describeError(error)}), using current content`);
    }
    return { type: 'spa', framework };
  }

  private resolveFrames(sources: string[], baseUrl: string): string[] {
    const links: string[] = [];
    for (const src of sources) {
      try {
        links.push(UrlUtils.resolveUrl(src, baseUrl));
      } catch (error) {
        this.logger.debug(`Ignoring unresolvable frame source ${src}: ${describeError(error)}`);
      }
    }
    return links;
  }
}
