import { mock, MockProxy } from 'jest-mock-extended';
import { SiteCrawler } from '../SiteCrawler';
import { CrawlLedger } from '../CrawlLedger';
import { InMemoryFrontier } from '../InMemoryFrontier';
import { RenderModeDetector } from '../RenderModeDetector';
import { DefaultLinkExtractor } from '../DefaultLinkExtractor';
import { SitemapLocator } from '../SitemapLocator';
import { DateExtractor } from '../DateExtractor';
import { DuplicateClassifier } from '../DuplicateClassifier';
import { ILinkVerifier } from '../../interfaces/ILinkVerifier';
import { IPageStore } from '../../interfaces/IPageStore';
import { CRAWL_FAILED, CrawlerState, NO_DATE } from '../../interfaces/types';
import { FileNameUtils } from '../../utils/FileNameUtils';
import { FakeSiteRenderer, htmlPage } from '../../test-utils/mocks/FakeSiteRenderer';

class MemoryPageStore implements IPageStore {
  readonly supportsContentComparison = true;
  readonly saved = new Map<string, string>();

  async save(content: string, suggestedName: string, directory: string[]): Promise<string> {
    const savedPath = [...directory, FileNameUtils.fileName(suggestedName)].join('/');
    this.saved.set(savedPath, content);
    return savedPath;
  }

  async read(savedPath: string): Promise<string | null> {
    return this.saved.get(savedPath) ?? null;
  }
}

const HOME = 'https://example.com/';
const url = (path: string): string => `https://example.com${path}`;

describe('SiteCrawler', () => {
  let renderer: FakeSiteRenderer;
  let pageStore: MemoryPageStore;
  let linkVerifier: MockProxy<ILinkVerifier>;

  const createCrawler = (enablePagination = true): SiteCrawler =>
    new SiteCrawler(
      {
        renderer,
        pageDetector: new RenderModeDetector({ spaIdleTimeout: 10 }),
        linkExtractor: new DefaultLinkExtractor(),
        sitemapLocator: new SitemapLocator(),
        dateExtractor: new DateExtractor({ now: () => new Date(2024, 5, 15) }),
        classifier: new DuplicateClassifier(pageStore, { enablePagination }),
        linkVerifier,
        pageStore
      },
      new InMemoryFrontier(),
      new CrawlLedger(),
      { timeout: 1000 }
    );

  beforeEach(() => {
    renderer = new FakeSiteRenderer();
    pageStore = new MemoryPageStore();
    linkVerifier = mock<ILinkVerifier>();
    linkVerifier.checkLink.mockResolvedValue(200);
  });

  describe('traversal', () => {
    beforeEach(() => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '<p>更新日期：2024-03-01</p>', ['/a', '/b']) })
        .addPage(url('/a'), { html: htmlPage('Page A', '<p>A</p>', ['/a/deep', '/']) })
        .addPage(url('/b'), { html: htmlPage('Page B', '<p>B</p>') })
        .addPage(url('/a/deep'), { html: htmlPage('Deep', '<p>Deep</p>', ['/a/deeper']) })
        .addPage(url('/a/deeper'), { html: htmlPage('Deeper', '<p>Deeper</p>') });
    });

    it('should visit pages breadth-first up to the maximum depth', async () => {
      const statuses = await createCrawler().crawlSite(HOME, 2);

      expect(statuses).toEqual([200, 200, 200, 200]);
      expect(renderer.navigations).toEqual([HOME, url('/a'), url('/b'), url('/a/deep')]);
    });

    it('should not enqueue children of pages at the maximum depth', async () => {
      await createCrawler().crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME, url('/a'), url('/b')]);
    });

    it('should record pages with their source page and dated homepage', async () => {
      const crawler = createCrawler();
      await crawler.crawlSite(HOME, 2);
      const records = crawler.getPageRecords();

      expect(records.get(HOME)).toEqual({
        title: 'Home',
        lastUpdated: '2024-03-01',
        savedPath: 'Home.html',
        httpStatus: 200,
        depth: 0,
        sourcePage: null
      });
      expect(records.get(url('/a/deep'))).toEqual({
        title: 'Deep',
        lastUpdated: NO_DATE,
        savedPath: 'Home_links/Page_A_links/Deep.html',
        httpStatus: 200,
        depth: 2,
        sourcePage: { title: 'Page A', url: url('/a') }
      });
    });

    it('should close every page it opened', async () => {
      await createCrawler().crawlSite(HOME, 2);

      expect(renderer.opened).toHaveLength(4);
      expect(renderer.opened.every(page => page.closed)).toBe(true);
    });

    it('should report progress and return to idle', async () => {
      const crawler = createCrawler();
      await crawler.crawlSite(HOME, 2);

      expect(crawler.currentState).toBe(CrawlerState.IDLE);
      expect(crawler.getProgress()).toEqual({
        crawledUrls: 4,
        pendingUrls: 0,
        recordedPages: 4,
        externalLinks: 0
      });
    });

    it('should start from a clean ledger on every crawl', async () => {
      const crawler = createCrawler();
      await crawler.crawlSite(HOME, 1);
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(statuses).toEqual([200, 200, 200]);
      expect(crawler.getPageRecords().size).toBe(3);
    });
  });

  describe('failures', () => {
    it('should record pages with an error status and keep crawling', async () => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/missing', '/b']) })
        .addPage(url('/missing'), { status: 404 })
        .addPage(url('/b'), { html: htmlPage('Page B', '') });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(statuses).toEqual([200, 404, 200]);
      expect(crawler.getPageRecords().get(url('/missing'))).toEqual({
        title: '',
        lastUpdated: CRAWL_FAILED,
        savedPath: '',
        httpStatus: 404,
        depth: 1,
        sourcePage: { title: 'Home', url: HOME }
      });
    });

    it('should retry http pages over https', async () => {
      renderer.addPage(HOME, { html: htmlPage('Home', '') });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite('http://example.com/', 1);

      expect(renderer.navigations).toEqual(['http://example.com/', HOME]);
      expect(statuses).toEqual([200]);
      expect(crawler.getPageRecords().get(HOME)?.title).toBe('Home');
    });

    it('should record a failure with status 0 when both schemes are unreachable', async () => {
      renderer.addPage(HOME, { html: htmlPage('Home', '', ['http://example.com/old']) });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME, 'http://example.com/old', 'https://example.com/old']);
      expect(statuses).toEqual([200, 0]);
      expect(crawler.getPageRecords().get('http://example.com/old')).toMatchObject({
        lastUpdated: CRAWL_FAILED,
        httpStatus: 0,
        depth: 1
      });
    });

    it('should record anchors that cannot be resolved', async () => {
      renderer.addPage(HOME, { html: htmlPage('Home', '<a href="http://[bad">broken</a>') });

      const crawler = createCrawler();
      await crawler.crawlSite(HOME, 1);

      expect(crawler.getPageRecords().get('http://[bad')).toEqual({
        title: '[LINK_ERROR] http://[bad - TypeError: Invalid URL',
        lastUpdated: CRAWL_FAILED,
        savedPath: '',
        httpStatus: 0,
        depth: 1,
        sourcePage: { title: 'Home', url: HOME }
      });
    });
  });

  describe('skipped resources', () => {
    it('should record downloads without navigating to them', async () => {
      renderer.addPage(HOME, { html: htmlPage('Home', '', ['/files/report.pdf']) });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME]);
      expect(statuses).toEqual([200, 200]);
      expect(crawler.getPageRecords().get(url('/files/report.pdf'))).toEqual({
        title: 'report.pdf',
        lastUpdated: '',
        savedPath: '',
        httpStatus: 200,
        depth: 1,
        sourcePage: { title: 'Home', url: HOME }
      });
    });
  });

  describe('duplicates', () => {
    it('should skip redirects to a recorded page without counting them', async () => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/a', '/old-a']) })
        .addPage(url('/a'), { html: htmlPage('Page A', '') })
        .addPage(url('/old-a'), { html: htmlPage('Page A', ''), finalUrl: url('/a') });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(statuses).toEqual([200, 200]);
      expect(Array.from(crawler.getPageRecords().keys())).toEqual([HOME, url('/a')]);
    });

    it('should skip a same-titled page with identical content at another path depth', async () => {
      const home = htmlPage('Home', '<p>Welcome</p>', ['/index.html']);
      renderer
        .addPage(HOME, { html: home })
        .addPage(url('/index.html'), { html: home });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(statuses).toEqual([200]);
      expect(crawler.getPageRecords().size).toBe(1);
      expect(pageStore.saved.size).toBe(1);
    });
  });

  describe('pagination', () => {
    beforeEach(() => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/news']) })
        .addPage(url('/news'), { html: htmlPage('News', '<p>list</p>', ['/news?page=2', '/news/1']) })
        .addPage(url('/news?page=2'), { html: htmlPage('News', '<p>list 2</p>', ['/news?page=3', '/news/2']) })
        .addPage(url('/news?page=3'), { html: htmlPage('News', '<p>list 3</p>') })
        .addPage(url('/news/1'), { html: htmlPage('Item 1', '') })
        .addPage(url('/news/2'), { html: htmlPage('Item 2', '') });
    });

    it('should follow links of list pages at the same depth and parent', async () => {
      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 3);

      expect(renderer.navigations).toEqual([
        HOME, url('/news'), url('/news?page=2'), url('/news/1'), url('/news?page=3'), url('/news/2')
      ]);
      expect(statuses).toEqual([200, 200, 200, 200]);
      expect(crawler.getPageRecords().has(url('/news?page=2'))).toBe(false);
      expect(crawler.getPageRecords().get(url('/news/2'))).toMatchObject({
        depth: 2,
        sourcePage: { title: 'News', url: url('/news') }
      });
    });

    it('should not follow list pages when pagination is disabled', async () => {
      await createCrawler(false).crawlSite(HOME, 3);

      expect(renderer.navigations).toEqual([HOME, url('/news'), url('/news?page=2'), url('/news/1')]);
    });
  });

  describe('framesets', () => {
    it('should visit frame sources at the depth of the frameset page', async () => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/frames']) })
        .addPage(url('/frames'), {
          html: '<html><head><title>Frames</title></head><frameset><frame src="/content.html"></frameset></html>'
        })
        .addPage(url('/content.html'), { html: htmlPage('Content', '', ['/deeper']) });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME, url('/frames'), url('/content.html')]);
      expect(statuses).toEqual([200, 200]);
      expect(crawler.getPageRecords().has(url('/frames'))).toBe(false);
      expect(crawler.getPageRecords().get(url('/content.html'))).toMatchObject({
        depth: 1,
        savedPath: 'Home_links/Content.html',
        sourcePage: { title: 'Home', url: HOME }
      });
    });
  });

  describe('site map', () => {
    it('should seed the frontier from the site map content region', async () => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/a', '/sitemap.html']) })
        .addPage(url('/sitemap.html'), {
          html: '<html><head><title>Site Map</title></head><body>' +
            '<nav><a href="/nav-only">Menu</a></nav>' +
            '<main><a href="/b">B</a><a href="/c">C</a></main></body></html>'
        })
        .addPage(url('/b'), { html: htmlPage('Page B', '') })
        .addPage(url('/c'), { html: htmlPage('Page C', '') });

      const crawler = createCrawler();
      const statuses = await crawler.crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME, url('/sitemap.html'), url('/b'), url('/c')]);
      expect(statuses).toEqual([200, 200, 200, 200]);
      expect(crawler.getPageRecords().get(url('/b'))?.sourcePage).toEqual({ title: 'Home', url: HOME });
    });

    it('should fall back to homepage links when the site map has nothing new', async () => {
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['/a', '/sitemap.html']) })
        .addPage(url('/sitemap.html'), {
          html: '<html><head><title>Site Map</title></head><body><main><a href="/">Home</a></main></body></html>'
        })
        .addPage(url('/a'), { html: htmlPage('Page A', '') });

      await createCrawler().crawlSite(HOME, 1);

      expect(renderer.navigations).toEqual([HOME, url('/sitemap.html'), url('/a')]);
    });
  });

  describe('external links', () => {
    it('should check each external link once per site', async () => {
      linkVerifier.checkLink.mockImplementation(async link => (link === 'https://third.org/' ? 404 : 200));
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['https://other.org/x', '/a']) })
        .addPage(url('/a'), { html: htmlPage('Page A', '', ['https://other.org/x', 'https://third.org/']) });

      const crawler = createCrawler();
      await crawler.crawlSite(HOME, 1);

      expect(linkVerifier.checkLink.mock.calls.map(([link]) => link)).toEqual([
        'https://other.org/x',
        'https://third.org/'
      ]);
      expect(crawler.getSummary().external_links).toEqual({
        'https://other.org/x': { status: 200, sourcePage: { title: 'Home', url: HOME } },
        'https://third.org/': { status: 404, sourcePage: { title: 'Page A', url: url('/a') } }
      });
    });
  });

  describe('stop', () => {
    it('should be running while pages are processed and refuse a second crawl', async () => {
      const crawler = createCrawler();
      const states: CrawlerState[] = [];
      const secondCrawls: Array<Promise<string>> = [];
      linkVerifier.checkLink.mockImplementation(async () => {
        states.push(crawler.currentState);
        secondCrawls.push(crawler.crawlSite(HOME, 0).then(() => 'started', (error: unknown) => String(error)));
        return 200;
      });
      renderer.addPage(HOME, { html: htmlPage('Home', '', ['https://other.org/']) });

      await expect(crawler.crawlSite(HOME, 0)).resolves.toEqual([200]);

      expect(states).toEqual([CrawlerState.RUNNING]);
      expect(await Promise.all(secondCrawls)).toEqual(['Error: A crawl is already running']);
      expect(crawler.currentState).toBe(CrawlerState.IDLE);
    });

    it('should end the crawl after the current page', async () => {
      const crawler = createCrawler();
      linkVerifier.checkLink.mockImplementation(async () => {
        await crawler.stop();
        return 200;
      });
      renderer
        .addPage(HOME, { html: htmlPage('Home', '', ['https://other.org/', '/a']) })
        .addPage(url('/a'), { html: htmlPage('Page A', '') });

      const statuses = await crawler.crawlSite(HOME, 1);

      expect(statuses).toEqual([200]);
      expect(renderer.navigations).toEqual([HOME]);
      expect(crawler.currentState).toBe(CrawlerState.IDLE);
    });
  });
});
