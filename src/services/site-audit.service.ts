import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CrawlerFactory } from './crawler/factories/CrawlerFactory';
import { extractProblemLinks } from './crawler/implementations/CrawlLedger';
import { TaskGroup } from './crawler/utils/TaskGroup';
import { FileNameUtils } from './crawler/utils/FileNameUtils';
import { LoggingUtils } from './crawler/utils/LoggingUtils';
import { UrlUtils } from './crawler/utils/UrlUtils';
import { ConfigurationError, describeError } from '../utils/errors';

export const SUMMARY_FILE = 'page_summary.json';
export const PROBLEM_LINKS_FILE = 'problem_links.json';

const TRUE_VALUES = ['true', '1', 'yes', 'y'];
const FALSE_VALUES = ['false', '0', 'no', 'n'];

const flagColumn = z
  .string()
  .trim()
  .toLowerCase()
  .refine(value => value === '' || TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: 'Expected true or false'
  })
  .transform(value => (value === '' ? undefined : TRUE_VALUES.includes(value)))
  .optional();

const depthColumn = z
  .string()
  .trim()
  .refine(value => value === '' || /^\d+$/.test(value), { message: 'Expected a non-negative integer' })
  .transform(value => (value === '' ? undefined : Number(value)))
  .optional();

const siteRowSchema = z.object({
  URL: z.string().trim().url(),
  name: z
    .string()
    .trim()
    .optional()
    .transform(value => value || undefined),
  depth: depthColumn,
  save_html: flagColumn,
  pagination: flagColumn
});

/**
 * One row of the site list; blank columns fall back to the run-wide settings
 */
export interface SiteEntry {
  url: string;
  name?: string;
  depth?: number;
  saveHtml?: boolean;
  enablePagination?: boolean;
}

export interface SiteAuditResult {
  site: string;
  url: string;
  success: boolean;
  /** True when an earlier run already produced the summary */
  skipped: boolean;
  durationMs: number;
  /** Status tally of the crawl, in visit order */
  statuses: number[];
  pagesRecorded: number;
  externalLinks: number;
  summaryPath: string;
  error?: string;
}

export interface AuditRunResult {
  results: SiteAuditResult[];
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface SiteAuditOptions {
  outputDir: string;
  concurrentSites: number;
  /** Skip sites whose page_summary.json already exists */
  skipCompleted?: boolean;
}

/**
 * Parse the CSV site list. The `URL` column is required; `name`, `depth`,
 * `save_html` and `pagination` are optional per-site overrides.
 * @throws ConfigurationError for malformed CSV or invalid rows
 */
export function parseSiteList(csvText: string): SiteEntry[] {
  let records: unknown;
  try {
    records = parse(csvText, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (error) {
    throw new ConfigurationError(`Malformed site list: ${describeError(error)}`);
  }

  const parsed = z.array(siteRowSchema).safeParse(records);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => {
        const [row, column] = issue.path;
        return typeof row === 'number'
          ? `row ${row + 1}${column === undefined ? '' : ` (${String(column)})`}: ${issue.message}`
          : issue.message;
      })
      .join('; ');
    throw new ConfigurationError(`Invalid site list: ${problems}`);
  }

  return parsed.data.map(row => ({
    url: row.URL,
    name: row.name,
    depth: row.depth,
    saveHtml: row.save_html,
    enablePagination: row.pagination
  }));
}

/**
 * Read and validate the site list file
 * @throws ConfigurationError when the file is unreadable, invalid or empty
 */
export async function loadSiteList(filePath: string): Promise<SiteEntry[]> {
  let csvText: string;
  try {
    csvText = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read site list ${filePath}: ${describeError(error)}`);
  }

  const sites = parseSiteList(csvText);
  if (sites.length === 0) {
    throw new ConfigurationError(`Site list ${filePath} has no sites`);
  }
  return sites;
}

/**
 * Folder name of a site below the output directory
 */
export function siteFolder(site: SiteEntry): string {
  return site.name ? FileNameUtils.sanitize(site.name) : UrlUtils.siteFolderName(site.url);
}

const exists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    return false;
  }
};

/**
 * Audits a list of sites with a bounded number of crawls in flight.
 * A site that fails is reported as failed and never affects the others.
 */
export class SiteAuditService {
  private readonly logger = LoggingUtils.createTaggedLogger('site-audit');

  constructor(
    private readonly factory: CrawlerFactory,
    private readonly options: SiteAuditOptions
  ) {}

  async auditSites(sites: SiteEntry[]): Promise<AuditRunResult> {
    this.logger.info(`Auditing ${sites.length} sites, ${this.options.concurrentSites} at a time`);

    const group = new TaskGroup(this.options.concurrentSites);
    const settled = await group.run(sites.map(site => () => this.auditSite(site)));
    const results = settled.map((outcome, index): SiteAuditResult => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const site = sites[index];
      return {
        ...this.emptyResult(site),
        success: false,
        error: describeError(outcome.reason)
      };
    });

    const run: AuditRunResult = {
      results,
      succeeded: results.filter(result => result.success && !result.skipped).length,
      failed: results.filter(result => !result.success).length,
      skipped: results.filter(result => result.skipped).length
    };
    this.logger.info(`Audit finished: ${run.succeeded} succeeded, ${run.failed} failed, ${run.skipped} skipped`);
    return run;
  }

  /**
   * Crawl one site and write its page summary and problem-link list
   */
  async auditSite(site: SiteEntry): Promise<SiteAuditResult> {
    const base = this.emptyResult(site);
    const siteDir = path.dirname(base.summaryPath);

    if (this.options.skipCompleted && (await exists(base.summaryPath))) {
      this.logger.info(`Skipping ${site.url}: ${base.summaryPath} already exists`);
      return { ...base, success: true, skipped: true };
    }

    const started = Date.now();
    this.logger.info(`Starting ${base.site} (${site.url})`);
    const crawler = this.factory.createCrawler({
      outputDir: siteDir,
      saveHtml: site.saveHtml,
      enablePagination: site.enablePagination
    });

    try {
      const statuses = await crawler.crawlSite(site.url, site.depth);
      const summary = crawler.getSummary();

      await fs.mkdir(siteDir, { recursive: true });
      await fs.writeFile(base.summaryPath, JSON.stringify(summary, null, 2), 'utf8');
      await fs.writeFile(
        path.join(siteDir, PROBLEM_LINKS_FILE),
        JSON.stringify(extractProblemLinks(summary), null, 2),
        'utf8'
      );

      const durationMs = Date.now() - started;
      this.logger.info(`Finished ${base.site} in ${(durationMs / 1000).toFixed(1)}s: ${statuses.length} pages counted`);
      return {
        ...base,
        success: true,
        durationMs,
        statuses,
        pagesRecorded: Object.keys(summary.page_summary).length,
        externalLinks: Object.keys(summary.external_links).length
      };
    } catch (error) {
      this.logger.error(`Audit of ${site.url} failed: ${describeError(error)}`);
      return {
        ...base,
        success: false,
        durationMs: Date.now() - started,
        error: describeError(error)
      };
    }
  }

  private emptyResult(site: SiteEntry): SiteAuditResult {
    const folder = siteFolder(site);
    return {
      site: folder,
      url: site.url,
      success: false,
      skipped: false,
      durationMs: 0,
      statuses: [],
      pagesRecorded: 0,
      externalLinks: 0,
      summaryPath: path.join(this.options.outputDir, folder, SUMMARY_FILE)
    };
  }
}
