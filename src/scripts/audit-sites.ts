#!/usr/bin/env node
/**
 * Audit Sites CLI Script
 *
 * Crawls every site of the CSV site list and writes one page_summary.json
 * and problem_links.json per site below the output directory.
 *
 * @example
 * ```
 * npm run audit -- --config config/websites.csv --depth 3 --concurrent 4 --no-save-html
 * ```
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from '../utils/logger';
import { loadConfig } from '../config';
import { ConfigurationError, describeError } from '../utils/errors';
import { LoggingUtils, LogLevel } from '../services/crawler/utils/LoggingUtils';
import { CrawlerFactory } from '../services/crawler/factories/CrawlerFactory';
import { SiteAuditService, loadSiteList } from '../services/site-audit.service';

async function main(): Promise<number> {
  const config = loadConfig();
  LoggingUtils.configure(config.logging);

  const argv = yargs(hideBin(process.argv).filter(arg => arg !== '--'))
    .usage('Usage: $0 [options]')
    .option('config', {
      type: 'string',
      default: config.output.sitesFile,
      describe: 'CSV site list with a URL column'
    })
    .option('depth', {
      type: 'number',
      default: config.crawl.maxDepth,
      describe: 'Maximum crawl depth for sites without their own depth'
    })
    .option('concurrent', {
      type: 'number',
      default: config.crawl.concurrentSites,
      describe: 'Number of sites crawled at the same time'
    })
    .option('save-html', {
      type: 'boolean',
      default: config.crawl.saveHtml,
      describe: 'Save rendered pages (disable with --no-save-html)'
    })
    .option('pagination', {
      type: 'boolean',
      default: config.crawl.enablePagination,
      describe: 'Follow links of paginated list pages (disable with --no-pagination)'
    })
    .option('output', {
      type: 'string',
      default: config.output.dir,
      describe: 'Directory the per-site results are written to'
    })
    .option('skip-completed', {
      type: 'boolean',
      default: false,
      describe: 'Skip sites that already have a page_summary.json'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable debug logging'
    })
    .check(args => {
      if (!Number.isInteger(args.depth) || args.depth < 0) {
        throw new Error('--depth must be a non-negative integer');
      }
      if (!Number.isInteger(args.concurrent) || args.concurrent < 1) {
        throw new Error('--concurrent must be a positive integer');
      }
      return true;
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  if (argv.verbose) {
    logger.level = 'debug';
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
  }

  const sites = await loadSiteList(argv.config);
  logger.info(`Loaded ${sites.length} sites from ${argv.config}`);

  const factory = new CrawlerFactory({
    ...config,
    crawl: {
      ...config.crawl,
      maxDepth: argv.depth,
      saveHtml: argv['save-html'],
      enablePagination: argv.pagination
    }
  });
  const service = new SiteAuditService(factory, {
    outputDir: argv.output,
    concurrentSites: argv.concurrent,
    skipCompleted: argv['skip-completed']
  });

  try {
    const run = await service.auditSites(sites);
    for (const result of run.results) {
      const outcome = result.skipped ? 'skipped' : result.success ? 'ok' : `failed (${result.error ?? 'unknown error'})`;
      console.log(
        `${result.site}: ${outcome}, ${result.pagesRecorded} pages, ${result.externalLinks} external links, ` +
        `${(result.durationMs / 1000).toFixed(1)}s`
      );
    }
    console.log(`\n${run.succeeded} succeeded, ${run.failed} failed, ${run.skipped} skipped`);
    return run.failed > 0 ? 1 : 0;
  } finally {
    await factory.cleanup();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      process.exitCode = 2;
      return;
    }
    logger.error(`Unhandled error in audit-sites script: ${describeError(error)}`);
    process.exitCode = 1;
  });
