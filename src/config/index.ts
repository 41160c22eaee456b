import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';
import { ConfigurationError } from '../utils/errors';

const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DISABLED_TAGS: z
    .string()
    .default('')
    .transform(value => value.split(',').map(tag => tag.trim()).filter(tag => tag.length > 0)),
  OUTPUT_DIR: z.string().min(1).default('assets'),
  SITES_FILE: z.string().min(1).default('config/websites.csv'),
  CRAWL_MAX_DEPTH: z.coerce.number().int().min(0).default(2),
  CRAWL_CONCURRENT_SITES: z.coerce.number().int().min(1).default(2),
  CRAWL_PAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SPA_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LINK_CHECK_CONCURRENCY: z.coerce.number().int().min(1).default(20),
  LINK_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CRAWL_USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'),
  CHROME_EXECUTABLE_PATH: z.string().optional(),
  SAVE_HTML: booleanFlag.default('true'),
  ENABLE_PAGINATION: booleanFlag.default('true'),
});

export type AppConfig = {
  logging: { level: 'error' | 'warn' | 'info' | 'debug'; disabledTags: string[] };
  output: { dir: string; sitesFile: string };
  crawl: {
    maxDepth: number;
    concurrentSites: number;
    pageTimeoutMs: number;
    spaIdleTimeoutMs: number;
    userAgent: string;
    saveHtml: boolean;
    enablePagination: boolean;
  };
  linkCheck: { concurrency: number; timeoutMs: number };
  browser: { executablePath?: string };
};

/**
 * Validates an environment map into the typed application config.
 * @throws ConfigurationError when a value is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    logging: { level: values.LOG_LEVEL, disabledTags: values.LOG_DISABLED_TAGS },
    output: { dir: values.OUTPUT_DIR, sitesFile: values.SITES_FILE },
    crawl: {
      maxDepth: values.CRAWL_MAX_DEPTH,
      concurrentSites: values.CRAWL_CONCURRENT_SITES,
      pageTimeoutMs: values.CRAWL_PAGE_TIMEOUT_MS,
      spaIdleTimeoutMs: values.SPA_IDLE_TIMEOUT_MS,
      userAgent: values.CRAWL_USER_AGENT,
      saveHtml: values.SAVE_HTML,
      enablePagination: values.ENABLE_PAGINATION,
    },
    linkCheck: {
      concurrency: values.LINK_CHECK_CONCURRENCY,
      timeoutMs: values.LINK_CHECK_TIMEOUT_MS,
    },
    browser: { executablePath: values.CHROME_EXECUTABLE_PATH },
  };
}
