export * from './services/crawler/interfaces/types';
export type { ICrawler } from './services/crawler/interfaces/ICrawler';
export type { IPageRenderer, IRenderedPage } from './services/crawler/interfaces/IPageRenderer';
export type { IPageStore } from './services/crawler/interfaces/IPageStore';
export type { ILinkVerifier } from './services/crawler/interfaces/ILinkVerifier';
export type { IDateExtractor, IDuplicateClassifier } from './services/crawler/interfaces/IContentAnalysis';
export type { SiteCrawlerDependencies } from './services/crawler/implementations/SiteCrawler';
export type { ProblemLink, ProblemLinks } from './services/crawler/implementations/CrawlLedger';
export type { SiteCrawlSettings } from './services/crawler/factories/CrawlerFactory';
export type { SiteAuditResult, AuditRunResult, SiteEntry } from './services/site-audit.service';
export type { AppConfig } from './config';

export { SiteCrawler } from './services/crawler/implementations/SiteCrawler';
export { CrawlLedger, extractProblemLinks } from './services/crawler/implementations/CrawlLedger';
export { DateExtractor } from './services/crawler/implementations/DateExtractor';
export { DuplicateClassifier } from './services/crawler/implementations/DuplicateClassifier';
export { ExternalLinkVerifier } from './services/crawler/implementations/ExternalLinkVerifier';
export { PuppeteerRenderer } from './services/crawler/implementations/PuppeteerRenderer';
export { CrawlerFactory } from './services/crawler/factories/CrawlerFactory';
export { SiteAuditService, loadSiteList, parseSiteList } from './services/site-audit.service';
export { loadConfig } from './config';
export { AppError, ConfigurationError, NavigationError } from './utils/errors';
