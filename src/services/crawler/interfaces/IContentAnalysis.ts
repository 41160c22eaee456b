import { IHtmlDocument } from './IHtmlDocument';
import { ClassificationResult, PageRecord } from './types';

/**
 * Infers a page's last-updated date from its prose.
 */
export interface IDateExtractor {
  /**
   * @returns YYYY-MM-DD, or NO_DATE when nothing usable was found
   */
  extractLastUpdated(document: IHtmlDocument, depth?: number): string;
}

export interface ClassificationCandidate {
  actualUrl: string;
  title: string;
  /** Rendered HTML of the candidate, used for content comparison */
  html: string;
}

/**
 * Decides whether a fetched page is new content or a variant of a recorded one.
 */
export interface IDuplicateClassifier {
  classify(
    candidate: ClassificationCandidate,
    ledger: ReadonlyMap<string, PageRecord>
  ): Promise<ClassificationResult>;
}
