import { ClassificationCandidate, IDuplicateClassifier } from '../interfaces/IContentAnalysis';
import { IPageStore } from '../interfaces/IPageStore';
import { Classification, ClassificationResult, PageRecord } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export interface DuplicateClassifierOptions {
  /** Harvest pagination variants; when false they are skipped as duplicates */
  enablePagination: boolean;
  /** Characters of visible text compared between same-titled pages */
  contentPreviewLength?: number;
  /**
   * Result for a same-titled page at another path depth when saved content
   * cannot be read back
   */
  onUncomparable?: Classification.EXACT_DUPLICATE | Classification.DISTINCT;
}

/**
 * Decides whether a fetched page is new content, a duplicate of a recorded
 * page, or one page of a paginated listing.
 */
export class DuplicateClassifier implements IDuplicateClassifier {
  private readonly logger = LoggingUtils.createTaggedLogger('classifier');
  private readonly enablePagination: boolean;
  private readonly contentPreviewLength: number;
  private readonly onUncomparable: Classification.EXACT_DUPLICATE | Classification.DISTINCT;

  constructor(
    private readonly pageStore: IPageStore,
    options: DuplicateClassifierOptions
  ) {
    this.enablePagination = options.enablePagination;
    this.contentPreviewLength = options.contentPreviewLength ?? 500;
    this.onUncomparable = options.onUncomparable ?? Classification.EXACT_DUPLICATE;
  }

  async classify(
    candidate: ClassificationCandidate,
    ledger: ReadonlyMap<string, PageRecord>
  ): Promise<ClassificationResult> {
    const { actualUrl, title } = candidate;

    if (ledger.has(actualUrl)) {
      this.logger.debug(`URL already recorded: ${actualUrl}`);
      return { classification: Classification.EXACT_DUPLICATE, matchedUrl: actualUrl };
    }

    const segments = UrlUtils.pathSegmentCount(actualUrl);

    for (const [existingUrl, record] of ledger) {
      if (record.title !== title) {
        continue;
      }

      const existingSegments = UrlUtils.pathSegmentCount(existingUrl);
      this.logger.debug(
        `Same title "${title}": ${actualUrl} (segments: ${segments}) vs ${existingUrl} (segments: ${existingSegments})`
      );

      if (segments === existingSegments) {
        if (!UrlUtils.hasPaginationParams(actualUrl)) {
          return { classification: Classification.DISTINCT, matchedUrl: existingUrl };
        }
        if (this.enablePagination) {
          return { classification: Classification.PAGINATION_VARIANT, matchedUrl: existingUrl };
        }
        return { classification: Classification.EXACT_DUPLICATE, matchedUrl: existingUrl, paginationDisabled: true };
      }

      return {
        classification: await this.compareContent(candidate.html, record),
        matchedUrl: existingUrl
      };
    }

    return { classification: Classification.NEW };
  }

  private async compareContent(html: string, record: PageRecord): Promise<Classification> {
    if (!this.pageStore.supportsContentComparison) {
      this.logger.debug('Saved content unavailable, using the uncomparable policy');
      return this.onUncomparable;
    }

    const stored = record.savedPath ? await this.pageStore.read(record.savedPath) : null;
    if (stored === null) {
      return Classification.DISTINCT;
    }

    const current = HtmlUtils.contentPreview(html, this.contentPreviewLength);
    const existing = HtmlUtils.contentPreview(stored, this.contentPreviewLength);
    const identical = current === existing;
    this.logger.debug(`Content comparison: ${identical ? 'identical' : 'different'}`);
    return identical ? Classification.EXACT_DUPLICATE : Classification.DISTINCT;
  }
}
