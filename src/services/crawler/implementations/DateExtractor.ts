import { IDateExtractor } from '../interfaces/IContentAnalysis';
import { IHtmlDocument } from '../interfaces/IHtmlDocument';
import { DateCandidate, DateTier, NO_DATE } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { NoiseStripper } from './NoiseStripper';

const UPDATE_LABELS =
  '(?:更新日期|發布日期|修改日期|上版日期|上架日期|發佈日期|建檔日期|最後更新|資料更新|內容更新|資料檢視|Data update|Review Date)';
const TRAILING_LABELS = '(?:更新|發布|修改|發佈)';
const NOT_AFTER_SYMBOL = '(?<![\\d+*/=.:;@#$%^&|\\\\])';

/**
 * Dates next to an update or publish label, label first or date first
 */
export const KEYWORD_DATE_PATTERNS: readonly RegExp[] = [
  new RegExp(`${UPDATE_LABELS}[:：\\s]*(\\d{2,4})(?:年|[/\\-.])(\\d{1,2})(?:月|[/\\-.])(\\d{1,2})(?:[日號])?`, 'g'),
  new RegExp(`${UPDATE_LABELS}[:：\\s]*(\\d{2,4})(?:年|[/\\-.])(\\d{1,2})月?(?![/\\-.]\\d)(?!\\d)`, 'g'),
  new RegExp(`(\\d{2,4})(?:年|[/\\-.])(\\d{1,2})(?:月|[/\\-.])(\\d{1,2})(?:[日號])?\\s*${TRAILING_LABELS}`, 'g'),
  new RegExp(`(\\d{2,4})(?:年|[/\\-.])(\\d{1,2})月?(?![/\\-.])\\s*${TRAILING_LABELS}`, 'g')
];

/**
 * Bare dates. The lookbehinds keep version numbers, ratios and
 * identifiers from being read as dates.
 */
export const GENERIC_DATE_PATTERNS: readonly RegExp[] = [
  new RegExp(`${NOT_AFTER_SYMBOL}(\\d{2,4})(?:年|[/\\-.])(\\d{1,2})(?:月|[/\\-.])(\\d{1,2})(?:[日號])?(?!\\d)`, 'g'),
  new RegExp('(?<![\\d~\\-+*/=.:;@#$%^&|\\\\])(\\d{2,4})(?:年|[/\\-.])(0[1-9]|1[0-2]|[1-9])(?![/.月]\\d)(?!\\d|°)', 'g'),
  new RegExp(`${NOT_AFTER_SYMBOL}(\\d{1,2})[/\\-.](\\d{1,2})[/\\-.](\\d{4})`, 'g'),
  new RegExp(`${NOT_AFTER_SYMBOL}(\\d{1,2})[/\\-.]((?:19|20)\\d{2})(?!\\d)`, 'g')
];

/**
 * Head metadata consulted when the page text carries no labelled date
 */
export const METADATA_DATE_FIELDS: readonly string[] = [
  'og:article:modified_time', 'og:modified_time', 'article:modified_time',
  'og:article:published_time', 'og:published_time', 'article:published_time',
  'DC.date.modified', 'dcterms.modified', 'DC.Date', 'dcterms.created',
  'DC.Coverage.t.min', 'DC.Coverage.t.max'
];

/** Years before this are not believable as a last update */
const EARLIEST_YEAR = 1990;
/** Offset between the Minguo (Republic of China) calendar and the Western one */
const MINGUO_OFFSET = 1911;
/** Bare years below this are Minguo years */
const MINGUO_YEAR_LIMIT = 200;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DIGITS = /^\d+$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface DateExtractorOptions {
  /** Clock used to decide which dates are in the future */
  now?: () => Date;
  noiseStripper?: NoiseStripper;
}

/**
 * Infers a page's last-updated date from its visible text.
 *
 * Labelled dates ("更新日期：113/03/15", "Review Date 2024-01-02") win over
 * bare ones; when only bare dates exist the head metadata is added to the
 * pool. Of several candidates, the most recent date before today is chosen.
 */
export class DateExtractor implements IDateExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('date-extractor');
  private readonly now: () => Date;
  private readonly noiseStripper: NoiseStripper;

  constructor(options: DateExtractorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.noiseStripper = options.noiseStripper ?? new NoiseStripper();
  }

  extractLastUpdated(document: IHtmlDocument, depth = 0): string {
    const candidates = this.collectCandidates(document);
    const indent = LoggingUtils.indent(depth);
    for (const candidate of candidates) {
      this.logger.debug(`${indent}Date candidate ${candidate.normalized} (${candidate.tier}: ${candidate.raw})`);
    }

    const best = this.selectBestDate(candidates.map(candidate => candidate.normalized));
    this.logger.debug(`${indent}Selected date: ${best}`);
    return best;
  }

  /**
   * All distinct dates of a page, in discovery order
   */
  collectCandidates(document: IHtmlDocument): DateCandidate[] {
    const texts = this.noiseStripper.strip(document).textNodes();

    const keyword = this.scan(texts, KEYWORD_DATE_PATTERNS, 'keyword');
    if (keyword.length > 0) {
      return keyword;
    }

    const candidates = this.scan(texts, GENERIC_DATE_PATTERNS, 'generic');
    for (const field of METADATA_DATE_FIELDS) {
      const candidate = this.metadataCandidate(document, field);
      if (candidate && !candidates.some(existing => existing.normalized === candidate.normalized)) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }

  /**
   * Turns captured number groups into YYYY-MM-DD.
   * Three numbers are year-month-day unless the last one is a Western year
   * (day-month-year); two numbers are year-month or month-year and get day 01.
   * @returns The normalized date, or null when the year is implausible
   */
  normalizeDateParts(parts: ReadonlyArray<string | undefined>): string | null {
    const numbers = parts
      .filter((part): part is string => part !== undefined && DIGITS.test(part))
      .map(part => parseInt(part, 10));

    let year: number;
    let month: number;
    let day: number;

    if (numbers.length === 3) {
      const [a, b, c] = numbers;
      if (c >= 1900) {
        [day, month, year] = [a, b, c];
      } else {
        [year, month, day] = [a, b, c];
      }
    } else if (numbers.length === 2) {
      const [a, b] = numbers;
      if (b >= 1900) {
        [month, year] = [a, b];
      } else {
        [year, month] = [a, b];
      }
      day = 1;
    } else {
      return null;
    }

    const westernYear = this.toWesternYear(year);
    if (westernYear === null) {
      return null;
    }
    return `${String(westernYear).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  }

  /**
   * Picks one date out of several.
   * Dates on or after today are dropped; the latest remaining date wins. If
   * nothing remains, the date closest to today is returned instead.
   */
  selectBestDate(dates: readonly string[]): string {
    if (dates.length === 0) {
      return NO_DATE;
    }
    if (dates.length === 1) {
      return dates[0];
    }

    const current = this.now();
    const today = Date.UTC(current.getFullYear(), current.getMonth(), current.getDate());

    const past: string[] = [];
    let closest: string | null = null;
    let closestDiff = Infinity;

    for (const date of dates) {
      const time = DateExtractor.parseIsoDate(date);
      if (time === null) {
        continue;
      }

      const diff = Math.abs(time - today) / MS_PER_DAY;
      if (diff < closestDiff) {
        closestDiff = diff;
        closest = date;
      }

      if (time < today) {
        past.push(date);
      }
    }

    if (past.length === 0) {
      return closest ?? NO_DATE;
    }
    return past.reduce((latest, date) => (date > latest ? date : latest));
  }

  private scan(texts: readonly string[], patterns: readonly RegExp[], tier: DateTier): DateCandidate[] {
    const candidates: DateCandidate[] = [];
    const seen = new Set<string>();

    for (const text of texts) {
      for (const pattern of patterns) {
        for (const match of text.matchAll(pattern)) {
          const normalized = this.normalizeDateParts(match.slice(1));
          if (normalized && !seen.has(normalized)) {
            seen.add(normalized);
            candidates.push({ raw: match[0], normalized, tier });
          }
        }
      }
    }
    return candidates;
  }

  private metadataCandidate(document: IHtmlDocument, field: string): DateCandidate | null {
    const content = document.metaContent(field)?.trim();
    if (!content) {
      return null;
    }

    const parts = content.split('-');
    if (parts.length < 2 || parts[0].length !== 4 || !DIGITS.test(parts[0]) || !DIGITS.test(parts[1])) {
      return null;
    }

    const normalized = this.normalizeDateParts(parts.slice(0, 3));
    return normalized ? { raw: content, normalized, tier: 'meta' } : null;
  }

  private toWesternYear(year: number): number | null {
    if (year < MINGUO_YEAR_LIMIT) {
      const western = year + MINGUO_OFFSET;
      return western >= EARLIEST_YEAR ? western : null;
    }
    return year >= EARLIEST_YEAR ? year : null;
  }

  /**
   * UTC timestamp of a strict YYYY-MM-DD calendar date, null for anything else
   */
  static parseIsoDate(date: string): number | null {
    const match = ISO_DATE.exec(date);
    if (!match) {
      return null;
    }

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const time = Date.UTC(year, month - 1, day);
    const parsed = new Date(time);
    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
      return null;
    }
    return time;
  }
}
