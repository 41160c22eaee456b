/**
 * An anchor as seen by link discovery
 */
export interface AnchorInfo {
  /** Raw, unresolved href attribute */
  href: string;
  title: string;
  text: string;
}

/**
 * Narrow DOM capability used by the date extractor, classifier and link
 * discovery. Implemented once on top of an HTML parser so none of those
 * components depend on a concrete parser.
 */
export interface IHtmlDocument {
  /** Text of the <title> element, or null when missing or blank */
  title(): string | null;

  /** Independent copy that can be mutated without touching this document */
  clone(): IHtmlDocument;

  /**
   * Remove every element with one of the given tag names (landmark removal)
   * @returns Number of removed elements
   */
  removeElements(tagNames: readonly string[]): number;

  /**
   * Remove every element whose class attribute contains one of the keywords
   * (case-insensitive substring match)
   * @returns Number of removed elements
   */
  removeByClassKeyword(keywords: readonly string[]): number;

  hasBody(): boolean;

  /**
   * Trimmed, non-empty text nodes of the body, or of the whole document when
   * there is no body. Script and style contents are not text.
   */
  textNodes(): string[];

  /** content attribute of the first <meta> whose property or name equals key */
  metaContent(key: string): string | null;

  /** Every <a href> in document order */
  anchors(): AnchorInfo[];

  /**
   * Anchors inside the first element matched by the first selector (in the
   * given priority order) whose first match contains at least one anchor
   */
  firstRegionAnchors(selectors: readonly string[]): { selector: string; anchors: AnchorInfo[] } | null;

  /** src attributes of legacy <frame> elements */
  frameSources(): string[];

  /**
   * Visible text with scripts and styles removed and whitespace collapsed,
   * cut to the first `length` characters
   */
  textPreview(length: number): string;
}
