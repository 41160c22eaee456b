/**
 * Persistence for rendered pages.
 */
export interface IPageStore {
  /**
   * False when saved content cannot be read back, which makes content
   * comparison unavailable to the duplicate classifier
   */
  readonly supportsContentComparison: boolean;

  /**
   * Save page content
   * @param content HTML to store
   * @param suggestedName Page title the file name is derived from
   * @param directory Path segments below the site's output directory
   * @returns Path the content was stored under
   */
  save(content: string, suggestedName: string, directory: string[]): Promise<string>;

  /**
   * Read back previously saved content
   * @returns The content, or null when it is not available
   */
  read(savedPath: string): Promise<string | null>;
}
