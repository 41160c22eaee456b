const UNSAFE_CHARACTERS = /[<>:"/\\|?*]/g;
const SEPARATOR_RUNS = /[_\-\s]+/g;
const MAX_NAME_LENGTH = 150;

/**
 * Utilities for turning page titles into file and directory names
 */
export class FileNameUtils {
  /**
   * Filesystem-safe form of a title: unsafe characters and separator runs
   * become a single underscore, cut to 150 characters
   */
  static sanitize(name: string): string {
    return name
      .replace(UNSAFE_CHARACTERS, '_')
      .replace(SEPARATOR_RUNS, '_')
      .replace(/^[ _]+|[ _]+$/g, '')
      .slice(0, MAX_NAME_LENGTH);
  }

  /**
   * File name for a saved page; `.html` is added unless the name already has an extension
   */
  static fileName(title: string): string {
    const name = FileNameUtils.sanitize(title);
    return name.includes('.') ? name : `${name}.html`;
  }

  /**
   * Directory holding the pages discovered from a parent page
   */
  static linksDirectoryName(parentTitle: string): string {
    return `${FileNameUtils.sanitize(parentTitle)}_links`;
  }
}
