import { IPageStore } from '../interfaces/IPageStore';

/**
 * Store used when HTML saving is turned off. Nothing is written, so saved
 * content cannot be compared either.
 */
export class DisabledPageStore implements IPageStore {
  readonly supportsContentComparison = false;

  async save(_content: string, suggestedName: string, _directory: string[]): Promise<string> {
    return `[not saved] ${suggestedName}.html`;
  }

  async read(): Promise<string | null> {
    return null;
  }
}
