/**
 * Checks whether an external URL is reachable.
 */
export interface ILinkVerifier {
  /**
   * @param url URL to check
   * @param signal Aborts the in-flight requests
   * @returns Final HTTP status, or 0 when unreachable after every fallback
   */
  checkLink(url: string, signal?: AbortSignal): Promise<number>;
}
