import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { ILinkVerifier } from '../interfaces/ILinkVerifier';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { describeError } from '../../../utils/errors';

/** HEAD answers that are confirmed with a GET */
const GET_FALLBACK_STATUSES = new Set([403, 404, 405]);

export interface ExternalLinkVerifierOptions {
  timeoutMs: number;
  userAgent: string;
  /** Size of the connection pool shared by concurrent checks */
  maxSockets?: number;
  maxRedirects?: number;
}

/**
 * Outcome of one request sequence against a URL
 */
type LinkProbe =
  | { kind: 'status'; status: number }
  | { kind: 'too-many-redirects'; error: unknown }
  | { kind: 'failure'; error: unknown };

/**
 * Checks off-site links with a HEAD request, confirming doubtful answers with GET
 */
export class ExternalLinkVerifier implements ILinkVerifier {
  private readonly logger = LoggingUtils.createTaggedLogger('link-verifier');
  private readonly client: AxiosInstance;

  constructor(options: ExternalLinkVerifierOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      maxRedirects: options.maxRedirects ?? 20,
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'zh-TW,zh;q=0.9,en;q=0.8'
      },
      ...ExternalLinkVerifier.createAgents(options.maxSockets ?? 20)
    });
  }

  /**
   * Keep-alive pools for both schemes, sized for the concurrent checks of a run
   */
  static createAgents(maxSockets: number): { httpAgent: http.Agent; httpsAgent: https.Agent } {
    return {
      httpAgent: new http.Agent({ keepAlive: true, maxSockets }),
      // Certificate problems do not make a link unreachable for a visitor's report
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets, rejectUnauthorized: false })
    };
  }

  /**
   * @returns The final status, reported for the URL as given even when only
   * its https variant answered; 0 when nothing answered
   */
  async checkLink(url: string, signal?: AbortSignal): Promise<number> {
    const probe = await this.probe(url, signal);
    if (probe.kind === 'status') {
      return probe.status;
    }
    this.logger.debug(`Link check failed for ${url}: ${describeError(probe.error)}`);

    const secureUrl = UrlUtils.toSecureScheme(url);
    if (secureUrl && !signal?.aborted) {
      this.logger.debug(`Retrying ${url} as ${secureUrl}`);
      const secureProbe = await this.probe(secureUrl, signal);
      if (secureProbe.kind === 'status') {
        return secureProbe.status;
      }
      this.logger.debug(`Link check failed for ${secureUrl}: ${describeError(secureProbe.error)}`);
    }

    return 0;
  }

  private async probe(url: string, signal?: AbortSignal): Promise<LinkProbe> {
    const head = await this.request('HEAD', url, signal);

    if (head.kind === 'too-many-redirects') {
      this.logger.debug(`HEAD for ${url} hit the redirect limit, falling back to GET`);
      return this.asFailure(await this.request('GET', url, signal));
    }
    if (head.kind === 'status' && GET_FALLBACK_STATUSES.has(head.status)) {
      this.logger.debug(`HEAD for ${url} returned ${head.status}, falling back to GET`);
      return this.asFailure(await this.request('GET', url, signal));
    }
    return head;
  }

  private async request(method: 'HEAD' | 'GET', url: string, signal?: AbortSignal): Promise<LinkProbe> {
    try {
      const response = await this.client.request({ method, url, signal });
      return { kind: 'status', status: response.status };
    } catch (error) {
      if (ExternalLinkVerifier.isTooManyRedirects(error)) {
        return { kind: 'too-many-redirects', error };
      }
      return { kind: 'failure', error };
    }
  }

  /** A GET fallback has no further fallback of its own */
  private asFailure(probe: LinkProbe): LinkProbe {
    return probe.kind === 'too-many-redirects' ? { kind: 'failure', error: probe.error } : probe;
  }

  private static isTooManyRedirects(error: unknown): boolean {
    if (axios.isAxiosError(error)) {
      return error.code === 'ERR_FR_TOO_MANY_REDIRECTS' || /redirect/i.test(error.message);
    }
    return error instanceof Error && /redirect/i.test(error.message);
  }
}
