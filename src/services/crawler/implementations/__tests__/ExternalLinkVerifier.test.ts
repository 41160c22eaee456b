import http from 'http';
import https from 'https';
import nock from 'nock';
import { ExternalLinkVerifier } from '../ExternalLinkVerifier';

describe('ExternalLinkVerifier', () => {
  let verifier: ExternalLinkVerifier;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    verifier = new ExternalLinkVerifier({ timeoutMs: 2000, userAgent: 'test-agent', maxRedirects: 2 });
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should return the HEAD status when it is conclusive', async () => {
    const scope = nock('https://links.example.org').head('/ok').reply(200);

    await expect(verifier.checkLink('https://links.example.org/ok')).resolves.toBe(200);
    expect(scope.isDone()).toBe(true);
  });

  it('should send the configured user agent', async () => {
    nock('https://links.example.org', { reqheaders: { 'user-agent': 'test-agent' } })
      .head('/ua')
      .reply(204);

    await expect(verifier.checkLink('https://links.example.org/ua')).resolves.toBe(204);
  });

  it('should confirm a 404 with a full GET', async () => {
    const scope = nock('https://links.example.org')
      .head('/missing').reply(404)
      .get('/missing').reply(404, 'Not here');

    await expect(verifier.checkLink('https://links.example.org/missing')).resolves.toBe(404);
    expect(scope.isDone()).toBe(true);
  });

  it('should take the GET answer when HEAD is refused', async () => {
    nock('https://links.example.org')
      .head('/no-head').reply(405)
      .get('/no-head').reply(200, '<html></html>');

    await expect(verifier.checkLink('https://links.example.org/no-head')).resolves.toBe(200);
  });

  it('should not fall back to GET for server errors', async () => {
    const scope = nock('https://links.example.org').head('/broken').reply(500);

    await expect(verifier.checkLink('https://links.example.org/broken')).resolves.toBe(500);
    expect(scope.isDone()).toBe(true);
    expect(nock.pendingMocks()).toEqual([]);
  });

  it('should fall back to GET when HEAD keeps redirecting', async () => {
    nock('https://links.example.org')
      .head('/loop').times(3).reply(302, '', { Location: 'https://links.example.org/loop' })
      .get('/loop').reply(200, 'finally');

    await expect(verifier.checkLink('https://links.example.org/loop')).resolves.toBe(200);
  });

  it('should retry an unreachable http link over https', async () => {
    nock('http://links.example.org').head('/page').replyWithError('connect ECONNREFUSED');
    nock('https://links.example.org').head('/page').reply(200);

    await expect(verifier.checkLink('http://links.example.org/page')).resolves.toBe(200);
  });

  it('should return 0 when both schemes fail', async () => {
    nock('http://links.example.org').head('/down').replyWithError('connect ECONNREFUSED');
    nock('https://links.example.org').head('/down').replyWithError('connect ECONNREFUSED');

    await expect(verifier.checkLink('http://links.example.org/down')).resolves.toBe(0);
  });

  it('should not retry https links', async () => {
    nock('https://links.example.org').head('/down').replyWithError('socket hang up');

    await expect(verifier.checkLink('https://links.example.org/down')).resolves.toBe(0);
  });

  it('should not retry after the check was cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const secure = nock('https://links.example.org').head('/page').reply(200);

    await expect(verifier.checkLink('http://links.example.org/page', controller.signal)).resolves.toBe(0);
    expect(secure.isDone()).toBe(false);
  });

  describe('createAgents', () => {
    it('should pool connections for both schemes', () => {
      const { httpAgent, httpsAgent } = ExternalLinkVerifier.createAgents(5);

      expect(httpAgent).toBeInstanceOf(http.Agent);
      expect(httpAgent.maxSockets).toBe(5);
      expect(httpsAgent).toBeInstanceOf(https.Agent);
      expect(httpsAgent.maxSockets).toBe(5);

      httpAgent.destroy();
      httpsAgent.destroy();
    });
  });

  it('should check plain-http links through the pooled agent', async () => {
    const scope = nock('http://plain.example.org').head('/page').reply(200);

    await expect(verifier.checkLink('http://plain.example.org/page')).resolves.toBe(200);
    expect(scope.isDone()).toBe(true);
  });
});
