import { probeSite } from './probe-worker';
import { buildProbeTask } from './sites';
import { failing, fakeFetch, hanging, makeSite, redirectTo, respond } from './test-utils';
import type { FetchLike } from './http';

describe('probeSite', () => {
  const site = makeSite('Example', {
    urlTemplate: 'https://example.test/{account}',
    prettyUrlTemplate: 'https://example.test/@{account}',
  });

  test('found verdict carries the profile url and status', async () => {
    const fake = fakeFetch({ 'https://example.test/alice': respond(200, 'hello') });
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });

    expect(verdict.site).toBe(site);
    expect(verdict.outcome).toBe('found');
    expect(verdict.status).toBe(200);
    expect(verdict.detail).toBe('HTTP 200');
    expect(verdict.url).toBe('https://example.test/@alice');
    expect(Object.isFrozen(verdict)).toBe(true);
  });

  test('not found verdict for a non-matching status', async () => {
    const fake = fakeFetch({ 'https://example.test/alice': respond(404) });
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });
    expect(verdict.outcome).toBe('not-found');
    expect(verdict.status).toBe(404);
  });

  test('sends default headers merged with site headers', async () => {
    const withHeaders = makeSite('Api', {
      urlTemplate: 'https://api.test/{account}',
      headers: { accept: 'application/json', 'x-requested-with': 'namescout' },
    });
    const fake = fakeFetch({ 'https://api.test/alice': respond(200) });
    await probeSite(buildProbeTask(withHeaders, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });

    const headers = fake.calls[0].init?.headers as Record<string, string>;
    expect(headers['accept']).toBe('application/json');
    expect(headers['x-requested-with']).toBe('namescout');
    expect(headers['user-agent']).toContain('Mozilla/5.0');
    expect(fake.calls[0].init?.method).toBe('GET');
    expect(fake.calls[0].init?.redirect).toBe('manual');
  });

  test('posts the filled body for POST sites', async () => {
    const poster = makeSite('Poster', {
      urlTemplate: 'https://poster.test/check?u={account}',
      method: 'POST',
      postBody: 'username={account}',
    });
    const fake = fakeFetch({ 'https://poster.test/check?u=alice': respond(200) });
    await probeSite(buildProbeTask(poster, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });

    expect(fake.calls[0].init?.method).toBe('POST');
    expect(fake.calls[0].init?.body).toBe('username=alice');
  });

  test('follows redirects to the final response', async () => {
    const fake = fakeFetch({
      'https://example.test/alice': redirectTo('/users/alice', 301),
      'https://example.test/users/alice': redirectTo('https://www.example.test/users/alice'),
      'https://www.example.test/users/alice': respond(200),
    });
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });

    expect(verdict.outcome).toBe('found');
    expect(fake.calls.map((call) => call.url)).toEqual([
      'https://example.test/alice',
      'https://example.test/users/alice',
      'https://www.example.test/users/alice',
    ]);
  });

  test('redirect chain longer than the cap fails', async () => {
    const fake = fakeFetch({
      'https://example.test/alice': redirectTo('https://example.test/loop'),
      'https://example.test/loop': redirectTo('https://example.test/loop'),
    });
    const verdict = await probeSite(buildProbeTask(site, 'alice'), {
      timeoutMs: 1000,
      fetchImpl: fake.fetch,
      maxRedirects: 3,
    });

    expect(verdict.outcome).toBe('failed');
    expect(verdict.detail).toBe('too-many-redirects');
    expect(fake.calls).toHaveLength(4);
  });

  test('a probe that never answers times out within a small overshoot', async () => {
    const fake = fakeFetch({ 'https://example.test/alice': hanging() });
    const started = Date.now();
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });
    const elapsed = Date.now() - started;

    expect(verdict.outcome).toBe('failed');
    expect(verdict.detail).toBe('timeout');
    expect(elapsed).toBeGreaterThanOrEqual(990);
    expect(elapsed).toBeLessThan(1200);
  });

  test('times out even when the transport ignores the abort signal', async () => {
    const deaf: FetchLike = () => new Promise<Response>(() => undefined);
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 50, fetchImpl: deaf });
    expect(verdict.detail).toBe('timeout');
  });

  test('run cancellation aborts an in-flight probe', async () => {
    const fake = fakeFetch({ 'https://example.test/alice': hanging() });
    const controller = new AbortController();
    const pending = probeSite(buildProbeTask(site, 'alice'), {
      timeoutMs: 10_000,
      signal: controller.signal,
      fetchImpl: fake.fetch,
    });
    setTimeout(() => controller.abort(), 20);

    const verdict = await pending;
    expect(verdict.outcome).toBe('failed');
    expect(verdict.detail).toBe('cancelled');
  });

  test('already cancelled run does not issue a request', async () => {
    const fake = fakeFetch({ 'https://example.test/alice': respond(200) });
    const controller = new AbortController();
    controller.abort();
    const verdict = await probeSite(buildProbeTask(site, 'alice'), {
      timeoutMs: 1000,
      signal: controller.signal,
      fetchImpl: fake.fetch,
    });
    expect(verdict.detail).toBe('cancelled');
    expect(fake.calls).toHaveLength(0);
  });

  test.each([
    ['ENOTFOUND', 'dns'],
    ['ECONNREFUSED', 'connection-refused'],
    ['ECONNRESET', 'connection-reset'],
    ['CERT_HAS_EXPIRED', 'tls'],
    ['EWHATEVER', 'network-error'],
  ])('transport error %s is classified as %s', async (code, category) => {
    const fake = fakeFetch({ 'https://example.test/alice': failing(code) });
    const verdict = await probeSite(buildProbeTask(site, 'alice'), { timeoutMs: 1000, fetchImpl: fake.fetch });
    expect(verdict.outcome).toBe('failed');
    expect(verdict.detail).toBe(category);
    expect(verdict.status).toBe(0);
  });

  test('bad url fails without a request', async () => {
    const fake = fakeFetch({});
    const verdict = await probeSite(buildProbeTask(site, 'alice smith'), { timeoutMs: 1000, fetchImpl: fake.fetch });
    expect(verdict.outcome).toBe('failed');
    expect(verdict.detail).toBe('bad-url');
    expect(fake.calls).toHaveLength(0);
  });
});
