import { InvalidDomainError, ProxyUnavailableError } from '../lib/errors';
import type { ScanReporter } from '../lib/report/console';
import type { ResultWriter } from '../lib/report/files';
import { Scanner } from '../lib/scan';
import type { FetchCertificatesOptions } from '../lib/sources/crtsh';
import type { OutputFormat, ProxyCheck, ProxyEndpoint, ScanResult } from '../lib/types';

const p1: ProxyEndpoint = { url: 'http://p1:8080', protocol: 'http' };
const p2: ProxyEndpoint = { url: 'http://p2:8080', protocol: 'http' };

function fakeReporter(): jest.Mocked<ScanReporter> {
  return {
    banner: jest.fn(),
    scanResult: jest.fn(),
    batchProgress: jest.fn(),
    batchSummary: jest.fn(),
    proxyTestProgress: jest.fn(),
    proxyTestReport: jest.fn(),
  };
}

function setup(recordsFor: (domain: string) => unknown[] = () => []) {
  const client = {
    fetchCertificates: jest.fn(async (domain: string, _opts: FetchCertificatesOptions): Promise<unknown[]> => recordsFor(domain)),
    testProxy: jest.fn(async (proxy: ProxyEndpoint, _opts?: { strict?: boolean }): Promise<ProxyCheck> => ({ proxy, working: true })),
  };
  const reporter = fakeReporter();
  const writer: jest.Mocked<ResultWriter> = {
    save: jest.fn(async (_result: ScanResult, _format: OutputFormat): Promise<string | null> => '/tmp/out.txt'),
  };
  const sleep = jest.fn(async (_ms: number) => undefined);
  const now = jest.fn(() => 0);
  const scanner = new Scanner({ client, reporter, writer, sleep, now, random: () => 0.75 });
  return { scanner, client, reporter, writer, sleep, now };
}

const base = { timeoutS: 60, retries: 3 };

describe('Scanner.scanDomain', () => {
  test('rejects invalid domains before fetching', async () => {
    const { scanner, client } = setup();
    await expect(scanner.scanDomain('localhost', base)).rejects.toThrow(InvalidDomainError);
    expect(client.fetchCertificates).not.toHaveBeenCalled();
  });

  test('no certificate data ends without output', async () => {
    const { scanner, reporter, writer } = setup(() => []);

    const outcome = await scanner.scanDomain('example.com', { ...base, outputFormat: 'json' });

    expect(outcome).toEqual({ kind: 'no-data', domain: 'example.com' });
    expect(reporter.scanResult).not.toHaveBeenCalled();
    expect(writer.save).not.toHaveBeenCalled();
  });

  test('extracts, sorts, limits, reports and saves', async () => {
    const { scanner, client, reporter, writer, now } = setup(() => [
      { name_value: 'b.example.com\na.example.com' },
      { name_value: '*.c.example.com' },
    ]);
    now.mockReturnValueOnce(1000).mockReturnValueOnce(3500);

    const outcome = await scanner.scanDomain('Example.COM', { ...base, limit: 2, outputFormat: 'txt' });

    const expected: ScanResult = {
      domain: 'example.com',
      subdomains: ['a.example.com', 'b.example.com'],
      responseTimeS: 2.5,
      proxy: null,
      keyword: undefined,
      limit: 2,
    };
    expect(outcome).toEqual({ kind: 'completed', result: expected, savedTo: '/tmp/out.txt' });
    expect(client.fetchCertificates).toHaveBeenCalledWith('example.com', { timeoutS: 60, maxRetries: 3, proxy: null });
    expect(reporter.scanResult).toHaveBeenCalledWith(expected);
    expect(writer.save).toHaveBeenCalledWith(expected, 'txt');
  });

  test('keyword filter applies before the limit', async () => {
    const { scanner } = setup(() => [{ name_value: 'api.example.com\nwww.example.com\nzapi.example.com' }]);

    const outcome = await scanner.scanDomain('example.com', { ...base, keyword: 'API' });

    expect(outcome.kind === 'completed' && outcome.result.subdomains).toEqual(['api.example.com', 'zapi.example.com']);
  });

  test('nothing is saved without an output format', async () => {
    const { scanner, writer } = setup(() => [{ name_value: 'a.example.com' }]);
    const outcome = await scanner.scanDomain('example.com', base);
    expect(writer.save).not.toHaveBeenCalled();
    expect(outcome.kind === 'completed' && outcome.savedTo).toBeNull();
  });

  test('uses the first proxy, or a random one when rotating', async () => {
    const { scanner, client } = setup();

    await scanner.scanDomain('example.com', { ...base, proxyPool: [p1, p2] });
    await scanner.scanDomain('example.com', { ...base, proxyPool: [p1, p2], rotate: true });

    expect(client.fetchCertificates.mock.calls.map(([, opts]) => opts.proxy)).toEqual([p1, p2]);
  });
});

describe('Scanner.batchScan', () => {
  test('pairs the i-th domain with pool[i mod n], 1-indexed', async () => {
    const { scanner, client, reporter, sleep } = setup((d) => (d === 'a.com' ? [{ name_value: 'www.a.com' }] : []));

    const summary = await scanner.batchScan(['a.com', 'b.com'], { timeoutS: 60, proxyPool: [p1, p2] });

    expect(client.fetchCertificates.mock.calls).toEqual([
      ['a.com', { timeoutS: 60, maxRetries: 2, proxy: p2 }],
      ['b.com', { timeoutS: 60, maxRetries: 2, proxy: p1 }],
    ]);
    expect(summary.entries.get('a.com')).toEqual({ count: 1, proxy: p2, subdomains: ['www.a.com'] });
    expect(summary.entries.get('b.com')).toEqual({ count: 0, proxy: p1, subdomains: [] });
    expect(summary.totalSubdomains).toBe(1);
    expect(summary.domainsScanned).toBe(2);
    expect(summary.proxiesAvailable).toBe(2);
    expect(reporter.batchProgress.mock.calls).toEqual([
      [1, 2, p2],
      [2, 2, p1],
    ]);
    expect(reporter.batchSummary).toHaveBeenCalledWith(summary);
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  test('invalid domains get an empty entry and no fetch', async () => {
    const { scanner, client } = setup(() => [{ name_value: 'x.a.com' }]);

    const summary = await scanner.batchScan(['bad', 'a.com'], { timeoutS: 60, proxyPool: [p1] });

    expect(client.fetchCertificates).toHaveBeenCalledTimes(1);
    expect(summary.entries.get('bad')).toEqual({ count: 0, proxy: p1, subdomains: [] });
    expect(summary.entries.get('a.com')).toEqual({ count: 1, proxy: p1, subdomains: ['x.a.com'] });
  });

  test('saves a file per domain with results', async () => {
    const { scanner, writer } = setup((d) => (d === 'a.com' ? [{ name_value: 'www.a.com' }] : []));

    await scanner.batchScan(['a.com', 'b.com'], { timeoutS: 60, proxyPool: [p1], outputFormat: 'csv' });

    expect(writer.save).toHaveBeenCalledTimes(1);
    expect(writer.save.mock.calls[0][0].domain).toBe('a.com');
    expect(writer.save.mock.calls[0][1]).toBe('csv');
  });

  test.each([
    [1, 1],
    [2, 2],
  ])('concurrency %i keeps at most %i fetches in flight and input order', async (concurrency, expectedMax) => {
    const { scanner, client } = setup();
    let inFlight = 0;
    let maxInFlight = 0;
    client.fetchCertificates.mockImplementation(async (domain) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      const ticks = domain === 'a.com' ? 3 : 1;
      for (let i = 0; i < ticks; i++) await new Promise((r) => setImmediate(r));
      inFlight--;
      return [{ name_value: `www.${domain}` }];
    });

    const summary = await scanner.batchScan(['a.com', 'b.com', 'c.com'], { timeoutS: 60, proxyPool: [p1], concurrency });

    expect(maxInFlight).toBe(expectedMax);
    expect([...summary.entries.keys()]).toEqual(['a.com', 'b.com', 'c.com']);
  });
});

describe('Scanner.testProxies', () => {
  test('an empty pool is an error', async () => {
    const { scanner } = setup();
    await expect(scanner.testProxies([])).rejects.toThrow(ProxyUnavailableError);
  });

  test('tests each proxy in turn and splits the report', async () => {
    const { scanner, client, reporter, sleep } = setup();
    client.testProxy.mockImplementation(async (proxy) =>
      proxy === p1 ? { proxy, working: true } : { proxy, working: false, failure: 'fetch failed' },
    );

    const report = await scanner.testProxies([p1, p2], { strict: true });

    expect(report).toEqual({ working: [p1], failed: [{ proxy: p2, working: false, failure: 'fetch failed' }] });
    expect(client.testProxy.mock.calls).toEqual([
      [p1, { strict: true }],
      [p2, { strict: true }],
    ]);
    expect(reporter.proxyTestProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(reporter.proxyTestReport).toHaveBeenCalledWith(report);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });
});
