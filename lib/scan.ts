import pLimit from 'p-limit';
import { CONFIG } from './config';
import { assertValidDomain } from './domain';
import { InvalidDomainError, ProxyUnavailableError } from './errors';
import { extractSubdomains, filterSubdomains, finalizeSubdomains } from './extract';
import logger from './logger';
import { incSubdomainsFound, observeScanDuration } from './metrics';
import { sleep as defaultSleep, type Sleep } from './net/fetchWithRetry';
import { describeProxy, selectProxy } from './proxy/pool';
import type { ScanReporter } from './report/console';
import type { ResultWriter } from './report/files';
import { silentStatus, type StatusLogger } from './report/status';
import type { FetchCertificatesOptions } from './sources/crtsh';
import type {
  BatchEntry,
  BatchSummary,
  OutputFormat,
  ProxyCheck,
  ProxyEndpoint,
  ProxyPool,
  ProxyTestReport,
  ScanResult,
} from './types';

/** What the scanner needs from a certificate source (crt.sh in practice). */
export interface CertificateSource {
  fetchCertificates(domain: string, opts: FetchCertificatesOptions): Promise<unknown[]>;
  testProxy(proxy: ProxyEndpoint, opts?: { strict?: boolean }): Promise<ProxyCheck>;
}

export interface ScannerDeps {
  client: CertificateSource;
  reporter: ScanReporter;
  writer: ResultWriter;
  status?: StatusLogger;
  sleep?: Sleep;
  /** epoch ms */
  now?: () => number;
  random?: () => number;
}

export interface ScanOptions {
  keyword?: string;
  outputFormat?: OutputFormat;
  limit?: number;
  timeoutS: number;
  retries: number;
  proxyPool?: ProxyPool;
  rotate?: boolean;
}

export interface BatchOptions {
  keyword?: string;
  outputFormat?: OutputFormat;
  timeoutS: number;
  proxyPool?: ProxyPool;
  /** Requests in flight at once; 1 keeps the batch strictly sequential. */
  concurrency?: number;
}

export type ScanOutcome =
  | { kind: 'completed'; result: ScanResult; savedTo: string | null }
  | { kind: 'no-data'; domain: string };

export class Scanner {
  private readonly client: CertificateSource;
  private readonly reporter: ScanReporter;
  private readonly writer: ResultWriter;
  private readonly status: StatusLogger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(deps: ScannerDeps) {
    this.client = deps.client;
    this.reporter = deps.reporter;
    this.writer = deps.writer;
    this.status = deps.status ?? silentStatus;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Scan one domain: fetch, extract, filter, sort, limit, report.
   * Throws InvalidDomainError before any network call; an empty fetch ends
   * in a `no-data` outcome with nothing displayed or written.
   */
  async scanDomain(input: string, opts: ScanOptions): Promise<ScanOutcome> {
    const domain = assertValidDomain(input);
    const start = this.now();

    this.status.log('info', `Starting scan for ${domain}`);

    const pool = opts.proxyPool ?? [];
    let proxy: ProxyEndpoint | null = null;
    if (pool.length) {
      if (opts.rotate) {
        proxy = selectProxy(pool, 'random', 0, this.random);
        this.status.log('info', 'Using random proxy from pool');
      } else {
        proxy = selectProxy(pool, 'first');
        this.status.log('info', `Using proxy: ${describeProxy(proxy)}`);
      }
    } else {
      this.status.log('info', 'Using direct IP (no proxy)');
    }

    const records = await this.client.fetchCertificates(domain, {
      timeoutS: opts.timeoutS,
      maxRetries: opts.retries,
      proxy,
    });
    if (!records.length) {
      this.status.log('warning', 'No certificate data found');
      return { kind: 'no-data', domain };
    }

    let subdomains = extractSubdomains(records, domain, this.status);
    this.status.log('success', `Extracted ${subdomains.size} unique subdomains`);

    if (opts.keyword) {
      subdomains = filterSubdomains(subdomains, opts.keyword);
      this.status.log('success', `Filtered by '${opts.keyword}': ${subdomains.size} subdomains`);
    }

    const list = finalizeSubdomains(subdomains, opts.limit);
    if (opts.limit) {
      this.status.log('info', `Limited to ${opts.limit} results`);
    }

    const responseTimeS = (this.now() - start) / 1000;
    observeScanDuration(responseTimeS);
    incSubdomainsFound(list.length);

    const result: ScanResult = Object.freeze({
      domain,
      subdomains: Object.freeze(list),
      responseTimeS,
      proxy,
      keyword: opts.keyword,
      limit: opts.limit,
    });

    this.reporter.scanResult(result);
    const savedTo = opts.outputFormat ? await this.writer.save(result, opts.outputFormat) : null;
    return { kind: 'completed', result, savedTo };
  }

  /**
   * Scan many domains, pairing the i-th domain (1-indexed) with
   * `pool[i mod len]`. Every domain gets an entry, failures included, and
   * consecutive domains are spaced by the pacing delay.
   */
  async batchScan(domains: readonly string[], opts: BatchOptions): Promise<BatchSummary> {
    const pool = opts.proxyPool ?? [];
    const total = domains.length;
    const concurrency = Math.max(1, Math.floor(opts.concurrency ?? CONFIG.BATCH.CONCURRENCY));
    const limit = pLimit(concurrency);

    this.status.log('info', `Starting batch scan: ${total} domain(s) with ${pool.length} proxy/proxies`);
    logger.debug({ total, proxies: pool.length, concurrency }, 'batch scan started');

    const done = await Promise.all(
      domains.map((input, idx) =>
        limit(async () => {
          const i = idx + 1;
          const scanned = await this.batchEntry(input, i, total, pool, opts);
          if (i < total) await this.sleep(CONFIG.BATCH.PACING_MS);
          return scanned;
        }),
      ),
    );

    const entries = new Map<string, BatchEntry>();
    for (const { key, entry } of done) entries.set(key, entry);

    let totalSubdomains = 0;
    for (const entry of entries.values()) totalSubdomains += entry.count;

    const summary: BatchSummary = {
      entries,
      domainsScanned: total,
      proxiesAvailable: pool.length,
      totalSubdomains,
    };
    this.reporter.batchSummary(summary);
    return summary;
  }

  private async batchEntry(
    input: string,
    i: number,
    total: number,
    pool: ProxyPool,
    opts: BatchOptions,
  ): Promise<{ key: string; entry: BatchEntry }> {
    const proxy = selectProxy(pool, 'round-robin', i);
    this.reporter.batchProgress(i, total, proxy);

    let domain: string;
    try {
      domain = assertValidDomain(input);
    } catch (err) {
      if (!(err instanceof InvalidDomainError)) throw err;
      this.status.log('error', err.message);
      return { key: input, entry: { count: 0, proxy, subdomains: [] } };
    }

    const start = this.now();
    const records = await this.client.fetchCertificates(domain, {
      timeoutS: opts.timeoutS,
      maxRetries: CONFIG.BATCH.RETRIES,
      proxy,
    });
    if (!records.length) {
      this.status.log('warning', `${domain}: No results`);
      return { key: domain, entry: { count: 0, proxy, subdomains: [] } };
    }

    const subs = filterSubdomains(extractSubdomains(records, domain, this.status), opts.keyword);
    const entry: BatchEntry = { count: subs.size, proxy, subdomains: finalizeSubdomains(subs) };
    this.status.log('success', `${domain}: ${entry.count} subdomains`);
    incSubdomainsFound(entry.count);

    if (opts.outputFormat && entry.count > 0) {
      await this.writer.save(
        {
          domain,
          subdomains: entry.subdomains,
          responseTimeS: (this.now() - start) / 1000,
          proxy,
          keyword: opts.keyword,
        },
        opts.outputFormat,
      );
    }
    return { key: domain, entry };
  }

  /**
   * Check every proxy of the pool with a test-mode fetch, one at a time.
   */
  async testProxies(pool: ProxyPool, opts?: { strict?: boolean }): Promise<ProxyTestReport> {
    if (!pool.length) throw new ProxyUnavailableError();

    this.status.log('info', `Testing ${pool.length} proxy/proxies...`);
    const report: ProxyTestReport = { working: [], failed: [] };

    for (let i = 0; i < pool.length; i++) {
      this.reporter.proxyTestProgress(i + 1, pool.length);
      const check = await this.client.testProxy(pool[i], { strict: opts?.strict });
      if (check.working) report.working.push(check.proxy);
      else report.failed.push(check);
      await this.sleep(CONFIG.PROXY_TEST.PACING_MS);
    }

    this.reporter.proxyTestReport(report);
    return report;
  }
}

export default Scanner;
