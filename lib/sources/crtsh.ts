import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { CONFIG } from '../config';
import { FetchFailure, getErrorMessage } from '../errors';
import logger from '../logger';
import { incFetchAttempts, incFetchFailures, incRateLimited } from '../metrics';
import { createDispatcher, type DispatcherFactory } from '../net/dispatcher';
import { runWithRetry, sleep as defaultSleep, type AttemptState, type Sleep } from '../net/fetchWithRetry';
import { describeProxy } from '../proxy/pool';
import { silentStatus, type StatusLogger } from '../report/status';
import type { ProxyCheck, ProxyEndpoint } from '../types';

export interface HttpRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'follow';
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

export interface CrtShClientOptions {
  fetchFn?: FetchFn;
  sleep?: Sleep;
  status?: StatusLogger;
  dispatcherFactory?: DispatcherFactory;
  baseUrl?: string;
  userAgent?: string;
  connectTimeoutMs?: number;
}

export interface FetchCertificatesOptions {
  timeoutS: number;
  maxRetries: number;
  proxy?: ProxyEndpoint | null;
}

interface RunOptions extends FetchCertificatesOptions {
  testMode: boolean;
}

/**
 * crt.sh Certificate Transparency log search.
 * Queries `%.<domain>` and returns the raw certificate records.
 */
export class CrtShClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly status: StatusLogger;
  private readonly dispatcherFactory: DispatcherFactory;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly connectTimeoutMs: number;

  constructor(opts: CrtShClientOptions = {}) {
    this.fetchFn = opts.fetchFn ?? defaultFetch;
    this.sleep = opts.sleep ?? defaultSleep;
    this.status = opts.status ?? silentStatus;
    this.dispatcherFactory = opts.dispatcherFactory ?? createDispatcher;
    this.baseUrl = opts.baseUrl ?? CONFIG.CRTSH_URL;
    this.userAgent = opts.userAgent ?? CONFIG.USER_AGENT;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? CONFIG.CONNECT_TIMEOUT_MS;
  }

  buildUrl(domain: string): string {
    const url = new URL(this.baseUrl);
    // crt.sh expects a literal `%` wildcard, sent encoded as %25
    url.search = `q=%25.${encodeURIComponent(domain)}&output=json`;
    return url.toString();
  }

  /**
   * Fetch the raw certificate records for `domain`. Never throws: every
   * failure path is logged and ends in an empty list.
   */
  async fetchCertificates(domain: string, opts: FetchCertificatesOptions): Promise<unknown[]> {
    const outcome = await this.run(domain, { ...opts, testMode: false });
    return outcome.ok ? outcome.value : [];
  }

  /**
   * Test-mode fetch through `proxy` against a known-good domain; records are
   * discarded. By default a proxy counts as working whenever the call
   * completes, which is every time since failures are absorbed. `strict`
   * requires an actual successful response instead.
   */
  async testProxy(proxy: ProxyEndpoint, opts?: { strict?: boolean }): Promise<ProxyCheck> {
    try {
      const outcome = await this.run(CONFIG.PROXY_TEST.DOMAIN, {
        timeoutS: CONFIG.PROXY_TEST.TIMEOUT_S,
        maxRetries: 1,
        proxy,
        testMode: true,
      });
      if (opts?.strict && !outcome.ok) {
        return { proxy, working: false, failure: outcome.failure.message };
      }
      return { proxy, working: true };
    } catch (err) {
      return { proxy, working: false, failure: getErrorMessage(err) };
    }
  }

  private async run(domain: string, opts: RunOptions) {
    const proxy = opts.proxy ?? null;
    const url = this.buildUrl(domain);
    const readTimeoutMs = opts.timeoutS * 1000;
    this.status.log('debug', `GET ${url}`);

    // created lazily so a broken proxy URL is reported as an attempt failure
    const held: { dispatcher?: Dispatcher } = {};
    try {
      const outcome = await runWithRetry<unknown[]>(
        async () => {
          const dispatcher = (held.dispatcher ??= this.dispatcherFactory(proxy, {
            connectTimeoutMs: this.connectTimeoutMs,
            readTimeoutMs,
          }));
          return this.attempt(url, dispatcher);
        },
        {
          maxAttempts: opts.maxRetries,
          sleep: this.sleep,
          onTransition: (s, max) => this.report(s, max, domain, proxy, opts.testMode),
        },
      );
      return outcome;
    } finally {
      if (held.dispatcher) {
        await held.dispatcher.close().catch((err: unknown) => logger.debug({ err }, 'dispatcher close failed'));
      }
    }
  }

  /**
   * One GET. Timeouts belong to the dispatcher: connect, then headers and
   * body each bounded by the read timeout between bytes, so a slow but
   * steady stream is never cut off.
   */
  private async attempt(url: string, dispatcher: Dispatcher): Promise<unknown[]> {
    incFetchAttempts();
    const res = await this.fetchFn(url, {
      method: 'GET',
      headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      redirect: 'follow',
      dispatcher,
    });
    if (res.status === 429) {
      throw new FetchFailure('rate-limited', 'Rate limited (429)', { status: 429 });
    }
    if (!res.ok) {
      throw new FetchFailure('http', `HTTP Error: ${res.status}`, { status: res.status });
    }
    const body = await res.text();
    return parseRecords(body);
  }

  private report(
    s: AttemptState<unknown[]>,
    max: number,
    domain: string,
    proxy: ProxyEndpoint | null,
    testMode: boolean,
  ): void {
    const via = proxy ? ` via ${describeProxy(proxy)}` : '';
    switch (s.state) {
      case 'attempting':
        if (testMode && proxy) {
          this.status.log('info', `Testing proxy ${describeProxy(proxy)}...`);
        } else {
          this.status.log('info', `Fetching ${domain}${via}... (Attempt ${s.attempt}/${max})`);
        }
        return;
      case 'succeeded':
        if (testMode && proxy) {
          this.status.log('success', `Proxy ✓ ${describeProxy(proxy)} is working`);
        } else {
          this.status.log('success', `Retrieved ${s.value.length} certificates (from ${proxy ? describeProxy(proxy) : 'direct IP'})`);
        }
        return;
      case 'backoff': {
        incFetchFailures(s.failure.kind);
        const seconds = Math.round(s.delayMs / 1000);
        const n = `${s.attempt}/${max}`;
        switch (s.failure.kind) {
          case 'timeout':
            this.status.log('warning', `Timeout on attempt ${n}. Retrying in ${seconds} seconds...`);
            break;
          case 'connection':
            this.status.log('warning', `Connection error on attempt ${n}. Retrying in ${seconds} seconds...`);
            break;
          case 'rate-limited':
            incRateLimited();
            this.status.log('warning', `Rate limited (429). Waiting ${seconds} seconds...`);
            break;
          case 'malformed':
            this.status.log('warning', `Invalid JSON on attempt ${n}. Retrying...`);
            break;
          default:
            this.status.log('warning', `Error on attempt ${n}: ${truncate(s.failure.message)}...`);
        }
        return;
      }
      case 'exhausted': {
        incFetchFailures(s.failure.kind);
        const f = s.failure;
        switch (f.kind) {
          case 'timeout':
            this.status.log('error', `Timeout after ${s.attempt} attempts.`);
            break;
          case 'connection':
            this.status.log('error', `Connection error: ${truncate(f.message)}`);
            break;
          case 'proxy':
            this.status.log('error', `Proxy error: ${describeProxy(proxy)} is not working or unreachable`);
            break;
          case 'rate-limited':
            incRateLimited();
            this.status.log('error', `Rate limited (429) after ${s.attempt} attempts.`);
            break;
          case 'http':
            this.status.log('error', `HTTP Error: ${f.status ?? 'unknown'}`);
            break;
          case 'malformed':
            this.status.log('error', 'Invalid JSON response from crt.sh');
            break;
          default:
            this.status.log('error', `Unexpected error: ${f.message}`);
        }
        return;
      }
    }
  }
}

/**
 * crt.sh answers with a JSON array; anything else is a malformed body worth
 * retrying. Elements are validated one by one during extraction.
 */
export function parseRecords(body: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new FetchFailure('malformed', 'Invalid JSON response', { cause: err });
  }
  if (!Array.isArray(data)) {
    throw new FetchFailure('malformed', 'Expected a JSON array of certificates');
  }
  return data;
}

function truncate(s: string, n = 50): string {
  return s.length > n ? s.slice(0, n) : s;
}

export default CrtShClient;
