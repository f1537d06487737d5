import { readFile } from 'fs/promises';
import logger from '../logger';
import { getErrorMessage } from '../errors';
import type { StatusLogger } from '../report/status';
import type { ProxyEndpoint, ProxyPool, ProxyProtocol, ProxyStrategy } from '../types';

const KNOWN_SCHEMES: ReadonlyArray<[string, ProxyProtocol]> = [
  ['http://', 'http'],
  ['https://', 'https'],
  ['socks5://', 'socks5'],
];

/**
 * Build an endpoint from a raw entry, prefixing `http://` when the entry has
 * no recognized scheme. Best-effort: the rest of the entry is not checked.
 */
export function toProxyEndpoint(raw: string): ProxyEndpoint {
  const entry = raw.trim();
  for (const [prefix, protocol] of KNOWN_SCHEMES) {
    if (entry.startsWith(prefix)) return { url: entry, protocol };
  }
  return { url: `http://${entry}`, protocol: 'http' };
}

/** Parse a comma-separated proxy list. Never fails. */
export function parseInline(list: string): ProxyEndpoint[] {
  if (!list) return [];
  return list
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map(toProxyEndpoint);
}

/**
 * Load proxies from a file, one per line. Read failures are reported and
 * yield an empty pool.
 */
export async function loadFromFile(path: string, status: StatusLogger): Promise<ProxyEndpoint[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    logger.debug({ err, path }, 'proxy file read failed');
    if (isNotFound(err)) {
      status.log('error', `Proxy file not found: ${path}`);
    } else {
      status.log('error', `Error reading proxy file: ${getErrorMessage(err)}`);
    }
    return [];
  }

  const proxies = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(toProxyEndpoint);
  status.log('success', `Loaded ${proxies.length} proxies from ${path}`);
  return proxies;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Pick the proxy for one request. `null` means direct connection.
 * Round-robin uses `index mod len`, so indexes a multiple of the pool size
 * apart always map to the same proxy.
 */
export function selectProxy(
  pool: ProxyPool,
  strategy: ProxyStrategy,
  index = 0,
  random: () => number = Math.random,
): ProxyEndpoint | null {
  if (pool.length === 0) return null;
  switch (strategy) {
    case 'first':
      return pool[0];
    case 'random':
      return pool[Math.min(pool.length - 1, Math.floor(random() * pool.length))];
    case 'round-robin':
      return pool[((index % pool.length) + pool.length) % pool.length];
  }
}

/** Printable form with any password masked. */
export function describeProxy(proxy: ProxyEndpoint | null): string {
  if (!proxy) return 'direct';
  try {
    const u = new URL(proxy.url);
    if (!u.password) return proxy.url;
    u.password = '***';
    return u.toString().replace(/\/$/, '');
  } catch {
    return proxy.url;
  }
}
