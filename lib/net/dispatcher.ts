import { connect as tlsConnect } from 'tls';
import { Agent, ProxyAgent, type Dispatcher } from 'undici';
import { SocksClient } from 'socks';
import { FetchFailure } from '../errors';
import logger from '../logger';
import type { ProxyEndpoint } from '../types';

export interface DispatcherOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export type DispatcherFactory = (proxy: ProxyEndpoint | null, opts: DispatcherOptions) => Dispatcher;

/**
 * Build the undici dispatcher for one fetch. Certificate verification of the
 * aggregator is disabled on every route: crt.sh is queried with a
 * trust-everything TLS policy, and a proxy cannot make that stricter.
 */
export const createDispatcher: DispatcherFactory = (proxy, opts) => {
  const timeouts = { headersTimeout: opts.readTimeoutMs, bodyTimeout: opts.readTimeoutMs };
  const tlsOpts = { rejectUnauthorized: false, timeout: opts.connectTimeoutMs };

  if (!proxy) {
    return new Agent({ ...timeouts, connect: tlsOpts });
  }

  let target: URL;
  try {
    target = new URL(proxy.url);
  } catch (err) {
    throw new FetchFailure('proxy', `Malformed proxy URL: ${proxy.url}`, { cause: err });
  }
  logger.debug({ protocol: proxy.protocol, host: target.host }, 'creating proxy dispatcher');

  if (proxy.protocol === 'socks5') {
    return createSocksAgent(target, opts);
  }

  return new ProxyAgent({
    uri: proxy.url,
    ...timeouts,
    requestTls: tlsOpts,
    proxyTls: tlsOpts,
  });
};

function createSocksAgent(target: URL, opts: DispatcherOptions): Agent {
  const proxyPort = Number(target.port) || 1080;
  const userId = target.username ? decodeURIComponent(target.username) : undefined;
  const password = target.password ? decodeURIComponent(target.password) : undefined;

  return new Agent({
    headersTimeout: opts.readTimeoutMs,
    bodyTimeout: opts.readTimeoutMs,
    connect: (options, callback) => {
      const port = Number(options.port) || (options.protocol === 'https:' ? 443 : 80);
      SocksClient.createConnection({
        proxy: { host: target.hostname, port: proxyPort, type: 5, userId, password },
        command: 'connect',
        destination: { host: options.hostname, port },
        timeout: opts.connectTimeoutMs,
      })
        .then(({ socket }) => {
          if (options.protocol !== 'https:') {
            callback(null, socket);
            return;
          }
          const secure = tlsConnect({
            socket,
            servername: options.servername ?? options.hostname,
            rejectUnauthorized: false,
          });
          secure.once('secureConnect', () => callback(null, secure));
          secure.once('error', (err) => callback(err, null));
        })
        .catch((err: unknown) => {
          callback(err instanceof Error ? err : new Error(String(err)), null);
        });
    },
  });
}
