import { SocksClientError } from 'socks';
import { CONFIG } from '../config';
import { FetchFailure, getErrorMessage, type FailureKind } from '../errors';
import logger from '../logger';

export interface RetryPolicy {
  retry: boolean;
  backoffMs: number;
}

/** What each failure class costs before the next attempt. */
export const RETRY_POLICY: Readonly<Record<FailureKind, RetryPolicy>> = {
  timeout: { retry: true, backoffMs: CONFIG.BACKOFF.TIMEOUT_MS },
  connection: { retry: true, backoffMs: CONFIG.BACKOFF.CONNECTION_MS },
  proxy: { retry: false, backoffMs: 0 },
  'rate-limited': { retry: true, backoffMs: CONFIG.BACKOFF.RATE_LIMIT_MS },
  http: { retry: false, backoffMs: 0 },
  malformed: { retry: true, backoffMs: CONFIG.BACKOFF.MALFORMED_MS },
  unexpected: { retry: true, backoffMs: CONFIG.BACKOFF.UNEXPECTED_MS },
};

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

export type AttemptState<T> =
  | { state: 'attempting'; attempt: number }
  | { state: 'backoff'; attempt: number; failure: FetchFailure; delayMs: number }
  | { state: 'succeeded'; attempt: number; value: T }
  | { state: 'exhausted'; attempt: number; failure: FetchFailure };

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: FetchFailure; attempts: number };

export interface RetryOptions<T> {
  maxAttempts: number;
  sleep?: Sleep;
  policy?: Readonly<Record<FailureKind, RetryPolicy>>;
  /** Called on every state entered, before any sleep. */
  onTransition?: (state: AttemptState<T>, maxAttempts: number) => void;
}

/**
 * Drive `attemptFn` through attempting → backoff → attempting ... until it
 * succeeds or the failure is final. Never throws; whatever the attempt throws
 * is classified into a `FetchFailure`.
 */
export async function runWithRetry<T>(
  attemptFn: (attempt: number) => Promise<T>,
  opts: RetryOptions<T>,
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  const wait = opts.sleep ?? sleep;
  const policy = opts.policy ?? RETRY_POLICY;
  const emit = (s: AttemptState<T>) => opts.onTransition?.(s, maxAttempts);

  let current: AttemptState<T> = { state: 'attempting', attempt: 1 };
  while (true) {
    emit(current);
    switch (current.state) {
      case 'attempting': {
        const attempt: number = current.attempt;
        try {
          const value = await attemptFn(attempt);
          current = { state: 'succeeded', attempt, value };
        } catch (err) {
          const failure = toFetchFailure(err);
          const rule = policy[failure.kind];
          logger.debug({ attempt, kind: failure.kind, err: failure.cause ?? failure }, 'fetch attempt failed');
          current = rule.retry && attempt < maxAttempts
            ? { state: 'backoff', attempt, failure, delayMs: rule.backoffMs }
            : { state: 'exhausted', attempt, failure };
        }
        break;
      }
      case 'backoff':
        await wait(current.delayMs);
        current = { state: 'attempting', attempt: current.attempt + 1 };
        break;
      case 'succeeded':
        return { ok: true, value: current.value, attempts: current.attempt };
      case 'exhausted':
        return { ok: false, failure: current.failure, attempts: current.attempt };
    }
  }
}

const TIMEOUT_NAMES = new Set(['AbortError', 'TimeoutError', 'ConnectTimeoutError', 'HeadersTimeoutError', 'BodyTimeoutError']);
const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

/**
 * Map a thrown value to a failure class by walking its `cause` chain.
 * An unreachable proxy is a connection failure; a proxy that answers but
 * refuses the tunnel (or a SOCKS handshake that fails) is a proxy failure.
 * Proxy refusals are checked first: undici reports a refused CONNECT as an
 * `AbortError`.
 */
export function classifyFetchError(err: unknown): FailureKind {
  if (err instanceof FetchFailure) return err.kind;

  const chain = causeChain(err);
  const names = chain.map((e) => e.name);
  const codes = chain.map((e) => e.code).filter((c): c is string => typeof c === 'string');
  const messages = chain.map((e) => e.message);

  const socks = chain.find((e) => e.error instanceof SocksClientError);
  if (socks) return classifySocksMessage(socks.message);

  if (codes.includes('UND_ERR_PRX_TLS') || messages.some((m) => PROXY_REFUSED.test(m))) {
    return 'proxy';
  }
  if (names.some((n) => TIMEOUT_NAMES.has(n)) || codes.some((c) => TIMEOUT_CODES.has(c))) {
    return 'timeout';
  }
  if (codes.some((c) => CONNECTION_CODES.has(c))) {
    return 'connection';
  }
  if (messages.some((m) => m === 'fetch failed')) {
    return 'connection';
  }
  return 'unexpected';
}

const PROXY_REFUSED = /^Proxy response \(\d+\)/;

// SocksClientError carries no code; socket failures only show up in its message.
function classifySocksMessage(message: string): FailureKind {
  if (/timed out/i.test(message)) return 'timeout';
  for (const code of TIMEOUT_CODES) {
    if (message.includes(code)) return 'timeout';
  }
  for (const code of CONNECTION_CODES) {
    if (message.includes(code)) return 'connection';
  }
  return 'proxy';
}

interface ErrorLink {
  error: object;
  name: string;
  message: string;
  code?: unknown;
}

function causeChain(err: unknown): ErrorLink[] {
  const out: ErrorLink[] = [];
  const seen = new Set<unknown>();
  let cur: unknown = err;
  while (cur && typeof cur === 'object' && !seen.has(cur) && out.length < 10) {
    seen.add(cur);
    const name = 'name' in cur && typeof cur.name === 'string' ? cur.name : '';
    const code = 'code' in cur ? cur.code : undefined;
    out.push({ error: cur, name, message: getErrorMessage(cur), code });
    cur = 'cause' in cur ? cur.cause : undefined;
  }
  return out;
}

function toFetchFailure(err: unknown): FetchFailure {
  if (err instanceof FetchFailure) return err;
  return new FetchFailure(classifyFetchError(err), getErrorMessage(err), { cause: err });
}
