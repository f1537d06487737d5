/**
 * Error taxonomy shared by the scanner, fetcher and writers.
 */

export class CertScoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CertScoutError';
  }
}

export class InvalidDomainError extends CertScoutError {
  constructor(public readonly domain: string) {
    super(`Invalid domain format: ${domain}`, 'INVALID_DOMAIN', { domain });
    this.name = 'InvalidDomainError';
  }
}

export class ProxyUnavailableError extends CertScoutError {
  constructor(message = 'No proxies provided') {
    super(message, 'PROXY_UNAVAILABLE');
    this.name = 'ProxyUnavailableError';
  }
}

export type FailureKind =
  | 'timeout'
  | 'connection'
  | 'proxy'
  | 'rate-limited'
  | 'http'
  | 'malformed'
  | 'unexpected';

/**
 * One failed attempt against the aggregator. Never escapes the fetcher.
 */
export class FetchFailure extends CertScoutError {
  readonly status?: number;

  constructor(
    public readonly kind: FailureKind,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, 'FETCH_FAILURE', { kind, status: options?.status });
    this.name = 'FetchFailure';
    this.status = options?.status;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class PersistenceError extends CertScoutError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to write file: ${getErrorMessage(cause)}`, 'PERSISTENCE_ERROR', { path });
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
