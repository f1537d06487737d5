export { CONFIG } from './config';
export { isValidDomain, normalizeDomain, assertValidDomain } from './domain';
export {
  CertScoutError,
  InvalidDomainError,
  ProxyUnavailableError,
  FetchFailure,
  PersistenceError,
  getErrorMessage,
} from './errors';
export type { FailureKind } from './errors';
export { extractSubdomains, filterSubdomains, finalizeSubdomains } from './extract';
export { RETRY_POLICY, classifyFetchError, runWithRetry, sleep } from './net/fetchWithRetry';
export type { AttemptState, RetryOutcome, RetryPolicy, Sleep } from './net/fetchWithRetry';
export { createDispatcher } from './net/dispatcher';
export { parseInline, loadFromFile, selectProxy, toProxyEndpoint, describeProxy } from './proxy/pool';
export { ConsoleReporter } from './report/console';
export type { ScanReporter } from './report/console';
export { FileResultWriter, localTimestamp, resultFileName } from './report/files';
export type { ResultWriter } from './report/files';
export { createConsoleStatus, silentStatus } from './report/status';
export type { Severity, StatusLogger } from './report/status';
export { Scanner } from './scan';
export type { BatchOptions, CertificateSource, ScanOptions, ScanOutcome } from './scan';
export { CrtShClient } from './sources/crtsh';
export type { FetchFn, HttpResponse } from './sources/crtsh';
export { runCli } from './cli';
export type * from './types';
