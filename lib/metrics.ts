/**
 * Minimal Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `certscout_fetch_attempts_total` (Counter)
 * - `certscout_fetch_failures_total{kind}` (Counter)
 * - `certscout_rate_limited_total` (Counter)
 * - `certscout_subdomains_found_total` (Counter)
 * - `certscout_scan_duration_seconds` (Histogram)
 *
 * The CLI writes `register.metrics()` to a file on request, for a textfile
 * collector to pick up.
 */

import { Counter, Histogram, register } from 'prom-client';
import type { FailureKind } from './errors';

export const fetchAttemptsTotal = new Counter({
  name: 'certscout_fetch_attempts_total',
  help: 'Total number of HTTP attempts made against crt.sh',
});

export const fetchFailuresTotal = new Counter({
  name: 'certscout_fetch_failures_total',
  help: 'Failed crt.sh attempts by failure class',
  labelNames: ['kind'],
});

export const rateLimitedTotal = new Counter({
  name: 'certscout_rate_limited_total',
  help: 'Total number of 429 responses from crt.sh',
});

export const subdomainsFoundTotal = new Counter({
  name: 'certscout_subdomains_found_total',
  help: 'Unique subdomains reported across all scanned domains',
});

export const scanDuration = new Histogram({
  name: 'certscout_scan_duration_seconds',
  help: 'Histogram of single-domain scan duration in seconds',
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
});

export function incFetchAttempts(count = 1): void {
  fetchAttemptsTotal.inc(count);
}

export function incFetchFailures(kind: FailureKind): void {
  fetchFailuresTotal.inc({ kind });
}

export function incRateLimited(count = 1): void {
  rateLimitedTotal.inc(count);
}

export function incSubdomainsFound(count: number): void {
  if (!Number.isFinite(count) || count <= 0) return;
  subdomainsFoundTotal.inc(count);
}

/**
 * Observe scan duration in seconds.
 */
export function observeScanDuration(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  scanDuration.observe(seconds);
}

export { register };
const metrics = { register, incFetchAttempts, incFetchFailures, incRateLimited, incSubdomainsFound, observeScanDuration };
export default metrics;
