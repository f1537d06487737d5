import { z } from 'zod';
import logger from './logger';
import { silentStatus, type StatusLogger } from './report/status';
import type { CertificateRecord } from './types';

// Only the name field is load-bearing; everything else passes through untouched.
const certificateRecordSchema = z.object({ name_value: z.string().optional() }).passthrough();

/**
 * Collect the hostnames of `records` that contain `domain`.
 *
 * Matching is a plain substring test on the lowercased name, not a label
 * suffix match, so `notexample.com.evil.org` is kept for `example.com`.
 * A single leading `*.` is stripped after matching. Records that fail
 * validation are reported and skipped.
 */
export function extractSubdomains(
  records: readonly unknown[],
  domain: string,
  status: StatusLogger = silentStatus,
): Set<string> {
  const target = domain.toLowerCase();
  const subdomains = new Set<string>();

  records.forEach((raw, index) => {
    const parsed = certificateRecordSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug({ index, issues: parsed.error.issues }, 'skipping malformed certificate record');
      status.log('warning', `Error parsing certificate record #${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    const record: CertificateRecord = parsed.data;
    for (const name of (record.name_value ?? '').split('\n')) {
      let cleaned = name.trim().toLowerCase();
      if (!cleaned || !cleaned.includes(target)) continue;
      if (cleaned.startsWith('*.')) cleaned = cleaned.slice(2);
      subdomains.add(cleaned);
    }
  });

  return subdomains;
}

/** Case-insensitive substring filter. No keyword keeps everything. */
export function filterSubdomains(subdomains: Iterable<string>, keyword?: string | null): Set<string> {
  if (!keyword) return new Set(subdomains);
  const k = keyword.toLowerCase();
  const out = new Set<string>();
  for (const sub of subdomains) {
    if (sub.toLowerCase().includes(k)) out.add(sub);
  }
  return out;
}

/** Sort ascending and keep the first `limit` entries when a positive limit is given. */
export function finalizeSubdomains(subdomains: Iterable<string>, limit?: number | null): string[] {
  const sorted = Array.from(subdomains).sort();
  return limit && limit > 0 ? sorted.slice(0, limit) : sorted;
}
