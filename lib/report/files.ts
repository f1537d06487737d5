import { writeFile } from 'fs/promises';
import { join } from 'path';
import logger from '../logger';
import { PersistenceError } from '../errors';
import type { OutputFormat, ScanResult } from '../types';
import { silentStatus, type StatusLogger } from './status';

export interface ResultWriter {
  /** Returns the written path, or null when the write failed. */
  save(result: ScanResult, format: OutputFormat): Promise<string | null>;
}

export interface FileResultWriterOptions {
  dir?: string;
  status?: StatusLogger;
  now?: () => Date;
}

/**
 * `<domain>_subdomains_<YYYYMMDD_HHMMSS>.<ext>` in local time.
 */
export function resultFileName(domain: string, format: OutputFormat, at: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${at.getFullYear()}${p(at.getMonth() + 1)}${p(at.getDate())}` +
    `_${p(at.getHours())}${p(at.getMinutes())}${p(at.getSeconds())}`;
  return `${domain}_subdomains_${stamp}.${format}`;
}

/** ISO 8601 in local time without an offset, e.g. `2024-01-05T09:03:07.120`. */
export function localTimestamp(at: Date): string {
  const p = (n: number, w = 2) => String(n).padStart(w, '0');
  return (
    `${at.getFullYear()}-${p(at.getMonth() + 1)}-${p(at.getDate())}` +
    `T${p(at.getHours())}:${p(at.getMinutes())}:${p(at.getSeconds())}.${p(at.getMilliseconds(), 3)}`
  );
}

export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export class FileResultWriter implements ResultWriter {
  private readonly dir: string;
  private readonly status: StatusLogger;
  private readonly now: () => Date;

  constructor(opts: FileResultWriterOptions = {}) {
    this.dir = opts.dir ?? process.cwd();
    this.status = opts.status ?? silentStatus;
    this.now = opts.now ?? (() => new Date());
  }

  render(result: ScanResult, format: OutputFormat): string {
    const sorted = [...result.subdomains].sort();
    switch (format) {
      case 'txt':
        return sorted.join('\n');
      case 'json':
        return JSON.stringify(
          {
            domain: result.domain,
            timestamp: localTimestamp(this.now()),
            subdomain_count: sorted.length,
            subdomains: sorted,
          },
          null,
          2,
        );
      case 'csv': {
        const rows = ['Subdomain,Domain,Timestamp'];
        for (const sub of sorted) {
          // each row carries the time it was written
          rows.push([sub, result.domain, localTimestamp(this.now())].map(escapeCsvField).join(','));
        }
        return rows.join('\r\n') + '\r\n';
      }
    }
  }

  async save(result: ScanResult, format: OutputFormat): Promise<string | null> {
    const path = join(this.dir, resultFileName(result.domain, format, this.now()));
    try {
      await writeFile(path, this.render(result, format), 'utf8');
    } catch (err) {
      const failure = new PersistenceError(path, err);
      logger.debug({ err, path }, 'result write failed');
      this.status.log('error', failure.message);
      return null;
    }
    this.status.log('success', `Results saved to ${path}`);
    return path;
  }
}
