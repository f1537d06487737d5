import chalk from 'chalk';
import Table from 'cli-table3';
import { describeProxy } from '../proxy/pool';
import type { BatchSummary, ProxyEndpoint, ProxyTestReport, ScanResult } from '../types';
import type { LineSink } from './status';

/**
 * Presentation side of a scan. The scanner only hands over finished values.
 */
export interface ScanReporter {
  banner(): void;
  scanResult(result: ScanResult): void;
  batchProgress(index: number, total: number, proxy: ProxyEndpoint | null): void;
  batchSummary(summary: BatchSummary): void;
  proxyTestProgress(index: number, total: number): void;
  proxyTestReport(report: ProxyTestReport): void;
}

const RULE = '='.repeat(60);

export class ConsoleReporter implements ScanReporter {
  constructor(private readonly out: LineSink = process.stdout) {}

  private line(text = ''): void {
    this.out.write(`${text}\n`);
  }

  private rule(): void {
    this.line(chalk.cyan(RULE));
  }

  banner(): void {
    this.line(chalk.cyan(`
    ╔═══════════════════════════════════════╗
    ║   certscout                           ║
    ║   Certificate Transparency Subdomains ║
    ╚═══════════════════════════════════════╝`));
    this.line();
  }

  scanResult(result: ScanResult): void {
    this.line();
    this.rule();
    this.line(chalk.bold(`Results for ${chalk.cyan(result.domain)}`));
    if (result.proxy) {
      this.line(chalk.bold(`Proxy: ${chalk.cyan(describeProxy(result.proxy))}`));
    }
    this.rule();
    this.line();
    this.line(chalk.green(`[+] Total Subdomains: ${result.subdomains.length}`));
    this.line(chalk.green(`[+] Response Time: ${result.responseTimeS.toFixed(2)}s`));
    this.line();

    if (result.subdomains.length) {
      this.line(chalk.yellow('Subdomains found:'));
      this.line();
      result.subdomains.forEach((sub, i) => {
        this.line(chalk.cyan(`  ${String(i + 1).padStart(3)}. ${sub}`));
      });
    } else {
      this.line(chalk.yellow('No subdomains found.'));
    }
    this.line();
    this.rule();
    this.line();
  }

  batchProgress(index: number, total: number, proxy: ProxyEndpoint | null): void {
    const via = proxy ? ` ${chalk.cyan(`(via ${describeProxy(proxy)})`)}` : '';
    this.line(`${chalk.bold.blue(`[${index}/${total}]`)}${via}`);
  }

  batchSummary(summary: BatchSummary): void {
    this.line();
    this.rule();
    this.line(chalk.bold('Batch Scan Summary'));
    this.rule();
    this.line();
    this.line(chalk.green(`Domains scanned: ${summary.domainsScanned}`));
    this.line(chalk.green(`Proxies used: ${summary.proxiesAvailable}`));
    this.line(chalk.green(`Total subdomains: ${summary.totalSubdomains}`));
    this.line();

    const table = new Table({ head: ['', 'Domain', 'Subdomains', 'Proxy'], style: { head: [], border: [] } });
    for (const [domain, entry] of summary.entries) {
      const mark = entry.count > 0 ? chalk.green('✓') : chalk.yellow('○');
      table.push([mark, domain, String(entry.count), describeProxy(entry.proxy)]);
    }
    this.line(table.toString());
    this.line();
    this.rule();
    this.line();
  }

  proxyTestProgress(index: number, total: number): void {
    this.line(chalk.bold.blue(`[${index}/${total}]`));
  }

  proxyTestReport(report: ProxyTestReport): void {
    this.line();
    this.rule();
    this.line(chalk.bold('Proxy Test Results'));
    this.rule();
    this.line();
    this.line(chalk.green(`Working Proxies: ${report.working.length}`));
    for (const proxy of report.working) {
      this.line(`  ${chalk.green('✓')} ${describeProxy(proxy)}`);
    }
    if (report.failed.length) {
      this.line();
      this.line(chalk.red(`Failed Proxies: ${report.failed.length}`));
      for (const check of report.failed) {
        const why = check.failure ? ` (${check.failure})` : '';
        this.line(`  ${chalk.red('✗')} ${describeProxy(check.proxy)}${why}`);
      }
    }
    this.line();
    this.rule();
    this.line();
  }
}
