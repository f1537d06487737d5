import chalk from 'chalk';

export type Severity = 'info' | 'success' | 'warning' | 'error' | 'debug';

/**
 * User-facing progress lines. Components receive one of these instead of
 * printing directly.
 */
export interface StatusLogger {
  log(severity: Severity, message: string): void;
}

export interface LineSink {
  write(chunk: string): unknown;
}

const PREFIX: Record<Severity, string> = {
  info: chalk.blue('[*]'),
  success: chalk.green('[+]'),
  warning: chalk.yellow('[!]'),
  error: chalk.red('[-]'),
  debug: chalk.cyan('[D]'),
};

export function createConsoleStatus(out: LineSink = process.stdout, opts?: { debug?: boolean }): StatusLogger {
  const showDebug = opts?.debug ?? false;
  return {
    log(severity, message) {
      if (severity === 'debug' && !showDebug) return;
      out.write(`${PREFIX[severity]} ${message}\n`);
    },
  };
}

export const silentStatus: StatusLogger = {
  log() {
    // discard
  },
};
