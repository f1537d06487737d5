#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { runCli } from '../lib/cli';
import { getErrorMessage } from '../lib/errors';

process.on('SIGINT', () => {
  process.stdout.write(chalk.yellow('\n[!] Interrupted by user\n'));
  process.exit(0);
});

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`${chalk.red('[-]')} Unexpected error: ${getErrorMessage(err)}\n`);
    process.exit(1);
  },
);
