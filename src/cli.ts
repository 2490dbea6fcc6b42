#!/usr/bin/env node
import readline from 'readline';
import { parseCliArgs, runCli } from './cli/run-cli';
import { logger } from './config/logger';

const rl = readline.createInterface({ input: process.stdin, terminal: false });

runCli(parseCliArgs(process.argv.slice(2)), {
  lines: rl[Symbol.asyncIterator](),
  write: (text) => process.stdout.write(text),
  writeError: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Allocation failed', { error });
    process.exitCode = 1;
  })
  .finally(() => rl.close());
