/**
 * CLI binary entry point.
 */

// Exit quietly when stdout or stderr is closed early (piped into `head`).
process.stdout.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EPIPE') {
    process.exit(0);
  }
  throw err;
});
process.stderr.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EPIPE') {
    process.exit(0);
  }
  throw err;
});

import { runCli } from './cli.js';

void runCli();
