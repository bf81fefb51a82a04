#!/usr/bin/env node

import { run } from './program';
import { reportError } from './utils/error-handler';

const controller = new AbortController();
let interrupted = false;

// First Ctrl-C cancels the in-flight request, a second one exits immediately
process.on('SIGINT', () => {
  if (interrupted) {
    process.exit(130);
  }
  interrupted = true;
  controller.abort();
});

run(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  color: Boolean(process.stdout.isTTY),
  signal: controller.signal
})
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    reportError(process.stderr, error);
    process.exitCode = 1;
  });
