#!/usr/bin/env node
/**
 * turnweaver-echo: diagnostic chat completions stub.
 *
 * Usage:
 *   turnweaver-echo                              # 127.0.0.1:10030
 *   turnweaver-echo --port 18000 --logs-dir ./requests
 *   turnweaver-echo --config ./turnweaver.yaml
 */

import { runEchoCommand } from './cli/echo.js';

runEchoCommand({ argv: process.argv.slice(2), stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
