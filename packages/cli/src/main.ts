#!/usr/bin/env node
/**
 * @settlekit/cli — Entry point.
 */

import { createReadStream } from "node:fs";
import { chalkStderr } from "chalk";
import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { runCli } from "./cli.js";

// stdout carries the ledger CSV, so logs go to stderr
function createLogger(config: AppConfig): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination({ dest: 2, sync: true }));
}

runCli(process.argv, {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  colors: chalkStderr,
  openInput: (path) => createReadStream(path),
  createLogger,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  });
