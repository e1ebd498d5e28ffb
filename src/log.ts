import path from 'node:path';
import pino from 'pino';
import { isTestEnv } from './util/env.js';
import { VERBOSE } from './util/verbose.js';

let root: pino.Logger | null = null;

function rootLogger(): pino.Logger {
  if (root) return root;
  if (isTestEnv()) {
    root = pino({ level: 'silent' });
    return root;
  }
  const dest = pino.destination({
    dest: path.resolve(process.env.LOG_DIR || 'logs', 'app.ndjson'),
    mkdir: true,
    sync: false,
  });
  root = pino({
    base: undefined,
    level: process.env.LOG_LEVEL || (VERBOSE ? 'debug' : 'info'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  }, dest);
  return root;
}

/** JSON-lines logger scoped to one part of the table. */
export function createLogger(scope?: string): pino.Logger {
  return scope ? rootLogger().child({ scope }) : rootLogger();
}

export function flushLogs() {
  root?.flush();
}
