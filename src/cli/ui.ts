import fs from 'node:fs';
import path from 'node:path';
import boxen from 'boxen';
import chalk from 'chalk';
import gradient from 'gradient-string';
import figlet from 'figlet';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { colorsDisabled, getPalette } from './theme.js';
import { hasFlag, isTestEnv } from '../util/env.js';

function isInteractive() {
  return !!process.stdout.isTTY && !process.env.CI && !isQuiet();
}

function isQuiet() {
  return process.env.QUIET === '1' || hasFlag('--quiet');
}

const palette = getPalette();
const c = new chalk.Instance({ level: colorsDisabled() || !isInteractive() ? 0 : 3 });

let bannerPrinted = false;

function banner() {
  if (hasFlag('--banner=off') || process.env.CLI_BANNER === 'off' || process.env.CLI_BANNER === '0') return;
  if (bannerPrinted || !isInteractive()) return;
  bannerPrinted = true;
  const text = figlet.textSync('Blackjack', { font: 'Standard' });
  const title = gradient(palette.gradient).multiline(text);
  const body = `${title}\n\n${c.dim('v' + readPkgVersion())}  ${c.dim(process.version)}\n` +
    `${c.dim('The gambling game also known as 21, for one or many players against the dealer.')}`;
  console.log(boxen(body, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

function readPkgVersion(): string {
  const file = path.resolve('package.json');
  if (!fs.existsSync(file)) return '0.0.0';
  const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  return '0.0.0';
}

function say(msg: string, style: 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title' = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  let out = msg;
  switch (style) {
    case 'success': out = `${logSymbols.success} ${palette.success(msg)}`; break;
    case 'warn': out = `${logSymbols.warning} ${palette.warn(msg)}`; break;
    case 'error': out = `${logSymbols.error} ${palette.error(msg)}`; break;
    case 'dim': out = palette.dim(msg); break;
    case 'title': out = c.bold(palette.info(msg)); break;
    default: out = `${logSymbols.info} ${palette.info(msg)}`; break;
  }
  console.log(out);
}

/** Plain line to the table; nothing under Jest. */
function line(msg: string) {
  if (isTestEnv()) return;
  console.log(msg);
}

function formatTable(rows: Array<Record<string, string | number>>, headerStyle: (s: string) => string = c.bold): string[] {
  if (rows.length === 0) return ['(none)'];
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  const out = [headers.map((h, i) => headerStyle(h.padEnd(widths[i]))).join('  ')];
  for (const r of rows) {
    out.push(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
  }
  return out;
}

function table(rows: Array<Record<string, string | number>>) {
  for (const l of formatTable(rows)) line(l);
}

function duration(ms: number) {
  return prettyMs(ms, { secondsDecimalDigits: 0 });
}

export const ui = { banner, say, line, table, duration };
export default ui;
