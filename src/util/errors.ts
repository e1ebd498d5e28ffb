import chalk from 'chalk';

/** An error whose message is safe to show to the person at the table. */
export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

export function shortStack(err: unknown, lines = 3): string {
  const st = normalizeError(err).stack;
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}

export function buildErrorId(): string {
  // tiny, non-crypto id for correlating logs with terminal output
  return Math.random().toString(36).slice(2, 10);
}

export function formatUserError(context: string, err: unknown, verbose: boolean, errorId: string): string {
  const info = normalizeError(err);
  const base =
    `${chalk.bold.red(context)} failed\n` +
    `  Type:     ${info.name}\n` +
    `  Message:  ${info.message}\n` +
    `  Error ID: ${errorId}`;
  const stack = shortStack(err, verbose ? 6 : 0);
  if (!verbose || !stack) return base;
  return `${base}\n${chalk.dim(stack.replaceAll(process.cwd(), '.'))}`;
}
