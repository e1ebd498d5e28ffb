import chalk from 'chalk';

type Paint = (s: string) => string;

export type Palette = {
  gradient: [string, string];
  info: Paint;
  success: Paint;
  warn: Paint;
  error: Paint;
  dim: Paint;
  dealer: Paint;
  /** One color per seat, assigned in seating order. */
  seats: Paint[];
};

export function colorsDisabled() {
  return !!process.env.NO_COLOR || process.argv.includes('--no-color');
}

export function getPalette(noColor = colorsDisabled()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      gradient: ['#777777', '#bbbbbb'],
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      dealer: c.bold.white,
      seats: [c.white],
    };
  }
  // felt (default): casino green and gold
  return {
    gradient: ['#0b6623', '#d4af37'],
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    dealer: c.bold.white,
    seats: [c.green, c.cyan, c.magenta, c.yellow, c.blue, c.red, c.greenBright],
  };
}
