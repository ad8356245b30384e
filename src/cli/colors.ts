/**
 * ANSI color utilities for CLI output
 */

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  bgRed: '\x1b[41m',
};

/**
 * Semantic color helpers. Plain text when stderr is not a TTY or NO_COLOR is set.
 */
const enabled = Boolean(process.stderr.isTTY) && !process.env.NO_COLOR;

function paint(s: string, ...codes: string[]): string {
  return enabled ? `${codes.join('')}${s}${colors.reset}` : s;
}

export const c = {
  title: (s: string) => paint(s, colors.bold, colors.cyan),
  success: (s: string) => paint(s, colors.green),
  warning: (s: string) => paint(s, colors.yellow),
  error: (s: string) => (enabled ? `${colors.bgRed}${colors.white} ${s} ${colors.reset}` : `Error: ${s}`),
  info: (s: string) => paint(s, colors.blue),
  dim: (s: string) => paint(s, colors.dim),
  bold: (s: string) => paint(s, colors.bold),
};
