/**
 * CLI Output Utilities
 *
 * Terminal formatting for the sentinel commands and the console reporter.
 * Library code never prints; the commands route everything through here.
 */

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

export type ColorName = Exclude<keyof typeof ANSI, 'reset'>;

/** Width of the rules drawn under headers and report banners. */
export const RULE_WIDTH = 60;

/**
 * Wrap text in an ANSI style. Off when NO_COLOR is set, unless the caller
 * decides explicitly.
 */
export function color(name: ColorName, text: string, enabled = !process.env['NO_COLOR']): string {
  if (!enabled) return text;
  return `${ANSI[name]}${text}${ANSI.reset}`;
}

/**
 * Horizontal rule of `width` box-drawing characters.
 */
export function rule(width = RULE_WIDTH): string {
  return '─'.repeat(width);
}

export function success(message: string): void {
  console.log(color('green', `✓ ${message}`));
}

/**
 * Print to stderr. Used for the one-line fatal message before exiting.
 */
export function error(message: string): void {
  console.error(color('red', `✗ ${message}`));
}

/**
 * Print a degraded-but-continuing condition (endpoint not exposed, nothing sampled).
 */
export function warning(message: string): void {
  console.log(color('yellow', `⚠ ${message}`));
}

export function info(message: string): void {
  console.log(color('cyan', `ℹ ${message}`));
}

export function dim(message: string): void {
  console.log(color('dim', message));
}

/**
 * Print a section title followed by a rule sized to it.
 */
export function header(text: string): void {
  console.log('');
  console.log(color('bold', text));
  console.log(color('dim', rule(Math.min(text.length + 4, RULE_WIDTH))));
}

/**
 * Print rows as left-aligned columns, taking column names from the first row.
 */
export function table(rows: Array<Record<string, string | number | undefined>>): void {
  if (rows.length === 0) return;

  const columns = Object.keys(rows[0]);
  const cell = (row: Record<string, string | number | undefined>, column: string): string =>
    String(row[column] ?? '');
  const widths = columns.map((column) =>
    Math.max(column.length, ...rows.map((row) => cell(row, column).length))
  );

  console.log(color('bold', columns.map((column, i) => column.padEnd(widths[i])).join('  ')));
  console.log(color('dim', widths.map((width) => rule(width)).join('──')));

  for (const row of rows) {
    console.log(columns.map((column, i) => cell(row, column).padEnd(widths[i])).join('  '));
  }
}

export function json(data: unknown, pretty = true): void {
  console.log(pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data));
}

/**
 * Shorten long URIs and frame names for table cells.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Trace durations: `840ms`, `1.5s`, `2m 5s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}

/**
 * Format a 0..1 ratio (CPU usage) as a percentage.
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function formatSeconds(seconds: number, digits = 3): string {
  return `${seconds.toFixed(digits)}s`;
}

/**
 * Print `message` as an error and exit.
 */
export function exitWithError(message: string, code = 1): never {
  error(message);
  process.exit(code);
}
