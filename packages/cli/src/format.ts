/**
 * Terminal styling for command output.
 *
 * `--no-color` turns every style off for the rest of the process; the
 * status lines then fall back to `[OK]` and `Error:` prefixes.
 *
 * @packageDocumentation
 */

const SGR = {
  reset: 0,
  bold: 1,
  underline: 4,
  red: 31,
  green: 32,
  gray: 90,
} as const;

type Style = keyof typeof SGR;

let styling = true;

export function setColorsEnabled(enabled: boolean): void {
  styling = enabled;
}

/** Wrap `text` in the given styles, or return it untouched when styling is off. */
function paint(text: string, ...styles: Style[]): string {
  if (!styling) return text;
  const open = styles.map((s) => `\x1b[${SGR[s]}m`).join('');
  return `${open}${text}\x1b[${SGR.reset}m`;
}

export function bold(text: string): string {
  return paint(text, 'bold');
}

export function dim(text: string): string {
  return paint(text, 'gray');
}

export function header(text: string): string {
  return paint(text, 'bold', 'underline');
}

/** Status line for a command that went through. */
export function success(message: string): string {
  return styling ? `${paint('✔', 'green')} ${message}` : `[OK] ${message}`;
}

/** Status line for a failed command. */
export function error(message: string): string {
  const line = `Error: ${message}`;
  return styling ? `${paint('✘', 'red')} ${line}` : line;
}

/** One `key  value` line per pair, values lined up after the longest key. */
export function keyValue(pairs: ReadonlyArray<readonly [string, string]>): string {
  const width = pairs.reduce((max, [key]) => Math.max(max, key.length), 0);
  return pairs.map(([key, value]) => `${bold(key.padEnd(width))}  ${value}`).join('\n');
}
