/**
 * ANSI Escape Code Constants and Utilities
 *
 * Provides the VT100/xterm escape sequences the editor emits, and the
 * check that the connected terminal understands them.
 */

import { StartupError } from '../errors.ts';

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  clearLine: `${CSI}2K`,
  // Alternate screen buffer (for fullscreen apps)
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
};

// Text styles
export const STYLE = {
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  italic: `${CSI}3m`,
  inverse: `${CSI}7m`,
};

// Basic 16 colors (foreground)
export const FG = {
  yellow: `${CSI}33m`,
  blue: `${CSI}34m`,
  magenta: `${CSI}35m`,
  cyan: `${CSI}36m`,
  brightBlack: `${CSI}90m`,
};

/**
 * Combine multiple style codes
 */
export function style(...codes: string[]): string {
  return codes.join('');
}

/**
 * Style text and reset after
 */
export function styled(text: string, ...codes: string[]): string {
  return `${codes.join('')}${text}${STYLE.reset}`;
}

/**
 * Pad or cut an ASCII string to an exact width
 */
export function padToWidth(str: string, width: number): string {
  if (width <= 0) return '';
  if (str.length >= width) {
    return str.slice(0, width);
  }
  return str + ' '.repeat(width - str.length);
}

// ============================================
// Capability Check
// ============================================

export const DEFAULT_SUPPORTED_TERMINALS: readonly string[] = [
  'xterm*',
  'screen*',
  'tmux*',
  'rxvt*',
  'vt100',
  'vt102',
  'vt220',
  'linux',
  'alacritty',
  'foot*',
  'kitty*',
  'wezterm',
];

function matchesPattern(term: string, pattern: string): boolean {
  if (pattern.endsWith('*')) {
    return term.startsWith(pattern.slice(0, -1));
  }
  return term === pattern;
}

/**
 * Whether TERM names a terminal that speaks the VT100/xterm dialect.
 */
export function isAnsiTerminal(
  term: string | undefined,
  supported: readonly string[] = DEFAULT_SUPPORTED_TERMINALS
): boolean {
  if (!term) return false;
  return supported.some((pattern) => matchesPattern(term, pattern));
}

export function assertAnsiTerminal(
  term: string | undefined,
  supported: readonly string[] = DEFAULT_SUPPORTED_TERMINALS
): void {
  if (!term) {
    throw new StartupError("The environment variable TERM isn't set - it should name an ANSI terminal such as `xterm'.");
  }
  if (!isAnsiTerminal(term, supported)) {
    throw new StartupError(`The environment variable TERM is set to \`${term}' - expected an ANSI terminal such as \`xterm'.`);
  }
}
