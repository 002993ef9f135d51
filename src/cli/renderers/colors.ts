/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 */

import type { OutcomeKind } from '../../types/request.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Outcome symbols and colors
// ---------------------------------------------------------------------------

const OUTCOME_SYMBOLS_UNICODE: Record<OutcomeKind, string> = {
  'complete': '✔',
  'partial-success': '◑',
  'failed': '✘',
  'authentication': '⚿',
  'cancelled': '⊘',
  'dry-run': '○',
  'invalid': '✘',
};

const OUTCOME_SYMBOLS_ASCII: Record<OutcomeKind, string> = {
  'complete': '+',
  'partial-success': '~',
  'failed': 'x',
  'authentication': '!',
  'cancelled': '-',
  'dry-run': 'o',
  'invalid': 'x',
};

export function outcomeSymbol(kind: OutcomeKind): string {
  return (unicodeEnabled ? OUTCOME_SYMBOLS_UNICODE : OUTCOME_SYMBOLS_ASCII)[kind];
}

export function outcomeColor(kind: OutcomeKind): string {
  switch (kind) {
    case 'complete': return GREEN;
    case 'partial-success': return YELLOW;
    case 'dry-run': return CYAN;
    case 'cancelled': return DIM;
    default: return RED;
  }
}

/** Horizontal rule. */
export function hRule(width: number = 65): string {
  return (unicodeEnabled ? '─' : '-').repeat(width);
}

/** Epoch milliseconds as an ISO timestamp without milliseconds. */
export function shortTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace(/\.\d{3}Z$/, 'Z');
}
