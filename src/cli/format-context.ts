/**
 * CLI output format context.
 *
 * Holds the resolved output format for the current invocation. Set once in
 * the commander preAction hook; read by cliOutput() and the renderers.
 */

export type OutputFormat = 'json' | 'human';

export interface FlagResolution {
  format: OutputFormat;
  source: 'flag' | 'env' | 'default';
  quiet: boolean;
}

/**
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FlagResolution {
  return currentResolution;
}

export function isJsonFormat(): boolean {
  return currentResolution.format === 'json';
}

export function isHumanFormat(): boolean {
  return currentResolution.format === 'human';
}

/** Suppress non-essential output. */
export function isQuiet(): boolean {
  return currentResolution.quiet;
}
