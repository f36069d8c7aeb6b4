/**
 * Query-string configuration for the browser entry.
 *
 * Recognised parameters:
 *   - `seed`  -- integer shuffle seed. Default: the current time.
 *   - `mode`  -- `draw-one` (also `1`) or `draw-three` (also `3`).
 *   - `debug` -- `1` or `true` starts in debug mode.
 *
 * Unrecognised values fall back to the defaults and are listed in
 * `warnings` so the caller can log them.
 */

import type { GameMode } from './KlondikeState';

export interface GameConfig {
  readonly seed: number;
  readonly mode: GameMode;
  readonly debugMode: boolean;
  /** One message per parameter whose value was ignored. */
  readonly warnings: readonly string[];
}

const MODE_ALIASES: Readonly<Record<string, GameMode>> = {
  'draw-one': 'draw-one',
  '1': 'draw-one',
  'draw-three': 'draw-three',
  '3': 'draw-three',
};

const INTEGER = /^-?\d+$/;

/**
 * Parse `location.search` (with or without the leading `?`).
 *
 * @param now - Fallback seed source. Default: `Date.now`.
 */
export function parseGameConfig(
  search: string,
  now: () => number = Date.now,
): GameConfig {
  const params = new URLSearchParams(search);
  const warnings: string[] = [];

  let seed = now();
  const seedParam = params.get('seed');
  if (seedParam !== null) {
    if (INTEGER.test(seedParam)) {
      seed = parseInt(seedParam, 10);
    } else {
      warnings.push(`Ignoring seed "${seedParam}": not an integer`);
    }
  }

  let mode: GameMode = 'draw-one';
  const modeParam = params.get('mode');
  if (modeParam !== null) {
    const known = MODE_ALIASES[modeParam.toLowerCase()];
    if (known) {
      mode = known;
    } else {
      warnings.push(`Ignoring mode "${modeParam}": expected draw-one or draw-three`);
    }
  }

  const debugParam = params.get('debug');
  const debugMode = debugParam === '1' || debugParam?.toLowerCase() === 'true';

  return { seed, mode, debugMode, warnings };
}
