/**
 * Keyboard bindings per screen phase.
 *
 * Maps a `KeyboardEvent.key` value to a command for the scene. Pure, so
 * the mapping can be tested without Phaser.
 */

import type { ScreenPhase } from '../../src/core-engine/ScreenFlow';
import type { GameMode } from './KlondikeState';
import type { SessionAction } from './KlondikeSession';

export type KeyCommand =
  | { readonly kind: 'action'; readonly action: SessionAction }
  | { readonly kind: 'new-game'; readonly mode?: GameMode }
  | { readonly kind: 'restart' }
  | { readonly kind: 'toggle-help' };

const GAME_KEYS: Readonly<Record<string, SessionAction>> = {
  ArrowLeft: 'move-left',
  ArrowRight: 'move-right',
  ArrowUp: 'extend-up',
  ArrowDown: 'extend-down',
  Home: 'jump-to-deck',
  End: 'jump-to-last-pile',
  ' ': 'select',
  Enter: 'enter',
  x: 'cancel',
  d: 'toggle-debug',
  c: 'debug-force-move',
  z: 'debug-check',
  Escape: 'open-menu',
};

function action(a: SessionAction): KeyCommand {
  return { kind: 'action', action: a };
}

/**
 * The command bound to `key` in `phase`, or `undefined` when the key
 * does nothing there.
 */
export function commandForKey(phase: ScreenPhase, key: string): KeyCommand | undefined {
  switch (phase) {
    case 'start':
      if (key === '1') return { kind: 'new-game', mode: 'draw-one' };
      if (key === '3') return { kind: 'new-game', mode: 'draw-three' };
      if (key === 'Escape') return action('quit');
      return undefined;

    case 'game': {
      if (key === 'h') return { kind: 'toggle-help' };
      const bound = GAME_KEYS[key];
      return bound ? action(bound) : undefined;
    }

    case 'game-menu':
      if (key === 'y') return { kind: 'new-game' };
      if (key === 'r') return { kind: 'restart' };
      if (key === 'q') return action('quit');
      if (key === 'n' || key === 'Escape') return action('close-menu');
      return undefined;

    case 'victory':
      if (key === 'y') return { kind: 'new-game' };
      if (key === 'n' || key === 'Escape') return action('quit');
      return undefined;

    case 'quit':
      return undefined;
  }
}

/** Lines for the help overlay. */
export const HELP_LINES: readonly string[] = [
  'Left / Right: move the cursor',
  'Up / Down: select more or fewer cards, or change pile',
  'Home: jump to the deck    End: jump to the piles',
  'Space: pick up cards, then Space again to place them',
  'Enter: draw on the deck, or send a column card to a pile',
  'x: put the picked-up cards back',
  'd: debug mode    c: force a move    z: check a move (debug)',
  'Esc: menu    h: close this help',
];
