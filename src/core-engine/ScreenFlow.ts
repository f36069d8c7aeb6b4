/**
 * Screen flow for the Klondike engine.
 *
 * The top-level phase machine a front end walks through: the start
 * screen, active play, the in-game menu, the victory screen and quit.
 * Dealing a new game or restarting one is an action that lands in
 * `game`, not a phase of its own.
 *
 * Operates on the flow object directly (mutation-based), like the rest
 * of the engine's state helpers.
 */

/**
 * - `start`     -- Start screen; choose a game mode.
 * - `game`      -- Active play; turns are processed.
 * - `game-menu` -- Play suspended behind the menu.
 * - `victory`   -- All foundations complete; no further turns.
 * - `quit`      -- Terminal.
 */
export type ScreenPhase = 'start' | 'game' | 'game-menu' | 'victory' | 'quit';

export interface ScreenFlow {
  phase: ScreenPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<ScreenPhase, readonly ScreenPhase[]> = {
  start: ['game', 'quit'],
  game: ['game-menu', 'victory', 'quit'],
  'game-menu': ['game', 'quit'],
  victory: ['game', 'quit'],
  quit: [],
};

/**
 * Create a screen flow, on the start screen by default.
 */
export function createScreenFlow(initialPhase: ScreenPhase = 'start'): ScreenFlow {
  return { phase: initialPhase };
}

/**
 * Whether `flow` may move to `next`. Re-entering `game` from `game`
 * (a new deal or a restart while playing) is not a transition.
 */
export function canTransition(flow: ScreenFlow, next: ScreenPhase): boolean {
  return VALID_TRANSITIONS[flow.phase].includes(next);
}

/**
 * Move the flow to a new phase.
 *
 * @throws If the transition is not in the table.
 */
export function transitionTo(flow: ScreenFlow, next: ScreenPhase): void {
  const current = flow.phase;
  if (!canTransition(flow, next)) {
    const allowed = VALID_TRANSITIONS[current];
    throw new Error(
      `Invalid screen transition: "${current}" -> "${next}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }
  flow.phase = next;
}

/** Whether turns are being processed. */
export function isPlaying(flow: ScreenFlow): boolean {
  return flow.phase === 'game';
}

export function isFinished(flow: ScreenFlow): boolean {
  return flow.phase === 'quit';
}
