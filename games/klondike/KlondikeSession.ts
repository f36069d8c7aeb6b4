/**
 * Klondike session -- the single-player turn loop.
 *
 * Ties together the game state, the cursor and picked-up selection, the
 * rules, the turn pipeline and the screen flow. A front end feeds it one
 * {@link SessionAction} at a time; each is processed to completion
 * (rules check, transfer, pipeline) before the call returns.
 *
 * The session owns exactly one {@link KlondikeState} at a time and
 * replaces it wholesale on a new game or restart.
 */

import { createSeededRng } from '../../src/card-system/Deck';
import type { Rng } from '../../src/card-system/Deck';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { ScreenFlow, ScreenPhase } from '../../src/core-engine/ScreenFlow';
import {
  canTransition,
  createScreenFlow,
  isFinished,
  isPlaying,
  transitionTo,
} from '../../src/core-engine/ScreenFlow';
import type { KlondikeEventMap, KlondikeEvents } from './KlondikeEvents';
import type { GameMode, KlondikeState, TurnOutcome } from './KlondikeState';
import {
  autoPlaceToFoundation,
  drawFromDeck,
  locateCard,
  moveCards,
  newGame,
  restartGame,
  validMove,
} from './KlondikeRules';
import type { CursorAction, Selection, SelectionState } from './Selection';
import {
  CURSOR_ACTIONS,
  DECK,
  applyCursorAction,
  columnSelection,
  selectedCardCount,
} from './Selection';
import { runTurnPipeline } from './TurnPipeline';

// ── Actions ─────────────────────────────────────────────────

/**
 * One input event.
 *
 * - cursor actions     -- move or extend the cursor.
 * - `select`           -- pick up the cursor's cards, or drop the picked
 *                         cards onto the cursor.
 * - `enter`            -- draw on the deck; send a column's top card to
 *                         a foundation.
 * - `cancel`           -- put the picked-up cards back.
 * - `toggle-debug`     -- switch debug mode.
 * - `debug-force-move` -- debug only: pick up, or move without the rules.
 * - `debug-check`      -- debug only: report whether the pending move is legal.
 * - `open-menu` / `close-menu` / `quit` -- screen flow.
 */
export type SessionAction =
  | CursorAction
  | 'select'
  | 'enter'
  | 'cancel'
  | 'toggle-debug'
  | 'debug-force-move'
  | 'debug-check'
  | 'open-menu'
  | 'close-menu'
  | 'quit';

function isCursorAction(action: SessionAction): action is CursorAction {
  return (CURSOR_ACTIONS as readonly string[]).includes(action);
}

// ── Options ─────────────────────────────────────────────────

export interface KlondikeSessionOptions {
  /** Mode used by `startNewGame()` when none is given. Default: 'draw-one'. */
  mode?: GameMode;
  /** Draw automatically when the waste runs out. Default: true. */
  autoDraw?: boolean;
  /** Start in debug mode. Default: false. */
  debugMode?: boolean;
  /** Seed for a deterministic shuffle. Ignored when `rng` is given. */
  seed?: number;
  /** Shuffle randomness. Default: seeded from `seed`, else Math.random. */
  rng?: Rng;
  /** Event emitter to publish on. Default: a new emitter. */
  events?: KlondikeEvents;
}

// ── Session ─────────────────────────────────────────────────

export class KlondikeSession {
  readonly events: KlondikeEvents;

  private readonly flow: ScreenFlow = createScreenFlow();
  private readonly rng: Rng;
  private readonly autoDrawEnabled: boolean;
  private defaultMode: GameMode;
  private gameState: KlondikeState | null = null;
  private readonly selection: SelectionState = { cursor: DECK, picked: null };
  private debug: boolean;
  private status = '';
  private help = '';
  private turns = 0;

  constructor(options: KlondikeSessionOptions = {}) {
    const {
      mode = 'draw-one',
      autoDraw = true,
      debugMode = false,
      seed,
      rng,
      events = new GameEventEmitter<KlondikeEventMap>(),
    } = options;

    this.defaultMode = mode;
    this.autoDrawEnabled = autoDraw;
    this.debug = debugMode;
    this.rng = rng ?? (seed !== undefined ? createSeededRng(seed) : Math.random);
    this.events = events;
  }

  // ── Queries ─────────────────────────────────────────────

  get phase(): ScreenPhase {
    return this.flow.phase;
  }

  get hasGame(): boolean {
    return this.gameState !== null;
  }

  /**
   * The current game state.
   * @throws If no game has been dealt yet.
   */
  get state(): KlondikeState {
    if (!this.gameState) {
      throw new Error('No game in progress; call startNewGame() first');
    }
    return this.gameState;
  }

  get mode(): GameMode {
    return this.gameState?.mode ?? this.defaultMode;
  }

  get cursor(): Selection {
    return this.selection.cursor;
  }

  get picked(): Selection | null {
    return this.selection.picked;
  }

  get debugMode(): boolean {
    return this.debug;
  }

  /** Outcome of the last action, e.g. `move OK` or `invalid move`. */
  get statusMessage(): string {
    return this.status;
  }

  get helpText(): string {
    return this.help;
  }

  get turnNumber(): number {
    return this.turns;
  }

  // ── Game lifecycle ──────────────────────────────────────

  /**
   * Deal a freshly shuffled game and enter play.
   *
   * @throws If the session has quit.
   */
  startNewGame(mode: GameMode = this.defaultMode): TurnOutcome {
    this.defaultMode = mode;
    return this.beginDeal(newGame(mode, this.rng), false);
  }

  /**
   * Redeal the current game from its original deck ordering.
   *
   * @throws If no game has been dealt, or the session has quit.
   */
  restartGame(): TurnOutcome {
    const current = this.state;
    return this.beginDeal(restartGame(current.initialDeck, current.mode), true);
  }

  /**
   * Play from a prepared board (fixtures, debugging). Restarting later
   * redeals from the board's `initialDeck`.
   *
   * @throws If the session has quit.
   */
  loadGame(state: KlondikeState): TurnOutcome {
    this.defaultMode = state.mode;
    return this.beginDeal(state, false);
  }

  openMenu(): boolean {
    return this.moveTo('game-menu');
  }

  closeMenu(): boolean {
    return this.moveTo('game');
  }

  quit(): boolean {
    return this.moveTo('quit');
  }

  // ── Input ───────────────────────────────────────────────

  /**
   * Process one action. Game actions are ignored outside the `game`
   * phase.
   *
   * @returns Whether the action was accepted.
   */
  handle(action: SessionAction): boolean {
    switch (action) {
      case 'open-menu':
        return this.openMenu();
      case 'close-menu':
        return this.closeMenu();
      case 'quit':
        return this.quit();
    }

    if (!isPlaying(this.flow) || !this.gameState) return false;
    const state = this.gameState;

    if (isCursorAction(action)) {
      this.selection.cursor = applyCursorAction(
        action,
        this.selection.cursor,
        state,
        this.debug,
      );
    } else {
      switch (action) {
        case 'select':
          this.selectAction(state);
          break;
        case 'enter':
          this.enterAction(state);
          break;
        case 'cancel':
          this.clearPicked();
          break;
        case 'toggle-debug':
          this.debug = !this.debug;
          this.status = this.debug ? 'debug mode on' : '';
          break;
        case 'debug-force-move':
          if (!this.debug) return false;
          this.forceMoveAction(state);
          break;
        case 'debug-check':
          if (!this.debug) return false;
          this.checkAction(state);
          break;
      }
    }

    this.runTurn();
    return true;
  }

  // ── Actions ─────────────────────────────────────────────

  private selectAction(state: KlondikeState): void {
    const from = this.selection.picked;
    const to = this.selection.cursor;

    if (!from) {
      if (selectedCardCount(to) > 0) {
        this.selection.picked = to;
        this.events.emit('selection-picked', { selection: to });
      }
      return;
    }

    this.selection.picked = null;
    const verdict = validMove(from, to, state);
    if (!verdict.ok) {
      this.status = 'invalid move';
      this.events.emit('move-rejected', {
        from,
        to,
        error: verdict.error,
        reason: verdict.reason,
      });
      return;
    }

    const result = moveCards(from, to, state);
    if (result.ok) {
      this.status = 'move OK';
      this.events.emit('move-applied', {
        from,
        to,
        cardCount: selectedCardCount(from),
        forced: false,
      });
    } else {
      this.status = 'move attempt failed';
      this.events.emit('move-rejected', {
        from,
        to,
        error: result.error,
        reason: result.reason,
      });
    }
  }

  private enterAction(state: KlondikeState): void {
    const cursor = this.selection.cursor;
    if (cursor.kind === 'deck') {
      const outcome = drawFromDeck(state);
      switch (outcome.kind) {
        case 'drew':
          this.status = '';
          this.events.emit('cards-drawn', { count: outcome.count, automatic: false });
          break;
        case 'recycled':
          this.status = 'deck recycled';
          this.events.emit('deck-recycled', { count: outcome.count });
          break;
        case 'empty':
          this.status = 'deck is empty';
          break;
      }
    } else if (cursor.kind === 'column') {
      const from = columnSelection(cursor.index, 1);
      const card = state.tableau[cursor.index].peek();
      const result = autoPlaceToFoundation(cursor.index, state);
      const to = card && locateCard(card, state);
      if (result.ok && to && to !== 'stock') {
        this.status = 'move OK';
        this.events.emit('move-applied', {
          from,
          to,
          cardCount: 1,
          forced: false,
        });
      } else {
        this.status = 'no foundation move';
      }
    }
  }

  private forceMoveAction(state: KlondikeState): void {
    const from = this.selection.picked;
    const to = this.selection.cursor;
    if (!from) {
      this.selection.picked = to;
      this.events.emit('selection-picked', { selection: to });
      return;
    }

    this.selection.picked = null;
    const result = moveCards(from, to, state);
    if (result.ok) {
      this.status = 'forced move OK';
      this.events.emit('move-applied', {
        from,
        to,
        cardCount: selectedCardCount(from),
        forced: true,
      });
    } else {
      this.status = result.reason;
      this.events.emit('move-rejected', {
        from,
        to,
        error: result.error,
        reason: result.reason,
      });
    }
  }

  private checkAction(state: KlondikeState): void {
    const from = this.selection.picked;
    if (!from) {
      this.status = '';
      return;
    }
    const verdict = validMove(from, this.selection.cursor, state);
    this.status = verdict.ok ? 'valid move' : `${verdict.error}: ${verdict.reason}`;
  }

  private clearPicked(): void {
    const picked = this.selection.picked;
    if (!picked) return;
    this.selection.picked = null;
    this.events.emit('selection-cleared', { selection: picked });
  }

  // ── Turn processing ─────────────────────────────────────

  private runTurn(): TurnOutcome {
    const state = this.state;
    const report = runTurnPipeline(
      state,
      { autoDraw: this.autoDrawEnabled, debugMode: this.debug },
      this.selection,
    );
    this.help = report.helpText;
    this.turns++;

    if (report.autoDrawn > 0) {
      this.events.emit('cards-drawn', { count: report.autoDrawn, automatic: true });
    }
    this.events.emit('turn-completed', {
      turnNumber: this.turns,
      outcome: report.outcome,
    });

    if (report.outcome === 'victory') {
      this.status = 'Victory';
      this.selection.picked = null;
      this.moveTo('victory');
      this.events.emit('game-won', { turnNumber: this.turns });
    }
    return report.outcome;
  }

  private beginDeal(state: KlondikeState, restarted: boolean): TurnOutcome {
    if (isFinished(this.flow)) {
      throw new Error('Cannot deal: the session has quit');
    }
    if (this.flow.phase !== 'game') {
      this.moveTo('game');
    }

    this.gameState = state;
    this.selection.cursor = DECK;
    this.selection.picked = null;
    this.status = '';
    this.help = '';
    this.turns = 0;
    this.events.emit('game-started', { mode: state.mode, restarted });
    return this.runTurn();
  }

  private moveTo(next: ScreenPhase): boolean {
    if (!canTransition(this.flow, next)) return false;
    const previous = this.flow.phase;
    transitionTo(this.flow, next);
    this.events.emit('phase-changed', { from: previous, to: next });
    return true;
  }
}
