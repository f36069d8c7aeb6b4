import { describe, it, expect, vi } from 'vitest';
import { KlondikeSession } from '../../games/klondike/KlondikeSession';
import type { SessionAction } from '../../games/klondike/KlondikeSession';
import { createAlmostVictoryState, countCards } from '../../games/klondike/KlondikeRules';
import { DECK, columnSelection, pileSelection } from '../../games/klondike/Selection';
import { createShuffledDeck, createSeededRng, createStandardDeck } from '../../src/card-system/Deck';
import { card, riggedRng } from './helpers';

/** A session whose first deal comes from the ordered deck. */
function orderedSession(options: { debugMode?: boolean; autoDraw?: boolean } = {}) {
  const session = new KlondikeSession({ rng: riggedRng(), ...options });
  session.startNewGame();
  return session;
}

function press(session: KlondikeSession, ...actions: SessionAction[]): void {
  for (const action of actions) session.handle(action);
}

describe('KlondikeSession', () => {
  describe('before the first deal', () => {
    it('should start on the start screen with no game', () => {
      const session = new KlondikeSession();
      expect(session.phase).toBe('start');
      expect(session.hasGame).toBe(false);
      expect(session.mode).toBe('draw-one');
      expect(session.debugMode).toBe(false);
      expect(() => session.state).toThrow('No game in progress; call startNewGame() first');
    });

    it('should ignore game actions', () => {
      const session = new KlondikeSession();
      expect(session.handle('enter')).toBe(false);
      expect(session.handle('move-right')).toBe(false);
      expect(session.turnNumber).toBe(0);
    });

    it('should refuse to restart', () => {
      expect(() => new KlondikeSession().restartGame()).toThrow('No game in progress');
    });

    it('should not open the menu from the start screen', () => {
      const session = new KlondikeSession();
      expect(session.handle('open-menu')).toBe(false);
      expect(session.phase).toBe('start');
    });
  });

  describe('startNewGame', () => {
    it('should deal, run the first turn and announce it', () => {
      const session = new KlondikeSession({ rng: riggedRng() });
      const log: string[] = [];
      session.events.on('phase-changed', (p) => log.push(`phase ${p.from}->${p.to}`));
      session.events.on('game-started', (p) => log.push(`started ${p.mode} ${p.restarted}`));
      session.events.on('cards-drawn', (p) => log.push(`drawn ${p.count} ${p.automatic}`));
      session.events.on('turn-completed', (p) => log.push(`turn ${p.turnNumber} ${p.outcome}`));

      expect(session.startNewGame()).toBe('continue');

      expect(log).toEqual([
        'phase start->game',
        'started draw-one false',
        'drawn 1 true',
        'turn 1 continue',
      ]);
      expect(session.phase).toBe('game');
      expect(session.turnNumber).toBe(1);
      expect(session.cursor).toEqual(DECK);
      expect(session.picked).toBeNull();
      expect(session.helpText).toBe('Enter: Hit');
      expect(session.statusMessage).toBe('');
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades')]);
      expect(countCards(session.state)).toBe(52);
    });

    it('should draw three in draw-three mode', () => {
      const session = new KlondikeSession({ mode: 'draw-three', rng: riggedRng() });
      session.startNewGame();
      expect(session.mode).toBe('draw-three');
      expect(session.state.waste.toArray()).toEqual([
        card('J', 'spades'),
        card('10', 'spades'),
        card('9', 'spades'),
      ]);
    });

    it('should leave the waste empty without auto-draw', () => {
      const session = orderedSession({ autoDraw: false });
      expect(session.state.waste.isEmpty()).toBe(true);
      expect(session.state.stock.size()).toBe(24);
    });

    it('should deal the same game for the same seed', () => {
      const a = new KlondikeSession({ seed: 42 });
      const b = new KlondikeSession({ seed: 42 });
      a.startNewGame();
      b.startNewGame();
      expect(a.state.initialDeck).toEqual(b.state.initialDeck);
      expect(a.state.initialDeck).toEqual(createShuffledDeck(createSeededRng(42)));
    });

    it('should switch modes on request', () => {
      const session = new KlondikeSession({ mode: 'draw-three', seed: 1 });
      session.startNewGame('draw-one');
      expect(session.mode).toBe('draw-one');
      expect(session.state.waste.size()).toBe(1);
    });
  });

  describe('select', () => {
    it('should pick up the waste and drop it on a column', () => {
      const session = orderedSession();
      const picked = vi.fn();
      const applied = vi.fn();
      session.events.on('selection-picked', picked);
      session.events.on('move-applied', applied);

      press(session, 'select');
      expect(session.picked).toEqual(DECK);
      expect(picked).toHaveBeenCalledWith({ selection: DECK });

      press(session, 'move-right', 'move-right', 'move-right', 'move-right', 'move-right');
      expect(session.cursor).toEqual(columnSelection(4, 1));

      expect(session.handle('select')).toBe(true);
      expect(session.statusMessage).toBe('move OK');
      expect(session.picked).toBeNull();
      expect(applied).toHaveBeenCalledWith({
        from: DECK,
        to: columnSelection(4, 1),
        cardCount: 1,
        forced: false,
      });
      expect(session.state.tableau[4].peek()).toEqual(card('J', 'spades'));
      // The waste ran out, so the pipeline drew the next card.
      expect(session.state.waste.toArray()).toEqual([card('10', 'spades')]);
      expect(session.turnNumber).toBe(8);
    });

    it('should reject an illegal drop and clear the pick', () => {
      const session = orderedSession();
      const rejected = vi.fn();
      session.events.on('move-rejected', rejected);

      press(session, 'select', 'move-right', 'select');

      expect(session.statusMessage).toBe('invalid move');
      expect(session.picked).toBeNull();
      expect(rejected).toHaveBeenCalledWith({
        from: DECK,
        to: columnSelection(0, 1),
        error: 'invalid-move',
        reason: 'J♠ does not fit on column 0',
      });
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades')]);
      expect(session.state.tableau[0].toArray()).toEqual([card('K', 'clubs')]);
    });

    it('should put the picked cards back on cancel', () => {
      const session = orderedSession();
      const cleared = vi.fn();
      session.events.on('selection-cleared', cleared);

      press(session, 'cancel');
      expect(cleared).not.toHaveBeenCalled();

      press(session, 'select', 'cancel');
      expect(session.picked).toBeNull();
      expect(cleared).toHaveBeenCalledWith({ selection: DECK });
    });

    it('should keep a single-card column selection on extend-up', () => {
      const session = orderedSession();
      press(session, 'move-right', 'extend-up');
      expect(session.cursor).toEqual(columnSelection(0, 1));
    });
  });

  describe('enter', () => {
    it('should draw from the stock on the deck', () => {
      const session = orderedSession();
      const drawn = vi.fn();
      session.events.on('cards-drawn', drawn);

      press(session, 'enter');

      expect(drawn).toHaveBeenCalledTimes(1);
      expect(drawn).toHaveBeenCalledWith({ count: 1, automatic: false });
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades'), card('10', 'spades')]);
      expect(session.statusMessage).toBe('');
    });

    it('should recycle the waste once the stock is empty', () => {
      const session = orderedSession();
      const recycled = vi.fn();
      session.events.on('deck-recycled', recycled);

      for (let i = 0; i < 23; i++) press(session, 'enter');
      expect(session.state.stock.isEmpty()).toBe(true);
      expect(session.state.waste.size()).toBe(24);

      press(session, 'enter');

      expect(session.statusMessage).toBe('deck recycled');
      expect(recycled).toHaveBeenCalledWith({ count: 24 });
      // The pipeline draws again straight after the recycle.
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades')]);
      expect(session.state.stock.size()).toBe(23);
    });

    it('should report an empty deck', () => {
      const session = new KlondikeSession();
      session.loadGame(createAlmostVictoryState());
      press(session, 'enter');
      expect(session.statusMessage).toBe('deck is empty');
    });

    it('should send a column top to its foundation', () => {
      // Swap A♣ into the card dealt to column 0.
      const session = new KlondikeSession({ rng: riggedRng({ 51: 39 }) });
      session.startNewGame();
      const applied = vi.fn();
      session.events.on('move-applied', applied);

      press(session, 'move-right', 'enter');

      expect(session.statusMessage).toBe('move OK');
      expect(applied).toHaveBeenCalledWith({
        from: columnSelection(0, 1),
        to: pileSelection(3),
        cardCount: 1,
        forced: false,
      });
      expect(session.state.foundations[3].peek()).toEqual(card('A', 'clubs'));
      expect(session.cursor).toEqual(columnSelection(0, 0));
    });

    it('should report when no foundation takes the column top', () => {
      const session = orderedSession();
      press(session, 'move-right', 'enter');
      expect(session.statusMessage).toBe('no foundation move');
      expect(session.state.tableau[0].size()).toBe(1);
    });

    it('should do nothing on a pile', () => {
      const session = orderedSession();
      expect(session.handle('jump-to-last-pile')).toBe(true);
      expect(session.handle('enter')).toBe(true);
      expect(session.statusMessage).toBe('');
      expect(session.state.waste.size()).toBe(1);
    });
  });

  describe('debug actions', () => {
    it('should toggle debug mode', () => {
      const session = orderedSession();
      press(session, 'toggle-debug');
      expect(session.debugMode).toBe(true);
      expect(session.statusMessage).toBe('debug mode on');
      press(session, 'toggle-debug');
      expect(session.debugMode).toBe(false);
      expect(session.statusMessage).toBe('');
    });

    it('should ignore debug actions outside debug mode', () => {
      const session = orderedSession();
      expect(session.handle('debug-check')).toBe(false);
      expect(session.handle('debug-force-move')).toBe(false);
      expect(session.turnNumber).toBe(1);
    });

    it('should force an illegal move', () => {
      const session = orderedSession({ debugMode: true });
      const applied = vi.fn();
      session.events.on('move-applied', applied);

      press(session, 'debug-force-move');
      expect(session.picked).toEqual(DECK);

      press(session, 'move-right', 'debug-force-move');

      expect(session.statusMessage).toBe('forced move OK');
      expect(applied).toHaveBeenCalledWith({
        from: DECK,
        to: columnSelection(0, 1),
        cardCount: 1,
        forced: true,
      });
      expect(session.state.tableau[0].toArray()).toEqual([card('K', 'clubs'), card('J', 'spades')]);
    });

    it('should report a forced move that cannot transfer', () => {
      const session = orderedSession({ debugMode: true });
      press(session, 'jump-to-last-pile', 'debug-force-move', 'jump-to-deck', 'debug-force-move');
      expect(session.statusMessage).toBe('cannot transfer 1 from pile 0 to deck');
      expect(session.picked).toBeNull();
    });

    it('should check the pending move without applying it', () => {
      const session = orderedSession({ debugMode: true });

      press(session, 'debug-check');
      expect(session.statusMessage).toBe('');

      press(session, 'select', 'move-right', 'debug-check');
      expect(session.statusMessage).toBe('invalid-move: J♠ does not fit on column 0');
      expect(session.picked).toEqual(DECK);

      press(session, 'move-right', 'move-right', 'move-right', 'move-right', 'debug-check');
      expect(session.statusMessage).toBe('valid move');
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades')]);
    });
  });

  describe('screen flow', () => {
    it('should suspend play behind the menu', () => {
      const session = orderedSession();
      expect(session.handle('open-menu')).toBe(true);
      expect(session.phase).toBe('game-menu');
      expect(session.handle('enter')).toBe(false);
      expect(session.handle('close-menu')).toBe(true);
      expect(session.phase).toBe('game');
    });

    it('should restart from the same deck', () => {
      const session = orderedSession();
      press(session, 'enter', 'enter');
      const started = vi.fn();
      session.events.on('game-started', started);

      expect(session.restartGame()).toBe('continue');

      expect(started).toHaveBeenCalledWith({ mode: 'draw-one', restarted: true });
      expect(session.state.initialDeck).toEqual(createStandardDeck());
      expect(session.state.waste.toArray()).toEqual([card('J', 'spades')]);
      expect(session.turnNumber).toBe(1);
    });

    it('should restart from the menu back into play', () => {
      const session = orderedSession();
      session.openMenu();
      session.restartGame();
      expect(session.phase).toBe('game');
    });

    it('should stop dealing after quitting', () => {
      const session = orderedSession();
      const phases = vi.fn();
      session.events.on('phase-changed', phases);

      expect(session.handle('quit')).toBe(true);
      expect(session.phase).toBe('quit');
      expect(phases).toHaveBeenCalledWith({ from: 'game', to: 'quit' });
      expect(session.handle('quit')).toBe(false);
      expect(() => session.startNewGame()).toThrow('Cannot deal: the session has quit');
    });
  });

  describe('victory', () => {
    it('should end the game when the last card reaches a foundation', () => {
      const session = new KlondikeSession({ seed: 7 });
      const won = vi.fn();
      session.events.on('game-won', won);
      session.loadGame(createAlmostVictoryState());

      press(session, 'move-right');
      expect(session.cursor).toEqual(columnSelection(0, 1));
      press(session, 'enter');

      expect(session.phase).toBe('victory');
      expect(session.statusMessage).toBe('Victory');
      expect(won).toHaveBeenCalledWith({ turnNumber: 3 });
      expect(session.handle('enter')).toBe(false);
    });

    it('should deal a new game from the victory screen', () => {
      const session = new KlondikeSession({ seed: 7 });
      session.loadGame(createAlmostVictoryState());
      press(session, 'move-right', 'enter');

      session.startNewGame();

      expect(session.phase).toBe('game');
      expect(countCards(session.state)).toBe(52);
      expect(session.state.foundations.every((f) => f.isEmpty())).toBe(true);
    });
  });
});
