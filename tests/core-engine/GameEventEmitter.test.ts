import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';

interface TestEvents {
  'turn-completed': { turnNumber: number };
  'cards-drawn': { count: number; automatic: boolean };
  'game-won': { turnNumber: number };
}

describe('GameEventEmitter', () => {
  let emitter: GameEventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new GameEventEmitter<TestEvents>();
  });

  // ── Basic emission & subscription ─────────────────────

  describe('on / emit', () => {
    it('should call listener when event is emitted', () => {
      const listener = vi.fn();
      emitter.on('turn-completed', listener);

      emitter.emit('turn-completed', { turnNumber: 3 });

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith({ turnNumber: 3 });
    });

    it('should support multiple listeners for the same event', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('cards-drawn', a);
      emitter.on('cards-drawn', b);

      emitter.emit('cards-drawn', { count: 3, automatic: false });

      expect(a).toHaveBeenCalledOnce();
      expect(b).toHaveBeenCalledOnce();
    });

    it('should call listeners in registration order', () => {
      const order: number[] = [];
      emitter.on('turn-completed', () => order.push(1));
      emitter.on('turn-completed', () => order.push(2));
      emitter.on('turn-completed', () => order.push(3));

      emitter.emit('turn-completed', { turnNumber: 0 });
      expect(order).toEqual([1, 2, 3]);
    });

    it('should not call listeners for different events', () => {
      const listener = vi.fn();
      emitter.on('game-won', listener);

      emitter.emit('turn-completed', { turnNumber: 1 });

      expect(listener).not.toHaveBeenCalled();
    });

    it('should not throw when emitting with no listeners', () => {
      expect(() => emitter.emit('game-won', { turnNumber: 10 })).not.toThrow();
    });
  });

  // ── Unsubscription ────────────────────────────────────

  describe('off', () => {
    it('should remove a specific listener', () => {
      const listener = vi.fn();
      emitter.on('game-won', listener);
      emitter.off('game-won', listener);

      emitter.emit('game-won', { turnNumber: 1 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should not affect other listeners when removing one', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('game-won', a);
      emitter.on('game-won', b);
      emitter.off('game-won', a);

      emitter.emit('game-won', { turnNumber: 1 });
      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledOnce();
    });

    it('should be safe to call off on an event with no listeners', () => {
      expect(() => emitter.off('game-won', vi.fn())).not.toThrow();
    });
  });

  describe('on() return value (unsubscribe)', () => {
    it('should return a function that unsubscribes the listener', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.on('turn-completed', listener);
      unsubscribe();

      emitter.emit('turn-completed', { turnNumber: 1 });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('once', () => {
    it('should call listener only for the first emission', () => {
      const listener = vi.fn();
      emitter.once('turn-completed', listener);

      emitter.emit('turn-completed', { turnNumber: 1 });
      emitter.emit('turn-completed', { turnNumber: 2 });

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith({ turnNumber: 1 });
      expect(emitter.listenerCount('turn-completed')).toBe(0);
    });

    it('should return an unsubscribe function', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.once('turn-completed', listener);
      unsubscribe();

      emitter.emit('turn-completed', { turnNumber: 1 });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners', () => {
    it('should remove all listeners for a specific event', () => {
      const won = vi.fn();
      const turn = vi.fn();
      emitter.on('game-won', won);
      emitter.on('turn-completed', turn);

      emitter.removeAllListeners('game-won');
      emitter.emit('game-won', { turnNumber: 1 });
      emitter.emit('turn-completed', { turnNumber: 1 });

      expect(won).not.toHaveBeenCalled();
      expect(turn).toHaveBeenCalledOnce();
    });

    it('should remove every listener when called with no arguments', () => {
      emitter.on('game-won', vi.fn());
      emitter.on('turn-completed', vi.fn());

      emitter.removeAllListeners();

      expect(emitter.listenerCount('game-won')).toBe(0);
      expect(emitter.listenerCount('turn-completed')).toBe(0);
    });
  });

  describe('listenerCount', () => {
    it('should track additions and removals', () => {
      expect(emitter.listenerCount('cards-drawn')).toBe(0);
      const a = vi.fn();
      emitter.on('cards-drawn', a);
      emitter.on('cards-drawn', vi.fn());
      expect(emitter.listenerCount('cards-drawn')).toBe(2);
      emitter.off('cards-drawn', a);
      expect(emitter.listenerCount('cards-drawn')).toBe(1);
    });
  });

  describe('edge cases', () => {
    it('should handle a listener that unsubscribes itself during emission', () => {
      const calls: string[] = [];
      const self = (): void => {
        calls.push('self');
        emitter.off('turn-completed', self);
      };
      emitter.on('turn-completed', self);
      emitter.on('turn-completed', () => calls.push('other'));

      emitter.emit('turn-completed', { turnNumber: 0 });
      emitter.emit('turn-completed', { turnNumber: 1 });

      expect(calls).toEqual(['self', 'other', 'other']);
    });

    it('should not call a listener added during the same emission', () => {
      const late = vi.fn();
      emitter.on('turn-completed', () => {
        emitter.on('turn-completed', late);
      });

      emitter.emit('turn-completed', { turnNumber: 0 });
      expect(late).not.toHaveBeenCalled();

      emitter.emit('turn-completed', { turnNumber: 1 });
      expect(late).toHaveBeenCalledOnce();
    });

    it('should keep separate emitter instances independent', () => {
      const other = new GameEventEmitter<TestEvents>();
      const listener = vi.fn();
      other.on('game-won', listener);

      emitter.emit('game-won', { turnNumber: 1 });
      expect(listener).not.toHaveBeenCalled();
    });
  });
});
