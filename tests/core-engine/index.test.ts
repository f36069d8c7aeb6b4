import { describe, it, expect, vi } from 'vitest';
import {
  ENGINE_VERSION,
  GameEventEmitter,
  createScreenFlow,
  canTransition,
  transitionTo,
  isPlaying,
  isFinished,
} from '../../src/core-engine/index';

describe('core-engine barrel exports', () => {
  it('should export the module version', () => {
    expect(ENGINE_VERSION).toBe('0.1.0');
  });

  it('should export screen flow functions', () => {
    expect(typeof createScreenFlow).toBe('function');
    expect(typeof canTransition).toBe('function');
    expect(typeof transitionTo).toBe('function');
    expect(typeof isPlaying).toBe('function');
    expect(typeof isFinished).toBe('function');
  });

  it('should work end-to-end through barrel exports', () => {
    const events = new GameEventEmitter<{ 'phase-changed': { to: string } }>();
    const listener = vi.fn();
    events.on('phase-changed', listener);

    const flow = createScreenFlow();
    transitionTo(flow, 'game');
    events.emit('phase-changed', { to: flow.phase });

    expect(isPlaying(flow)).toBe(true);
    expect(listener).toHaveBeenCalledWith({ to: 'game' });
  });
});
