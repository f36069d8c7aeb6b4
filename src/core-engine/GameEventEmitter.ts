/**
 * Typed Event Emitter for the Klondike engine.
 *
 * A zero-dependency emitter parameterised by an event map, so each
 * game declares its own event names and payloads while sharing the
 * subscription machinery. Works headless in Node.js and in the browser.
 *
 * Usage:
 * ```ts
 * interface MyEvents { 'turn-completed': { turnNumber: number } }
 * const emitter = new GameEventEmitter<MyEvents>();
 * emitter.on('turn-completed', (p) => console.log(p.turnNumber));
 * emitter.emit('turn-completed', { turnNumber: 1 });
 * ```
 */

/**
 * Event name -> payload type. Declare game events as an interface
 * and pass it as the emitter's type argument.
 */
export type EventMap = object;

/** A callback for a specific event type. */
export type GameEventListener<M extends EventMap, K extends keyof M> = (
  payload: M[K],
) => void;

type ListenerTable<M extends EventMap> = {
  [K in keyof M]?: Array<GameEventListener<M, K>>;
};

export class GameEventEmitter<M extends EventMap> {
  private listeners: ListenerTable<M> = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof M>(event: K, listener: GameEventListener<M, K>): () => void {
    const list = this.listenersFor(event);
    if (list) {
      list.push(listener);
    } else {
      (this.listeners as Record<PropertyKey, unknown>)[event] = [listener];
    }
    return () => this.off(event, listener);
  }

  /**
   * Subscribe for a single emission only. The returned function
   * cancels the subscription before it fires.
   */
  once<K extends keyof M>(event: K, listener: GameEventListener<M, K>): () => void {
    const wrapper: GameEventListener<M, K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends keyof M>(event: K, listener: GameEventListener<M, K>): void {
    const list = this.listenersFor(event);
    if (!list) return;
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listenersFor(event);
    if (!list || list.length === 0) return;

    // Copy so listeners can unsubscribe during emission
    for (const fn of [...list]) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: keyof M): number {
    return this.listenersFor(event)?.length ?? 0;
  }

  private listenersFor<K extends keyof M>(
    event: K,
  ): Array<GameEventListener<M, K>> | undefined {
    return this.listeners[event] as Array<GameEventListener<M, K>> | undefined;
  }
}
