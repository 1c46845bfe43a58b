/** A listener for an event whose payload is `T`. */
type Listener<T> = (data: T) => void;

/**
 * Small typed event emitter. `TEventMap` maps every event name to its
 * payload type so that `on`, `once` and `emit` are all checked.
 *
 * @example
 * ```ts
 * client.events.on('sample_accepted', ({ offset }) => log(offset));
 * const { error } = await client.events.once('accuracy_measured');
 * ```
 */
export class EventEmitter<TEventMap> {
  private _listeners: { [K in keyof TEventMap]?: Set<Listener<TEventMap[K]>> } = {};

  /**
   * Registers `listener` for `event`.
   *
   * @returns A function that removes the listener again.
   */
  on<K extends keyof TEventMap>(event: K, listener: Listener<TEventMap[K]>): () => void {
    let set = this._listeners[event];
    if (set === undefined) {
      set = new Set<Listener<TEventMap[K]>>();
      this._listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  /** Resolves with the payload of the next `event`. */
  once<K extends keyof TEventMap>(event: K): Promise<TEventMap[K]> {
    return new Promise<TEventMap[K]>((resolve) => {
      const unsubscribe = this.on(event, (data) => {
        unsubscribe();
        resolve(data);
      });
    });
  }

  off<K extends keyof TEventMap>(event: K, listener: Listener<TEventMap[K]>): void {
    const set = this._listeners[event];
    if (set === undefined) return;
    set.delete(listener);
    if (set.size === 0) delete this._listeners[event];
  }

  /**
   * Invokes every listener of `event` with `data`. Listeners added or
   * removed during emission take effect from the next emit.
   */
  emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    const set = this._listeners[event];
    if (set === undefined) return;
    for (const listener of [...set]) {
      listener(data);
    }
  }

  listenerCount(event: keyof TEventMap): number {
    return this._listeners[event]?.size ?? 0;
  }

  removeAllListeners(): void {
    this._listeners = {};
  }
}
