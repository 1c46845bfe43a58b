interface Waiter {
  resolve: (notified: boolean) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Condition-variable style rendezvous for the client: loops call
 * {@link notifyAll} when a new accuracy sample exists or shutdown begins,
 * readers {@link wait} for that with an optional timeout.
 */
export class Monitor {
  private _waiters: Waiter[] = [];

  get waiting(): number {
    return this._waiters.length;
  }

  /**
   * Resolves `true` on the next {@link notifyAll}, or `false` once
   * `timeoutMs` elapses first. A `timeoutMs` of `0` never times out.
   */
  wait(timeoutMs: number = 0): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve, timer: null };
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this._waiters = this._waiters.filter((w) => w !== waiter);
          resolve(false);
        }, timeoutMs);
      }
      this._waiters.push(waiter);
    });
  }

  /** Wakes every pending waiter with `true`. */
  notifyAll(): void {
    const waiters = this._waiters;
    this._waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer !== null) clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }
}
