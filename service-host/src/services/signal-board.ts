/**
 * Short-lived shared signals with a time-to-live.
 *
 * Readers poll and tolerate staleness up to the TTL. Nothing here is durable:
 * losing the board loses only hints (drawer-open, kitchen new-order,
 * alert de-duplication), never business state.
 */

interface SignalEntry {
  value: unknown;
  expiresAt: number;
}

export const SignalKey = {
  drawer: (deviceId: string) => `drawer:${deviceId}`,
  kitchenNewOrders: 'kitchen:new_orders',
  stockAlert: (productId: string, kind: string) => `stock-alert:${productId}:${kind}`,
} as const;

export class SignalBoard {
  private entries = new Map<string, SignalEntry>();
  private now: () => number;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  set(key: string, value: unknown, ttlSeconds: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /** Sets the signal only if it is absent or expired. Returns whether it was set. */
  claim(key: string, value: unknown, ttlSeconds: number): boolean {
    if (this.has(key)) {
      return false;
    }
    this.set(key, value, ttlSeconds);
    return true;
  }

  /** Reads and clears. */
  take(key: string): unknown {
    const value = this.get(key);
    this.entries.delete(key);
    return value;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
