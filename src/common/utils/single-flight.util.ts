/**
 * Collapses concurrent calls that share a key into one execution.
 *
 * While a call for `key` is in flight, later callers receive the same
 * promise instead of starting their own; the entry is dropped as soon as it
 * settles, so the next call after that starts fresh.
 *
 * @example
 * ```typescript
 * const flights = new SingleFlight<number>();
 * const rate = await flights.run('USD:JPY', () => this.resolveRate('USD', 'JPY'));
 * ```
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const flight = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, flight);
    return flight;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
