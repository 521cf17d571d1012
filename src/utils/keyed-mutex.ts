/**
 * corepipe — Keyed mutex
 */

export type ReleaseFunction = () => void;

/**
 * Per-key exclusive lock that never waits.
 *
 * tryAcquire() returns undefined while the key is held so callers can
 * reject the operation instead of queueing behind it.
 */
export class KeyedMutex {
  private held = new Set<string>();

  tryAcquire(key: string): ReleaseFunction | undefined {
    if (this.held.has(key)) {
      return undefined;
    }
    this.held.add(key);
    return this.releaser(key);
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  get size(): number {
    return this.held.size;
  }

  private releaser(key: string): ReleaseFunction {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(key);
    };
  }
}
