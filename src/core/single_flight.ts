export type Release = () => void;

/**
 * Binary lock with a non-blocking admission path. `tryAcquire` either takes
 * the lock at once or reports busy; `acquire` waits its turn in FIFO order.
 * The returned release function is idempotent.
 */
export class SingleFlightLock {
  private held = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  isLocked(): boolean {
    return this.held;
  }

  /** Number of callers parked in {@link acquire}. */
  pending(): number {
    return this.waiters.length;
  }

  tryAcquire(): Release | null {
    if (this.held) return null;
    this.held = true;
    return this.releaser();
  }

  acquire(): Promise<Release> {
    const release = this.tryAcquire();
    if (release) return Promise.resolve(release);
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand over without unlocking so no tryAcquire can slip in between
        next(this.releaser());
      } else {
        this.held = false;
      }
    };
  }
}
