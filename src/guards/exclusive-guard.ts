import { assertCanAcquire, runHolding } from './lock-scope';

export interface GuardOptions {
  /** Guards that must not be held by the caller when this one is acquired. */
  mustNotHold?: readonly string[];
}

/**
 * One holder at a time, regardless of whether it reads or writes. Waiters are
 * served in arrival order and the lock is handed over directly on release.
 */
export class ExclusiveGuard<T> {
  private locked = false;
  private readonly waiters: Array<() => void> = [];
  private readonly mustNotHold: readonly string[];

  constructor(
    readonly name: string,
    private readonly resource: T | undefined,
    options: GuardOptions = {},
  ) {
    this.mustNotHold = options.mustNotHold ?? [];
  }

  get isAvailable(): boolean {
    return this.resource !== undefined;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Runs `fn` with exclusive access. `fn` receives undefined when the
   * resource is not configured. The guard is released when `fn` settles.
   */
  async withExclusive<R>(
    fn: (resource: T | undefined) => Promise<R> | R,
  ): Promise<R> {
    assertCanAcquire(this.name, this.mustNotHold);
    await this.acquire();
    try {
      return await runHolding(this.name, () => fn(this.resource));
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }
}
