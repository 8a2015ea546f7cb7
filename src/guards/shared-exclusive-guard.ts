import type { GuardOptions } from './exclusive-guard';
import { assertCanAcquire, runHolding } from './lock-scope';

type AccessMode = 'shared' | 'exclusive';

interface Waiter {
  mode: AccessMode;
  resolve: () => void;
}

/**
 * Many readers or one writer, held across await points. A queued writer
 * blocks new readers so that a steady stream of reads cannot starve it.
 */
export class SharedExclusiveGuard<T> {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];
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

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writer;
  }

  async withShared<R>(
    fn: (resource: T | undefined) => Promise<R> | R,
  ): Promise<R> {
    assertCanAcquire(this.name, this.mustNotHold);
    await this.acquire('shared');
    try {
      return await runHolding(this.name, () => fn(this.resource));
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async withExclusive<R>(
    fn: (resource: T | undefined) => Promise<R> | R,
  ): Promise<R> {
    assertCanAcquire(this.name, this.mustNotHold);
    await this.acquire('exclusive');
    try {
      return await runHolding(this.name, () => fn(this.resource));
    } finally {
      this.writer = false;
      this.drain();
    }
  }

  private acquire(mode: AccessMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.queue.push({ mode, resolve }));
  }

  private canGrant(mode: AccessMode): boolean {
    if (mode === 'shared') {
      return !this.writer;
    }
    return !this.writer && this.readers === 0;
  }

  private grant(mode: AccessMode): void {
    if (mode === 'shared') {
      this.readers += 1;
    } else {
      this.writer = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!this.canGrant(head.mode)) {
        return;
      }
      this.queue.shift();
      this.grant(head.mode);
      head.resolve();
      if (head.mode === 'exclusive') {
        return;
      }
    }
  }
}
