import { AsyncLocalStorage } from 'async_hooks';
import { LockOrderViolationError } from '../errors/lock-order-violation.error';

const heldGuards = new AsyncLocalStorage<ReadonlySet<string>>();
const NONE: ReadonlySet<string> = new Set();

/** Guards held by the current async call chain. */
export function currentlyHeldGuards(): ReadonlySet<string> {
  return heldGuards.getStore() ?? NONE;
}

/**
 * Throws when acquiring `name` now could deadlock: the guard is already held
 * by this call chain, or a guard that must be released first is still held.
 */
export function assertCanAcquire(
  name: string,
  mustNotHold: readonly string[],
): void {
  const held = currentlyHeldGuards();
  if (held.has(name)) {
    throw new LockOrderViolationError(name, name);
  }
  for (const other of mustNotHold) {
    if (held.has(other)) {
      throw new LockOrderViolationError(name, other);
    }
  }
}

export function runHolding<R>(name: string, fn: () => R): R {
  const next = new Set(currentlyHeldGuards());
  next.add(name);
  return heldGuards.run(next, fn);
}
