/* RaceCoordinator
 *
 * Arbitrates concurrent asynchronous installs of the same key with
 * first-registrant-wins semantics:
 *
 *  - The first caller that finds the key neither in flight nor registered
 *    becomes the creator and marks the key in flight.
 *  - Every later caller becomes a borrower. While an install is in flight the
 *    borrower gets the install's completion promise to wait on; once the key is
 *    registered it gets nothing to wait for and resolves straight away.
 *  - The creator releases the marker exactly once when its install settles,
 *    successfully or not, which wakes every waiting borrower.
 *
 * Creator status is decided at call time, not completion time: a slow creator
 * keeps the key even if a later, faster caller would have finished first.
 *
 * beginInstall() is synchronous from check to mark. Nothing can interleave
 * between "is anyone installing?" and "I am installing", which is what makes
 * the protocol race-free on a single-threaded event loop.
 *
 * Injectors sharing a registry must share its coordinator; coordinatorFor()
 * hands out one per registry.
 */
import type { Key, KeyId } from './key.js';
import type { RegistryAdapter } from './locator.js';
import type { ScopeRecorder } from './scope-recorder.js';

export type InstallTicket =
  | { isCreator: true; release: () => void }
  | { isCreator: false; wait?: Promise<void> };

type InFlightInstall = {
  key: Key;
  /** Scope that owns the install; undefined when started outside any scope. */
  owner: ScopeRecorder | undefined;
  completion: Promise<void>;
  signal: () => void;
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class RaceCoordinator {
  private readonly inFlight = new Map<KeyId, InFlightInstall>();

  /** Number of installs currently in flight. */
  get size(): number {
    return this.inFlight.size;
  }

  isInFlight(key: Key): boolean {
    return this.inFlight.has(key.id);
  }

  /** Scope owning the in-flight install of `key`, if any. */
  ownerOf(key: Key): ScopeRecorder | undefined {
    return this.inFlight.get(key.id)?.owner;
  }

  /**
   * Decide whether the caller creates `key` or borrows it.
   *
   * The creator must call `release()` once its install settles; calling it
   * again is a no-op. The completion promise handed to borrowers never rejects:
   * borrowers re-check the registry to learn whether the install succeeded.
   */
  beginInstall(
    key: Key,
    registry: Pick<RegistryAdapter, 'exists'>,
    owner?: ScopeRecorder
  ): InstallTicket {
    const pending = this.inFlight.get(key.id);
    if (pending) return { isCreator: false, wait: pending.completion };
    if (registry.exists(key)) return { isCreator: false };

    const { promise, resolve } = deferred();
    this.inFlight.set(key.id, { key, owner, completion: promise, signal: resolve });

    let released = false;
    return {
      isCreator: true,
      release: () => {
        if (released) return;
        released = true;
        this.endInstall(key);
      },
    };
  }

  /**
   * Clear the in-flight marker for `key` and wake its waiters.
   * Prefer the ticket's `release()`, which guarantees a single call per install.
   */
  endInstall(key: Key): void {
    const install = this.inFlight.get(key.id);
    if (install === undefined) return;
    this.inFlight.delete(key.id);
    install.signal();
  }
}

const coordinators = new WeakMap<RegistryAdapter, RaceCoordinator>();

/** The coordinator shared by every injector writing to `registry`. */
export function coordinatorFor(registry: RegistryAdapter): RaceCoordinator {
  let races = coordinators.get(registry);
  if (races === undefined) {
    races = new RaceCoordinator();
    coordinators.set(registry, races);
  }
  return races;
}
