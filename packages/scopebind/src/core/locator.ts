/*
 * Locator: the keyed service registry scopes write through to.
 *
 * It knows nothing about scopes or ownership. It stores instances, lazy
 * builders and factories by key and offers the primitives the injector
 * composes: register (insert-if-absent), resolve, exists, delete.
 *
 * Semantics:
 *  - Registering a taken key keeps the existing registration.
 *  - Lazy entries build on first resolve and cache; factory entries build on
 *    every resolve and never cache.
 *  - delete() on an absent key is a logged no-op that resolves false.
 *  - delete() refuses permanent entries unless forced.
 *  - delete() on a fenix entry drops the instance and keeps the builder, even
 *    when forced: the key stays registered and the next resolve rebuilds it.
 *    A fenix entry with nothing built yet has nothing to delete (false).
 *  - Deleting a materialized instance awaits its onClose()/dispose()/close().
 *    The entry is detached first, so the hook cannot resolve the instance
 *    being closed; errors from the hook propagate to the caller of delete().
 */
import { FactoryExecutionError, NotRegisteredError } from '../errors/errors.js';
import type { AsyncBuilder, Builder, Closeable, Logger, LocatorConfig } from '../types/types.js';
import { EntryStore, type Entry } from './entry-store.js';
import {
  FLAG_FENIX,
  FLAG_HAS_INSTANCE,
  FLAG_PERMANENT,
  KIND_FACTORY,
  KIND_MASK,
  KIND_SINGLETON,
} from './flags.js';
import { describeKey, type Key } from './key.js';

/**
 * Registry contract consumed by the injector. {@link Locator} is the bundled
 * implementation; any store offering these primitives can be used instead.
 */
export interface RegistryAdapter {
  /** @returns the instance now resolvable for `key` (the existing one if taken) */
  registerInstance<T>(key: Key<T>, value: T, opts?: { permanent?: boolean }): T;
  /** @returns false if the key was already registered */
  registerLazy<T>(key: Key<T>, builder: Builder<T>, opts?: { fenix?: boolean }): boolean;
  /** @returns false if the key was already registered */
  registerFactory<T>(key: Key<T>, builder: Builder<T>): boolean;
  registerAsync<T>(key: Key<T>, builder: AsyncBuilder<T>, opts?: { permanent?: boolean }): Promise<T>;
  resolve<T>(key: Key<T>): T;
  exists(key: Key): boolean;
  /** @returns true if something was deleted; never rejects for an absent key */
  delete(key: Key, opts?: { force?: boolean }): Promise<boolean>;
  /** Labels of every registered key, for diagnostics. */
  keys(): string[];
}

const CLOSE_HOOKS = ['onClose', 'dispose', 'close'] as const satisfies ReadonlyArray<keyof Closeable>;

function findCloser(value: unknown): (() => unknown) | undefined {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return undefined;
  }
  for (const name of CLOSE_HOOKS) {
    const hook: unknown = Reflect.get(value, name);
    if (typeof hook === 'function') return () => hook.call(value);
  }
  return undefined;
}

export class Locator implements RegistryAdapter {
  private readonly store = new EntryStore();
  private readonly name: string;
  private readonly logger: Logger;

  constructor(config: LocatorConfig = {}) {
    this.name = config.name ?? 'Locator';
    this.logger = config.logger ?? console;
  }

  /** Number of registered keys. */
  get size(): number {
    return this.store.size;
  }

  registerInstance<T>(key: Key<T>, value: T, opts?: { permanent?: boolean }): T {
    const inserted = this.store.add({
      key,
      instance: value,
      flags: KIND_SINGLETON | FLAG_HAS_INSTANCE | (opts?.permanent ? FLAG_PERMANENT : 0),
    });
    return inserted ? value : this.resolve(key);
  }

  registerLazy<T>(key: Key<T>, builder: Builder<T>, opts?: { fenix?: boolean }): boolean {
    return this.store.add({
      key,
      builder,
      flags: KIND_SINGLETON | (opts?.fenix ? FLAG_FENIX : 0),
    });
  }

  registerFactory<T>(key: Key<T>, builder: Builder<T>): boolean {
    return this.store.add({ key, builder, flags: KIND_FACTORY });
  }

  /**
   * Await `builder`, then register its result. If the key was taken while the
   * builder ran, the existing registration wins and is returned.
   */
  async registerAsync<T>(
    key: Key<T>,
    builder: AsyncBuilder<T>,
    opts?: { permanent?: boolean }
  ): Promise<T> {
    const value = await builder();
    return this.registerInstance(key, value, opts);
  }

  /**
   * @throws {NotRegisteredError} if nothing is registered for `key`
   * @throws {FactoryExecutionError} if a lazy or factory builder throws
   */
  resolve<T>(key: Key<T>): T {
    const entry = this.store.get(key.id);
    if (entry === undefined) throw this.buildNotFoundError(key);
    if (entry.flags & FLAG_HAS_INSTANCE) return entry.instance as T;
    return this.build(entry) as T;
  }

  exists(key: Key): boolean {
    return this.store.has(key.id);
  }

  async delete(key: Key, opts?: { force?: boolean }): Promise<boolean> {
    const entry = this.store.get(key.id);
    if (entry === undefined) {
      this.logger.debug(`[scopebind:${this.name}] '${describeKey(key)}' already removed`);
      return false;
    }

    if (entry.flags & FLAG_PERMANENT && !opts?.force) {
      this.logger.warn(
        `[scopebind:${this.name}] '${describeKey(key)}' is permanent; pass force to delete it`
      );
      return false;
    }

    const hadInstance = (entry.flags & FLAG_HAS_INSTANCE) !== 0;
    const instance = entry.instance;

    if (entry.flags & FLAG_FENIX) {
      if (!hadInstance) return false;
      entry.instance = undefined;
      entry.flags &= ~FLAG_HAS_INSTANCE;
    } else {
      this.store.remove(key.id);
    }

    if (hadInstance) {
      const close = findCloser(instance);
      if (close) await close();
    }
    return true;
  }

  keys(): string[] {
    return Array.from(this.store.values(), (entry) => describeKey(entry.key));
  }

  /**
   * Drop every registration WITHOUT closing instances.
   *
   * Meant for resetting state between tests. Instances holding resources
   * should be deleted through delete() instead.
   */
  reset(): void {
    this.store.clear();
  }

  private build(entry: Entry): unknown {
    const { builder, key } = entry;
    if (builder === undefined) throw this.buildNotFoundError(key);

    let value: unknown;
    try {
      value = builder();
    } catch (error) {
      throw new FactoryExecutionError(describeKey(key), error);
    }

    if ((entry.flags & KIND_MASK) === KIND_SINGLETON) {
      entry.instance = value;
      entry.flags |= FLAG_HAS_INSTANCE;
    }
    return value;
  }

  private buildNotFoundError(key: Key): NotRegisteredError {
    return new NotRegisteredError(describeKey(key), this.keys());
  }
}
