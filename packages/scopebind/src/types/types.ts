import type { Injector } from '../core/injector.js';
import type { RegistryAdapter } from '../core/locator.js';

/**
 * Log sink used by the locator and injector.
 *
 * Defaults to `console`. Pass your own to route diagnostics elsewhere or to
 * silence them in tests.
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** Synchronous builder for lazy and factory registrations. */
export type Builder<T> = () => T;

/** Asynchronous builder for `putAsync`. */
export type AsyncBuilder<T> = () => Promise<T>;

/**
 * Teardown hooks the locator honours when it deletes a materialized instance.
 * The first method found is called and awaited.
 */
export interface Closeable {
  onClose?: () => void | Promise<void>;
  dispose?: () => void | Promise<void>;
  close?: () => void | Promise<void>;
}

export interface TagOptions {
  /** Disambiguates several registrations of the same token. */
  tag?: string;
}

export interface PutOptions extends TagOptions {
  /**
   * Protects the registration from non-forced deletes. Scope teardown always
   * force-deletes, so a permanent registration owned by a scope is still removed
   * when that scope ends.
   */
  permanent?: boolean;
}

export interface LazyPutOptions extends TagOptions {
  /**
   * Resurrectable ("fenix"): deleting only drops the built instance and keeps
   * the builder, so the next `find` silently rebuilds it. This holds for forced
   * deletes too, which means scope teardown cannot fully remove a fenix
   * registration. Avoid fenix in scope-owned bindings that must disappear.
   */
  fenix?: boolean;
}

export interface DeleteOptions extends TagOptions {
  /** Ignore the `permanent` flag. */
  force?: boolean;
}

/**
 * Registration logic run inside a scope: either an object with a
 * `dependencies()` method or a plain function.
 *
 * @example
 * ```typescript
 * const HomeBinding: Binding = {
 *   dependencies(di) {
 *     di.lazyPut(HomeControllerT, () => new HomeController());
 *   },
 * };
 * ```
 */
export type Binding = { dependencies(injector: Injector): void } | ((injector: Injector) => void);

/**
 * Outcome of one scope teardown.
 *
 * Keys are reported by their display label (`Logger`, `Logger:tag`).
 */
export interface TeardownReport {
  /** Uninstall actions that completed during the immediate reverse-order pass */
  deleted: string[];
  /** Uninstall actions that threw; teardown carried on past each of them */
  failed: Array<{ key: string; error: Error }>;
  /** Keys whose async install was still running; deleted once it settles */
  lateHooked: string[];
  /** The bounded wait for in-flight installs elapsed */
  timedOut: boolean;
}

export interface LocatorConfig {
  /** Name used in log lines. @default 'Locator' */
  name?: string;
  /** @default console */
  logger?: Logger;
}

/**
 * Injector configuration passed to the constructor.
 */
export interface InjectorConfig {
  /** Name used in log lines. @default 'Injector' */
  name?: string;

  /**
   * Registry the injector writes through to.
   * @default a new Locator sharing this config's logger
   */
  locator?: RegistryAdapter;

  /**
   * How long teardown waits for in-flight async installs before falling back
   * to late hooks.
   * @default 300
   */
  disposeWaitMs?: number;

  /**
   * How long a `putAsync` borrower polls for the creator's registration
   * before failing with NotRegisteredError.
   * @default 3000
   */
  borrowTimeoutMs?: number;

  /** Poll interval for borrowers. @default 1 */
  borrowPollMs?: number;

  /** @default console */
  logger?: Logger;

  /**
   * Emit debug log lines (scope injected, key deleted, borrow).
   * @default process.env.NODE_ENV !== 'production'
   */
  debug?: boolean;
}
