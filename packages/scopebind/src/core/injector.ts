/* Injector
 *
 * Scope-aware facade over a RegistryAdapter.
 *
 * Every registration goes straight to the registry. When a scope is active
 * and the call actually created the registration, the scope records
 * ownership so its teardown deletes exactly what it created:
 *
 *  - A key that already exists is borrowed, never adopted.
 *  - putAsync() goes through the RaceCoordinator: the first caller for a key
 *    builds and owns it, later callers wait for that build and share its
 *    result.
 *  - A synchronous put/lazyPut/create on a key whose async install is still
 *    running registers without claiming ownership when a scope owns that
 *    install. An install started outside any scope owns nothing, so the
 *    registering scope claims the key.
 *  - Injectors over the same registry share one RaceCoordinator.
 *
 * Scope lifecycle (driven by BindingScope or any host):
 *
 *   const scope = injector.beginScope('Home');
 *   injector.runBody(scope, (di) => di.lazyPut(HomeT, () => new Home()));
 *   ...
 *   await injector.endScope(scope);
 */
import { AsyncBuildError, InvalidInjectorConfigError, NotRegisteredError, ScopeBodyError } from '../errors/errors.js';
import type {
  AsyncBuilder,
  Builder,
  DeleteOptions,
  InjectorConfig,
  LazyPutOptions,
  Logger,
  PutOptions,
  TagOptions,
  TeardownReport,
} from '../types/types.js';
import { IS_PROD } from './env.js';
import { describeKey, keyOf, type Key } from './key.js';
import { Locator, type RegistryAdapter } from './locator.js';
import { gateLogger } from './log.js';
import { coordinatorFor, type RaceCoordinator } from './race-coordinator.js';
import { ScopeContext } from './scope-context.js';
import { ScopeRecorder, type Uninstall } from './scope-recorder.js';
import { sleep } from './timing.js';
import type { Token } from './token.js';

type ResolvedConfig = Readonly<{
  name: string;
  disposeWaitMs: number;
  borrowTimeoutMs: number;
  borrowPollMs: number;
  debug: boolean;
}>;

function checkDuration(field: string, value: number, allowZero: boolean): number {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new InvalidInjectorConfigError(
      `${field} must be a finite number ${allowZero ? '>= 0' : '> 0'}, got ${String(value)}`
    );
  }
  return value;
}

function resolveConfig(config: InjectorConfig): ResolvedConfig {
  const name = config.name ?? 'Injector';
  if (name.trim() === '') throw new InvalidInjectorConfigError('name must not be empty');

  return Object.freeze({
    name,
    disposeWaitMs: checkDuration('disposeWaitMs', config.disposeWaitMs ?? 300, true),
    borrowTimeoutMs: checkDuration('borrowTimeoutMs', config.borrowTimeoutMs ?? 3000, true),
    borrowPollMs: checkDuration('borrowPollMs', config.borrowPollMs ?? 1, false),
    debug: config.debug ?? !IS_PROD,
  });
}

export class Injector {
  private static sharedInstance?: Injector;

  /** Registry every registration is written to. */
  readonly locator: RegistryAdapter;
  readonly config: ResolvedConfig;

  private readonly logger: Logger;
  private readonly context = new ScopeContext();
  private readonly races: RaceCoordinator;

  /**
   * @throws {InvalidInjectorConfigError} if a duration is negative or not finite,
   *   or the name is empty
   */
  constructor(config: InjectorConfig = {}) {
    this.config = resolveConfig(config);
    this.logger = gateLogger(config.logger ?? console, this.config.debug);
    this.locator = config.locator ?? new Locator({ name: this.config.name, logger: this.logger });
    this.races = coordinatorFor(this.locator);
  }

  /** Process-wide injector, created on first use. */
  static shared(): Injector {
    Injector.sharedInstance ??= new Injector();
    return Injector.sharedInstance;
  }

  /** Drop the process-wide injector; the next shared() call starts empty. */
  static resetShared(): void {
    Injector.sharedInstance = undefined;
  }

  get name(): string {
    return this.config.name;
  }

  /** Recorder that registrations are attributed to right now, if any. */
  get currentScope(): ScopeRecorder | undefined {
    return this.context.current;
  }

  /**
   * Register `instance` unless the key is taken.
   *
   * @returns the instance now resolvable for the key: `instance`, or the
   *   registration that was already there
   */
  put<T>(token: Token<T>, instance: T, options: PutOptions = {}): T {
    const key = keyOf(token, options.tag);
    if (this.locator.exists(key)) return this.locator.resolve(key);

    const value = this.locator.registerInstance(key, instance, { permanent: options.permanent });
    this.claim(key);
    return value;
  }

  /** Register a builder that runs on the first find() and is cached. No-op if the key is taken. */
  lazyPut<T>(token: Token<T>, builder: Builder<T>, options: LazyPutOptions = {}): void {
    const key = keyOf(token, options.tag);
    if (this.locator.registerLazy(key, builder, { fenix: options.fenix })) this.claim(key);
  }

  /** Register a builder that runs on every find(). No-op if the key is taken. */
  create<T>(token: Token<T>, builder: Builder<T>, options: TagOptions = {}): void {
    const key = keyOf(token, options.tag);
    if (this.locator.registerFactory(key, builder)) this.claim(key);
  }

  /**
   * Build and register a value asynchronously.
   *
   * The first caller for a key builds it. Callers arriving while that build
   * runs wait for it and receive the same instance; callers arriving after it
   * registered get the registration directly.
   *
   * @throws {AsyncBuildError} to the building caller if `builder` fails
   * @throws {NotRegisteredError} to a waiting caller if the build failed and
   *   nothing was registered within `borrowTimeoutMs` after it settled
   */
  async putAsync<T>(token: Token<T>, builder: AsyncBuilder<T>, options: PutOptions = {}): Promise<T> {
    const key = keyOf(token, options.tag);
    const scope = this.context.current;
    const ticket = this.races.beginInstall(key, this.locator, scope);
    if (!ticket.isCreator) return this.borrow(key, ticket.wait);

    // Own before awaiting: a scope that ends mid-build still cleans up the result
    scope?.ownInstance(key, this.uninstallFor(key));

    const install = this.locator.registerAsync(key, builder, { permanent: options.permanent });
    scope?.trackInFlight(key, install);

    try {
      return await install;
    } catch (error) {
      throw new AsyncBuildError(describeKey(key), error);
    } finally {
      ticket.release();
    }
  }

  /**
   * @throws {NotRegisteredError} if nothing is registered for the key
   * @throws {FactoryExecutionError} if a lazy or factory builder throws
   */
  find<T>(token: Token<T>, options: TagOptions = {}): T {
    return this.locator.resolve(keyOf(token, options.tag));
  }

  isRegistered(token: Token, options: TagOptions = {}): boolean {
    return this.locator.exists(keyOf(token, options.tag));
  }

  /**
   * Delete a registration outside of any scope teardown.
   *
   * @returns false if nothing was registered or a permanent key was not forced
   */
  delete(token: Token, options: DeleteOptions = {}): Promise<boolean> {
    return this.locator.delete(keyOf(token, options.tag), { force: options.force });
  }

  /** Create a recorder for a new scope. Activate it with runBody(). */
  beginScope(name = 'Scope'): ScopeRecorder {
    return new ScopeRecorder(name, {
      disposeWaitMs: this.config.disposeWaitMs,
      logger: this.logger,
    });
  }

  /**
   * Run `body` with `scope` active, then restore whatever was active before.
   *
   * A throwing body is logged as a ScopeBodyError and never rethrown; the
   * scope keeps what it registered before the throw. A rejected promise
   * returned by `body` is logged the same way. Only the synchronous part of
   * `body` is attributed to `scope`.
   *
   * @returns false if the body threw or the scope already ended
   */
  runBody(scope: ScopeRecorder, body: (injector: Injector) => unknown): boolean {
    if (scope.isDisposed) {
      this.logger.warn(`[scopebind:${this.name}] Scope '${scope.name}' already ended; body skipped`);
      return false;
    }

    try {
      const result = this.context.run(scope, () => body(this));
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.reportBodyFailure(scope, error));
      }
      this.logger.debug(`[scopebind:${this.name}] Scope '${scope.name}' injected`);
      return true;
    } catch (error) {
      this.reportBodyFailure(scope, error);
      return false;
    }
  }

  /**
   * Tear down everything `scope` created. Safe to call more than once: every
   * call returns the same report.
   */
  endScope(scope: ScopeRecorder): Promise<TeardownReport> {
    if (!scope.isDisposed) {
      this.logger.debug(`[scopebind:${this.name}] Scope '${scope.name}' ending`);
    }
    return scope.disposeOwned();
  }

  /** Record ownership for a key the active scope just created. */
  private claim(key: Key): void {
    const scope = this.context.current;
    if (scope === undefined || this.races.ownerOf(key) !== undefined) return;
    scope.ownInstance(key, this.uninstallFor(key));
  }

  private uninstallFor(key: Key): Uninstall {
    return async () => {
      const deleted = await this.locator.delete(key, { force: true });
      if (deleted) this.logger.debug(`[scopebind:${this.name}] Deleted ${describeKey(key)}`);
      return deleted;
    };
  }

  /**
   * Wait for another caller's install of `key`, then resolve it. The creator
   * always releases, so the wait itself is unbounded; `borrowTimeoutMs` bounds
   * the registry poll that follows.
   */
  private async borrow<T>(key: Key<T>, wait: Promise<void> | undefined): Promise<T> {
    const { borrowTimeoutMs, borrowPollMs } = this.config;

    if (wait) {
      this.logger.debug(`[scopebind:${this.name}] Waiting for in-flight ${describeKey(key)}`);
      await wait;
    }

    const started = Date.now();

    while (!this.locator.exists(key)) {
      const waited = Date.now() - started;
      if (waited >= borrowTimeoutMs) {
        throw new NotRegisteredError(describeKey(key), this.locator.keys(), waited);
      }
      await sleep(Math.min(borrowPollMs, borrowTimeoutMs - waited));
    }
    return this.locator.resolve(key);
  }

  private reportBodyFailure(scope: ScopeRecorder, cause: unknown): void {
    const failure = new ScopeBodyError(scope.name, cause);
    this.logger.error(`[scopebind:${this.name}] ${failure.message}`, failure);
  }
}
