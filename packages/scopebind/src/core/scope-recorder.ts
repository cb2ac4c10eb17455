/* ScopeRecorder
 *
 * Per-scope ownership bookkeeping and teardown.
 *
 * A recorder knows which keys its scope created (and therefore must delete),
 * in which order it created them, and which of them are still being built
 * asynchronously. It never decides ownership itself: the injector calls
 * ownInstance() only when the scope actually created the registration.
 *
 * Invariants:
 *  - At most one ownership record per key. Re-owning a key replaces its
 *    uninstall action but keeps its first-seen position.
 *  - Tracked installs leave the in-flight map as soon as they settle.
 *  - disposeOwned() runs its phases once; later calls return the same report.
 *
 * Teardown (disposeOwned):
 *  1. Wait up to `disposeWaitMs` for tracked installs to settle. Elapsing is
 *     not an error.
 *  2. For every install still running, hook its uninstall to run when it
 *     settles, so a registration that lands after the scope ended is still
 *     removed.
 *  3. Run every uninstall in reverse creation order. Later registrations may
 *     depend on earlier ones, so each teardown hook still sees its
 *     dependencies. A failing uninstall is logged and reported; the rest still
 *     run.
 *
 * Callers may fire-and-forget disposeOwned(); the phases run in order
 * regardless.
 */
import { TeardownError } from '../errors/errors.js';
import type { Logger, TeardownReport } from '../types/types.js';
import { describeKey, type Key, type KeyId } from './key.js';
import { settlesWithin } from './timing.js';

/** Deletes one owned registration; resolves true if something was removed. */
export type Uninstall = () => Promise<boolean>;

type OwnershipRecord = {
  key: Key;
  uninstall: Uninstall;
  sequenceIndex: number;
};

type TrackedInstall = {
  promise: Promise<void>;
};

export interface ScopeRecorderOptions {
  /** @default 300 */
  disposeWaitMs?: number;
  /** @default console */
  logger?: Logger;
}

const DEFAULT_DISPOSE_WAIT_MS = 300;

const settleQuietly = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined
  );

export class ScopeRecorder {
  readonly name: string;

  private readonly records = new Map<KeyId, OwnershipRecord>();
  private readonly order: KeyId[] = [];
  private readonly inFlight = new Map<KeyId, TrackedInstall>();
  private readonly disposeWaitMs: number;
  private readonly logger: Logger;

  /** Set on the first disposeOwned() call. */
  private teardown?: Promise<TeardownReport>;

  constructor(name = 'Scope', options: ScopeRecorderOptions = {}) {
    this.name = name;
    this.disposeWaitMs = options.disposeWaitMs ?? DEFAULT_DISPOSE_WAIT_MS;
    this.logger = options.logger ?? console;
  }

  get isDisposed(): boolean {
    return this.teardown !== undefined;
  }

  /** Number of tracked installs that have not settled yet. */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  owns(key: Key): boolean {
    return this.records.has(key.id);
  }

  /** Labels of owned keys in creation order. */
  ownedKeys(): string[] {
    return this.order.map((id) => {
      const record = this.records.get(id);
      return record ? describeKey(record.key) : id;
    });
  }

  /**
   * Mark `key` as created by this scope.
   *
   * If teardown already started, the key is removed once teardown finishes so
   * the registration cannot outlive its scope.
   */
  ownInstance(key: Key, uninstall: Uninstall): void {
    const existing = this.records.get(key.id);
    if (existing) {
      existing.uninstall = uninstall;
      return;
    }

    const record: OwnershipRecord = { key, uninstall, sequenceIndex: this.order.length };
    this.records.set(key.id, record);
    this.order.push(key.id);

    if (this.teardown) {
      this.logger.warn(
        `[scopebind] '${describeKey(key)}' registered after scope '${this.name}' ended; deleting it`
      );
      this.hookLate(record, this.teardown);
    }
  }

  /**
   * Associate a pending asynchronous install with `key`. Rejections are
   * swallowed here: the creator reports build failures to its own caller.
   */
  trackInFlight(key: Key, promise: Promise<unknown>): void {
    const tracked: TrackedInstall = { promise: settleQuietly(promise) };
    this.inFlight.set(key.id, tracked);

    void tracked.promise.then(() => {
      if (this.inFlight.get(key.id) === tracked) this.inFlight.delete(key.id);
    });

    const record = this.records.get(key.id);
    if (this.teardown && record) this.hookLate(record, tracked.promise);
  }

  /** Resolves once every currently tracked install has settled. */
  async whenSettled(): Promise<void> {
    if (this.inFlight.size === 0) return;
    await Promise.all(Array.from(this.inFlight.values(), (t) => t.promise));
  }

  disposeOwned(): Promise<TeardownReport> {
    this.teardown ??= this.runTeardown();
    return this.teardown;
  }

  private async runTeardown(): Promise<TeardownReport> {
    const report: TeardownReport = { deleted: [], failed: [], lateHooked: [], timedOut: false };

    // 1) Bounded wait for installs to finish
    if (!(await this.waitForInstalls())) {
      report.timedOut = true;
      this.logger.warn(
        `[scopebind] Scope '${this.name}': timed out after ${this.disposeWaitMs}ms waiting for ` +
          `${this.inFlight.size} async registration(s), continuing teardown`
      );
    }

    // 2) Delete late-finishing installs when they finish
    for (const [id, tracked] of this.inFlight) {
      const record = this.records.get(id);
      if (!record) continue;
      report.lateHooked.push(describeKey(record.key));
      this.hookLate(record, tracked.promise);
    }

    // 3) Delete now, newest first
    for (let i = this.order.length - 1; i >= 0; i--) {
      const record = this.records.get(this.order[i]);
      if (!record) continue;
      const label = describeKey(record.key);
      try {
        if (await record.uninstall()) report.deleted.push(label);
      } catch (error) {
        const failure = new TeardownError(label, error);
        this.logger.error(`[scopebind] Scope '${this.name}': ${failure.message}`, error);
        report.failed.push({ key: label, error: failure });
      }
    }

    return report;
  }

  /** @returns false if the wait elapsed before every install settled */
  private waitForInstalls(): Promise<boolean> {
    if (this.inFlight.size === 0) return Promise.resolve(true);
    return settlesWithin(this.whenSettled(), this.disposeWaitMs);
  }

  private hookLate(record: OwnershipRecord, after: Promise<unknown>): void {
    const label = describeKey(record.key);
    void after.then(async () => {
      try {
        if (await record.uninstall()) {
          this.logger.debug(`[scopebind] Scope '${this.name}': late delete of '${label}'`);
        }
      } catch (error) {
        this.logger.error(`[scopebind] Scope '${this.name}': late delete of '${label}' failed`, error);
      }
    });
  }
}
