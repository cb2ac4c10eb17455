import type { ScopeRecorder } from '../core/scope-recorder.js';
import type { Injector } from '../core/injector.js';
import type { Binding, TeardownReport } from '../types/types.js';

/**
 * Mount/unmount lifecycle around one {@link Binding}.
 *
 * `mount()` runs the binding's registrations inside a fresh scope;
 * `unmount()` starts that scope's teardown without waiting for it. Hosts that
 * need to know when teardown finished (tests, shutdown hooks) await
 * `whenDisposed()`.
 *
 * @example
 * ```typescript
 * const home = new BindingScope(injector, HomeBinding, { name: 'Home' });
 * home.mount();
 * // ... screen in use ...
 * home.unmount();
 * await home.whenDisposed();
 * ```
 */
export class BindingScope {
  readonly name: string;

  private recorder?: ScopeRecorder;
  private unmounted = false;
  private resolveDisposed: (report: TeardownReport) => void = () => undefined;
  private readonly disposed: Promise<TeardownReport>;

  constructor(
    private readonly injector: Injector,
    private readonly binding: Binding,
    options: { name?: string } = {}
  ) {
    this.name = options.name ?? 'BindingScope';
    this.disposed = new Promise((resolve) => {
      this.resolveDisposed = resolve;
    });
  }

  get isMounted(): boolean {
    return this.recorder !== undefined && !this.unmounted;
  }

  /** Keys this scope created, in creation order. */
  ownedKeys(): string[] {
    return this.recorder?.ownedKeys() ?? [];
  }

  /**
   * Run the binding with a new scope active.
   *
   * @returns false if the binding threw (the scope still mounts with whatever
   *   it registered first) or this scope was mounted before
   */
  mount(): boolean {
    if (this.recorder) return false;

    const recorder = this.injector.beginScope(this.name);
    this.recorder = recorder;
    const binding = this.binding;
    return this.injector.runBody(recorder, (di) =>
      typeof binding === 'function' ? binding(di) : binding.dependencies(di)
    );
  }

  /** Start teardown and return immediately. Repeated calls are ignored. */
  unmount(): void {
    if (this.recorder === undefined || this.unmounted) return;
    this.unmounted = true;
    void this.injector.endScope(this.recorder).then(this.resolveDisposed);
  }

  /** Resolves with the teardown report once an unmount() has finished. */
  whenDisposed(): Promise<TeardownReport> {
    return this.disposed;
  }
}
