/*
 * ScopeContext
 *
 * Holds the recorder that registrations are currently attributed to.
 *
 * Each injector owns one context. The slot only changes through paired
 * activate()/restore() calls, so nested scopes unwind to their parent. There
 * is no async propagation: code that runs after a body returns (a timer, an
 * awaited continuation) sees whichever recorder is active at that moment.
 */
import type { ScopeRecorder } from './scope-recorder.js';

export class ScopeContext {
  private active: ScopeRecorder | undefined;

  get current(): ScopeRecorder | undefined {
    return this.active;
  }

  /** @returns the previously active recorder, to hand back to restore() */
  activate(recorder: ScopeRecorder): ScopeRecorder | undefined {
    const previous = this.active;
    this.active = recorder;
    return previous;
  }

  restore(previous: ScopeRecorder | undefined): void {
    this.active = previous;
  }

  /** Run `body` with `recorder` active. The previous recorder is restored even if `body` throws. */
  run<R>(recorder: ScopeRecorder, body: () => R): R {
    const previous = this.activate(recorder);
    try {
      return body();
    } finally {
      this.restore(previous);
    }
  }
}
