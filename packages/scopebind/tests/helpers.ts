import { vi } from 'vitest';

import { sleep } from '../src/core/timing.js';

/** Logger whose methods are spies, so tests can assert on log lines. */
export function createLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Poll `condition` until it holds or `timeoutMs` elapses. */
export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await sleep(2);
  }
}
