import { describe, expect, it } from 'vitest';

import {
  AsyncBuildError,
  BindingScope,
  Injector,
  Locator,
  NotRegisteredError,
  RaceCoordinator,
  ScopeContext,
  ScopeRecorder,
  isToken,
  keyOf,
  token,
} from '../src/index.js';
import { BindingScope as BindingScopeImpl } from '../src/api/binding-scope.js';
import { Injector as InjectorImpl } from '../src/core/injector.js';
import { Locator as LocatorImpl } from '../src/core/locator.js';
import { ScopeRecorder as ScopeRecorderImpl } from '../src/core/scope-recorder.js';
import { NotRegisteredError as NotRegisteredErrorImpl } from '../src/errors/errors.js';

describe('package public index', () => {
  it('re-exports the public api surface', () => {
    expect(Injector).toBe(InjectorImpl);
    expect(BindingScope).toBe(BindingScopeImpl);
    expect(Locator).toBe(LocatorImpl);
    expect(ScopeRecorder).toBe(ScopeRecorderImpl);
    expect(NotRegisteredError).toBe(NotRegisteredErrorImpl);
    expect(typeof RaceCoordinator).toBe('function');
    expect(typeof ScopeContext).toBe('function');
    expect(typeof AsyncBuildError).toBe('function');
    expect(isToken(token('Exported'))).toBe(true);
    expect(keyOf(token('Exported'), 'x').tag).toBe('x');
  });
});
