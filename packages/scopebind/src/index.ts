export { BindingScope } from './api/binding-scope.js';

export { Injector } from './core/injector.js';
export { Locator } from './core/locator.js';
export type { RegistryAdapter } from './core/locator.js';
export { RaceCoordinator } from './core/race-coordinator.js';
export type { InstallTicket } from './core/race-coordinator.js';
export { ScopeContext } from './core/scope-context.js';
export { ScopeRecorder } from './core/scope-recorder.js';
export type { ScopeRecorderOptions, Uninstall } from './core/scope-recorder.js';
export { describeKey, keyOf } from './core/key.js';
export type { Key, KeyId } from './core/key.js';
export * from './core/token.js';

export type {
  AsyncBuilder,
  Binding,
  Builder,
  Closeable,
  DeleteOptions,
  InjectorConfig,
  LazyPutOptions,
  Logger,
  LocatorConfig,
  PutOptions,
  TagOptions,
  TeardownReport,
} from './types/types.js';

// Errors
export {
  AsyncBuildError,
  FactoryExecutionError,
  InvalidInjectorConfigError,
  InvalidTokenError,
  NotRegisteredError,
  ScopeBodyError,
  TeardownError,
} from './errors/errors.js';
