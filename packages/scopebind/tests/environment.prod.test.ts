import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger } from './helpers.js';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('uses terse error messages', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const errors = await import('../src/errors/errors.js');

    expect(new errors.NotRegisteredError('Logger', ['Cache'], 10).message).toBe(
      "'Logger' is not registered."
    );
    expect(new errors.AsyncBuildError('Db', new Error('x')).message).toBe(
      "Asynchronous build of 'Db' failed."
    );
    expect(new errors.FactoryExecutionError('Cache', new Error('x')).message).toBe(
      "Factory for 'Cache' failed during creation."
    );
    expect(new errors.ScopeBodyError('Home', new Error('x')).message).toBe("Scope 'Home' body failed.");
    expect(new errors.TeardownError('Repo', new Error('x')).message).toBe("Deleting 'Repo' failed.");
    expect(new errors.InvalidTokenError({}).message).toBe('Invalid token parameter.');
    expect(new errors.InvalidInjectorConfigError('bad').message).toBe(
      'Invalid injector configuration: bad'
    );
  });

  it('turns debug logging off by default', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { Injector } = await import('../src/core/injector.js');
    const { token } = await import('../src/core/token.js');
    const logger = createLogger();
    const injector = new Injector({ logger });
    const LoggerT = token<{ name: string }>('Logger');

    const scope = injector.beginScope('Home');
    injector.runBody(scope, (di) => di.put(LoggerT, { name: 'x' }));
    await injector.endScope(scope);

    expect(injector.config.debug).toBe(false);
    expect(logger.debug).not.toHaveBeenCalled();
    expect(injector.isRegistered(LoggerT)).toBe(false);
  });
});
