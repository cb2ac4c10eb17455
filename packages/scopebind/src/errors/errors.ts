import { IS_PROD } from '../core/env.js';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);

/**
 * Lookup of a key that has no registration.
 *
 * Raised by `find`, and by a `putAsync` borrower whose creator failed or did
 * not register within the borrow timeout (`waitedMs` is set in that case).
 */
export class NotRegisteredError extends Error {
  constructor(
    public key: string,
    public available: string[],
    public waitedMs?: number
  ) {
    const parts: string[] = [`'${key}' is not registered.`, ''];

    if (waitedMs !== undefined) {
      parts.push(
        `Waited ${waitedMs}ms for another caller's asynchronous install of '${key}'.`,
        'That install failed or never registered the key.',
        ''
      );
    }

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered keys:');
      available.forEach((k) => parts.push(`  - ${k}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} keys are registered.`, '');
    }

    parts.push(
      'To fix this:',
      `  1. Register '${key}' with put/lazyPut/create/putAsync before resolving it`,
      `  2. Check that the tag matches the one used at registration`,
      `  3. Make sure the scope that owned '${key}' has not already ended`
    );

    super(format(`'${key}' is not registered.`, parts));
    this.name = 'NotRegisteredError';
  }
}

/**
 * The asynchronous builder passed to `putAsync` rejected or threw.
 * Only the creator sees this error; borrowers see {@link NotRegisteredError}.
 */
export class AsyncBuildError extends Error {
  constructor(
    public key: string,
    cause: unknown
  ) {
    const dev = [
      'Asynchronous build failed',
      '',
      `Builder for '${key}' failed: ${describeCause(cause)}`,
      '',
      `Nothing was registered for '${key}'. Callers waiting on this install will`,
      `fail with NotRegisteredError. See 'cause' for the original error.`,
    ];
    super(format(`Asynchronous build of '${key}' failed.`, dev), { cause });
    this.name = 'AsyncBuildError';
  }
}

export class FactoryExecutionError extends Error {
  constructor(
    public key: string,
    cause: unknown
  ) {
    const dev = [
      'Factory execution failed',
      '',
      `Factory for '${key}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${key}' failed during creation.`, dev), { cause });
    this.name = 'FactoryExecutionError';
  }
}

/**
 * A scope body threw while registering. Logged at the runBody boundary and
 * never rethrown: the scope keeps whatever it registered before the throw.
 */
export class ScopeBodyError extends Error {
  constructor(
    public scopeName: string,
    cause: unknown
  ) {
    const dev = [
      `Scope '${scopeName}' body failed`,
      '',
      `${describeCause(cause)}`,
      '',
      'Registrations made before the failure stay owned by the scope and are',
      'removed when it ends.',
    ];
    super(format(`Scope '${scopeName}' body failed.`, dev), { cause });
    this.name = 'ScopeBodyError';
  }
}

/**
 * One uninstall action failed during teardown. The remaining keys are still
 * deleted; this error only reaches the logger and the teardown report.
 */
export class TeardownError extends Error {
  constructor(
    public key: string,
    cause: unknown
  ) {
    const dev = ['Teardown failed', '', `Deleting '${key}' failed: ${describeCause(cause)}`];
    super(format(`Deleting '${key}' failed.`, dev), { cause });
    this.name = 'TeardownError';
  }
}

export class InvalidTokenError extends Error {
  constructor(public token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token) ?? String(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid token parameter',
      '',
      `Expected a token created with token<T>('Name').`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];

    super(format('Invalid token parameter.', dev));
    this.name = 'InvalidTokenError';
  }
}

export class InvalidInjectorConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid injector configuration', '', `Invalid injector configuration: ${reason}`];
    super(format(`Invalid injector configuration: ${reason}`, dev));
    this.name = 'InvalidInjectorConfigError';
  }
}
