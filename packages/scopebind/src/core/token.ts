/**
 * Branded type identifier carried by every token.
 * Keeps raw strings from being passed where a type id is expected.
 */
export type TypeId = string & { __brand: 'TypeId' };

declare const TOKEN_TYPE: unique symbol;

/**
 * Typed stand-in for a service type.
 *
 * A token plays the role a runtime type plays in reflective locators: it is the
 * logical "type" half of a registration key. The phantom parameter ties every
 * `put`/`find` call to the value type at compile time.
 *
 * @template T - The type of value registered under this token
 */
export interface Token<T = unknown> {
  readonly kind: 'token';

  /** Unique identifier (tok_1, tok_2, ...) */
  readonly id: TypeId;

  /** Human-readable name used in logs and error messages */
  readonly label: string;

  /** Phantom brand, never present at runtime */
  readonly [TOKEN_TYPE]: T;
}

let _tokCounter = 0;

/**
 * Create a new token.
 *
 * @param label - Name shown in diagnostics (defaults to "Token")
 *
 * @example
 * ```typescript
 * const LoggerT = token<Logger>('Logger');
 * injector.put(LoggerT, new Logger());
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  const resolvedLabel = label ?? 'Token';
  const id = `tok_${++_tokCounter}` as TypeId;
  return Object.freeze({ kind: 'token', id, label: resolvedLabel }) as Token<T>;
}

/**
 * Runtime guard for public entry points that accept tokens from untyped callers.
 */
export function isToken(x: unknown): x is Token<unknown> {
  if (typeof x !== 'object' || x === null) return false;
  const candidate = x as Partial<Token>;
  return (
    candidate.kind === 'token' &&
    typeof candidate.id === 'string' &&
    typeof candidate.label === 'string'
  );
}
