/* Key
 *
 * A registration slot in the locator: a token (the logical type) plus an
 * optional tag that disambiguates several registrations of the same type.
 *
 * Canonical ids:
 *   untagged          -> tok_7
 *   tag 'primary'     -> tok_7::primary
 *   tag ''            -> tok_7::
 *
 * An absent tag and an empty tag are different slots.
 */
import { InvalidTokenError } from '../errors/errors.js';
import { isToken, type Token } from './token.js';

/** Canonical string form of a key, used for every map lookup. */
export type KeyId = string & { __brand: 'KeyId' };

export interface Key<T = unknown> {
  readonly token: Token<T>;
  readonly tag: string | undefined;
  readonly id: KeyId;
}

const TAG_SEPARATOR = '::';

/**
 * Build the key for a token and optional tag.
 *
 * @throws {InvalidTokenError} if `token` is not a token
 */
export function keyOf<T>(token: Token<T>, tag?: string): Key<T> {
  if (!isToken(token)) throw new InvalidTokenError(token);
  const id = (tag === undefined ? token.id : `${token.id}${TAG_SEPARATOR}${tag}`) as KeyId;
  return Object.freeze({ token, tag, id });
}

/** Label for logs: `Logger` or `Logger:primary`. */
export function describeKey(key: Key): string {
  return key.tag === undefined ? key.token.label : `${key.token.label}:${key.tag}`;
}
