import { SAMPLE_KEYS } from '../configuration/constants.js';
import { KEY_KINDS, type IdentityObservation, type KeyKind } from './types.js';

/**
 * Hands out opaque identity tokens.
 *
 * Objects get one token per object, held weakly. Primitives and symbols are
 * compared by value, so equal values share a token.
 */
export class IdentityTracker {
  private readonly objectTokens = new WeakMap<object, number>();
  private readonly valueTokens = new Map<unknown, number>();
  private nextToken = 1;

  tokenFor(value: unknown): number {
    if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
      let token = this.objectTokens.get(value);
      if (token === undefined) {
        token = this.nextToken++;
        this.objectTokens.set(value, token);
      }
      return token;
    }

    let token = this.valueTokens.get(value);
    if (token === undefined) {
      token = this.nextToken++;
      this.valueTokens.set(value, token);
    }
    return token;
  }
}

/**
 * Construct a fresh literal instance of each key kind.
 *
 * Text is boxed so that every instance is its own heap object, like a mutable
 * string buffer would be.
 */
export const literalFactories: Readonly<Record<KeyKind, () => unknown>> = {
  text: () => new String(SAMPLE_KEYS.text),
  interned: () => Symbol.for(SAMPLE_KEYS.interned),
  integer: () => SAMPLE_KEYS.integer,
};

export function observeIdentity(tracker: IdentityTracker, kind: KeyKind): IdentityObservation {
  const create = literalFactories[kind];
  return {
    kind,
    first: tracker.tokenFor(create()),
    second: tracker.tokenFor(create()),
  };
}

/** Two observations per key kind, in key kind order */
export function observeAllIdentities(
  tracker: IdentityTracker,
  repetitions = 2,
): IdentityObservation[] {
  const observations: IdentityObservation[] = [];
  for (const kind of KEY_KINDS) {
    for (let i = 0; i < repetitions; i++) {
      observations.push(observeIdentity(tracker, kind));
    }
  }
  return observations;
}
