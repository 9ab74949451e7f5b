import { SAMPLE_DESCRIPTION, SAMPLE_KEYS } from '../configuration/constants.js';
import type { KeyValues, LookupTables } from './types.js';

/**
 * Build one single-entry table per key kind, all mapping to the same description.
 */
export function createLookupTables(description: string = SAMPLE_DESCRIPTION): LookupTables {
  return {
    text: new Map<string, string>([[SAMPLE_KEYS.text, description]]),
    interned: new Map<symbol, string>([[Symbol.for(SAMPLE_KEYS.interned), description]]),
    integer: new Map<number, string>([[SAMPLE_KEYS.integer, description]]),
  };
}

/** Keys held in variables, equal to the ones the tables were built with */
export function createKeyValues(): KeyValues {
  return {
    text: SAMPLE_KEYS.text,
    interned: Symbol.for(SAMPLE_KEYS.interned),
    integer: SAMPLE_KEYS.integer,
  };
}
