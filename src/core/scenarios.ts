import type { KeyValues, LookupTables, Scenario } from './types.js';

/**
 * The six timed scenarios, in report order.
 *
 * Literal lookups spell the key out at the call site on every call; for the
 * interned kind that means a trip through the global symbol registry each time.
 * Variable lookups reuse keys built once up front.
 */
export function createScenarios(tables: LookupTables, keys: KeyValues): Scenario[] {
  return [
    {
      label: 'literal string key',
      kind: 'text',
      source: 'literal',
      lookup: () => tables.text.get('ruby'),
    },
    {
      label: 'literal symbol key',
      kind: 'interned',
      source: 'literal',
      lookup: () => tables.interned.get(Symbol.for('ruby')),
    },
    {
      label: 'literal integer key',
      kind: 'integer',
      source: 'literal',
      lookup: () => tables.integer.get(1),
    },
    {
      label: 'variable string key',
      kind: 'text',
      source: 'variable',
      lookup: () => tables.text.get(keys.text),
    },
    {
      label: 'variable symbol key',
      kind: 'interned',
      source: 'variable',
      lookup: () => tables.interned.get(keys.interned),
    },
    {
      label: 'variable integer key',
      kind: 'integer',
      source: 'variable',
      lookup: () => tables.integer.get(keys.integer),
    },
  ];
}
