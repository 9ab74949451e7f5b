import { describe, expect, it } from 'vitest';

import { SAMPLE_DESCRIPTION } from '../configuration/constants.js';
import { createKeyValues, createLookupTables } from './lookup-tables.js';

describe('createLookupTables', () => {
  it('should hold exactly one entry per table', () => {
    const tables = createLookupTables();

    expect(tables.text.size).toBe(1);
    expect(tables.interned.size).toBe(1);
    expect(tables.integer.size).toBe(1);
  });

  it('should map every key kind to the description', () => {
    const tables = createLookupTables('X');

    expect(tables.text.get('ruby')).toBe('X');
    expect(tables.interned.get(Symbol.for('ruby'))).toBe('X');
    expect(tables.integer.get(1)).toBe('X');
  });

  it('should not find a unique symbol with the same description', () => {
    const tables = createLookupTables();

    expect(tables.interned.get(Symbol('ruby'))).toBeUndefined();
  });

  it('should hold keys equal to the table keys', () => {
    const tables = createLookupTables();
    const keys = createKeyValues();

    expect(tables.text.get(keys.text)).toBe(SAMPLE_DESCRIPTION);
    expect(tables.interned.get(keys.interned)).toBe(SAMPLE_DESCRIPTION);
    expect(tables.integer.get(keys.integer)).toBe(SAMPLE_DESCRIPTION);
  });
});
