/**
 * Core types for the key lookup benchmark
 */

import type { OUTPUT_FORMATS } from '../configuration/constants.js';

/** How a key compares: by content, by registry identity, or numerically */
export type KeyKind = 'text' | 'interned' | 'integer';

/** Where the key comes from at the call site */
export type KeySource = 'literal' | 'variable';

export const KEY_KINDS: readonly KeyKind[] = ['text', 'interned', 'integer'];

export const KEY_KIND_LABELS: Readonly<Record<KeyKind, string>> = {
  text: 'String',
  interned: 'Symbol',
  integer: 'Integer',
};

/** Runtime representation of each key kind */
export interface KeyTypes {
  text: string;
  interned: symbol;
  integer: number;
}

export type LookupTable<K extends KeyKind> = ReadonlyMap<KeyTypes[K], string>;

export type LookupTables = { readonly [K in KeyKind]: LookupTable<K> };

export type KeyValues = { readonly [K in KeyKind]: KeyTypes[K] };

/** A zero-argument closure performing exactly one table lookup */
export type Lookup = () => unknown;

export interface Scenario {
  label: string;
  kind: KeyKind;
  source: KeySource;
  lookup: Lookup;
}

export interface TimingResult {
  label: string;
  /** Total elapsed milliseconds across all iterations */
  elapsed: number;
  iterations: number;
}

export interface ScenarioResult extends TimingResult {
  kind: KeyKind;
  source: KeySource;
  operationsPerSecond: number;
}

export interface IdentityObservation {
  kind: KeyKind;
  first: number;
  second: number;
}

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface BenchmarkSummary {
  iterations: number;
  results: ScenarioResult[];
  identity: IdentityObservation[];
}
