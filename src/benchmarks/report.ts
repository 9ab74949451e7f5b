/**
 * Rendering of benchmark results for the console, JSON and CSV outputs
 */

import {
  KEY_KIND_LABELS,
  type BenchmarkSummary,
  type IdentityObservation,
  type ScenarioResult,
  type TimingResult,
} from '../core/types.js';

export function formatDuration(milliseconds: number): string {
  return `${milliseconds.toFixed(3)}ms`;
}

export function formatTimingLine(result: TimingResult): string {
  return `${result.label}: ${formatDuration(result.elapsed)}`;
}

export function formatIdentityLine(observation: IdentityObservation): string {
  return `${KEY_KIND_LABELS[observation.kind]}: ${observation.first} vs ${observation.second}`;
}

export function operationsPerSecond(iterations: number, elapsed: number): number {
  return elapsed > 0 ? (iterations / elapsed) * 1000 : 0;
}

/**
 * Ratio of each result's elapsed time to the fastest one; 1 for the fastest.
 * When the fastest measured no time, a ratio is undefined for every result
 * that did take time, and those get `null`.
 */
export function relativeToFastest(results: readonly TimingResult[]): Array<number | null> {
  if (results.length === 0) {
    return [];
  }
  const fastest = Math.min(...results.map((r) => r.elapsed));
  return results.map((r) => {
    if (fastest > 0) {
      return r.elapsed / fastest;
    }
    return r.elapsed === 0 ? 1 : null;
  });
}

export function toJSONReport(
  summary: BenchmarkSummary,
  timestamp: Date = new Date(),
): string {
  const ratios = relativeToFastest(summary.results);
  const output = {
    timestamp: timestamp.toISOString(),
    iterations: summary.iterations,
    results: summary.results.map((result, i) => ({
      ...result,
      relativeToFastest: ratios[i] ?? null,
    })),
    identity: summary.identity.map((observation) => ({
      ...observation,
      label: KEY_KIND_LABELS[observation.kind],
      sameIdentity: observation.first === observation.second,
    })),
    environment: {
      platform: process.platform,
      nodeVersion: process.version,
    },
  };

  return JSON.stringify(output, null, 2);
}

export function toCSVReport(results: readonly ScenarioResult[]): string {
  const headers = ['label', 'kind', 'source', 'iterations', 'elapsedMs', 'operationsPerSecond'];

  const rows = results.map((result) => [
    result.label,
    result.kind,
    result.source,
    result.iterations.toString(),
    result.elapsed.toString(),
    result.operationsPerSecond.toString(),
  ]);

  return [headers.join(','), ...rows.map((row) => row.map((cell) => `"${cell}"`).join(','))].join(
    '\n',
  );
}
