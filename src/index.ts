/**
 * Key lookup benchmark
 *
 * Times single-entry table lookups keyed by strings, registry symbols and
 * integers, and reports which equal-looking keys share an identity.
 */

export { BenchmarkRunner, type BenchmarkRunnerOptions } from './benchmarks/runner.js';
export { runCli } from './benchmarks/cli.js';
export { parseArguments, USAGE, type CliOptions } from './benchmarks/cli-options.js';
export {
  formatDuration,
  formatIdentityLine,
  formatTimingLine,
  operationsPerSecond,
  relativeToFastest,
  toCSVReport,
  toJSONReport,
} from './benchmarks/report.js';

export { createKeyValues, createLookupTables } from './core/lookup-tables.js';
export { createScenarios } from './core/scenarios.js';
export {
  IdentityTracker,
  literalFactories,
  observeAllIdentities,
  observeIdentity,
} from './core/identity.js';
export { KEY_KINDS, KEY_KIND_LABELS } from './core/types.js';
export type {
  BenchmarkSummary,
  IdentityObservation,
  KeyKind,
  KeySource,
  KeyTypes,
  KeyValues,
  Lookup,
  LookupTable,
  LookupTables,
  OutputFormat,
  Scenario,
  ScenarioResult,
  TimingResult,
} from './core/types.js';

export { BaseError, InternalError, ValidationError } from './errors/custom-errors.js';
export { handleError, isOperationalError, toError } from './errors/error-handler.js';
export { Logger, log, stderrLog, type LogLevel, type LoggerOptions } from './utilities/logger.js';
export { environment, type Environment } from './configuration/environment.js';
