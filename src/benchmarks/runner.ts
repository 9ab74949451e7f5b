/**
 * Benchmark runner and report output
 */

import { environment } from '../configuration/environment.js';
import { IdentityTracker, observeAllIdentities } from '../core/identity.js';
import { createKeyValues, createLookupTables } from '../core/lookup-tables.js';
import { createScenarios } from '../core/scenarios.js';
import type {
  BenchmarkSummary,
  IdentityObservation,
  Lookup,
  OutputFormat,
  Scenario,
  ScenarioResult,
  TimingResult,
} from '../core/types.js';
import { InternalError, ValidationError } from '../errors/custom-errors.js';
import { toError } from '../errors/error-handler.js';
import { log, stderrLog, type Logger } from '../utilities/logger.js';
import {
  formatIdentityLine,
  formatTimingLine,
  operationsPerSecond,
  toCSVReport,
  toJSONReport,
} from './report.js';

export interface BenchmarkRunnerOptions {
  /** Lookups per scenario; defaults to BENCH_ITERATIONS */
  iterations?: number;
  /** Output format */
  outputFormat?: OutputFormat;
  /** Monotonic clock in milliseconds */
  now?: () => number;
  /** Source of identity tokens for the diagnostics */
  tracker?: IdentityTracker;
  /** Defaults to stdout logging for console output and stderr logging otherwise */
  logger?: Logger;
}

function assertIterations(iterations: number): void {
  if (!Number.isSafeInteger(iterations) || iterations < 0) {
    throw new ValidationError(`Iterations must be a non-negative integer, got ${iterations}`, {
      iterations: ['Expected a non-negative integer'],
    });
  }
}

/**
 * Times table lookups per scenario and reports them alongside identity diagnostics
 */
export class BenchmarkRunner {
  private readonly iterations: number;
  private readonly outputFormat: OutputFormat;
  private readonly now: () => number;
  private readonly tracker: IdentityTracker;
  private readonly logger: Logger;
  private readonly results: TimingResult[] = [];
  /** Last lookup result, kept so the lookups stay observable */
  private sink: unknown;

  constructor(options: BenchmarkRunnerOptions = {}) {
    this.iterations = options.iterations ?? environment.BENCH_ITERATIONS;
    assertIterations(this.iterations);
    this.outputFormat = options.outputFormat ?? 'console';
    this.now = options.now ?? (() => performance.now());
    this.tracker = options.tracker ?? new IdentityTracker();
    this.logger = options.logger ?? (this.outputFormat === 'console' ? log : stderrLog);
  }

  /** Value returned by the most recent lookup */
  get lastResult(): unknown {
    return this.sink;
  }

  /** Results recorded so far, in run order */
  get timings(): readonly TimingResult[] {
    return this.results;
  }

  /**
   * Call `lookup` `iterations` times back to back and record the total elapsed time.
   */
  runScenario(label: string, iterations: number, lookup: Lookup): TimingResult {
    assertIterations(iterations);

    const start = this.now();
    try {
      for (let i = 0; i < iterations; i++) {
        this.sink = lookup();
      }
    } catch (error) {
      throw new InternalError(`Lookup failed in scenario "${label}"`, toError(error));
    }
    const elapsed = iterations === 0 ? 0 : Math.max(0, this.now() - start);

    const result: TimingResult = { label, elapsed, iterations };
    this.results.push(result);

    this.logger.debug('Scenario complete', { label, iterations, elapsed });

    return result;
  }

  /**
   * Run each scenario in order with the configured iteration count
   */
  runAll(scenarios: readonly Scenario[]): ScenarioResult[] {
    return scenarios.map((scenario) => {
      const timing = this.runScenario(scenario.label, this.iterations, scenario.lookup);
      return {
        ...timing,
        kind: scenario.kind,
        source: scenario.source,
        operationsPerSecond: operationsPerSecond(timing.iterations, timing.elapsed),
      };
    });
  }

  printReport(): void {
    for (const result of this.results) {
      console.log(formatTimingLine(result));
    }
  }

  observeIdentities(): IdentityObservation[] {
    return observeAllIdentities(this.tracker);
  }

  printIdentityDiagnostics(
    observations: readonly IdentityObservation[] = this.observeIdentities(),
  ): void {
    for (const observation of observations) {
      console.log(formatIdentityLine(observation));
    }
  }

  /**
   * Build the tables, time the six scenarios and write the report
   */
  run(): BenchmarkSummary {
    const tables = createLookupTables();
    const scenarios = createScenarios(tables, createKeyValues());

    this.logger.debug('Starting benchmark', {
      iterations: this.iterations,
      scenarios: scenarios.length,
      format: this.outputFormat,
    });

    const results = this.runAll(scenarios);
    const identity = this.observeIdentities();
    const summary: BenchmarkSummary = { iterations: this.iterations, results, identity };

    switch (this.outputFormat) {
      case 'json':
        console.log(toJSONReport(summary));
        break;
      case 'csv':
        console.log(toCSVReport(results));
        break;
      default:
        this.printReport();
        console.log();
        this.printIdentityDiagnostics(identity);
    }

    return summary;
  }
}
