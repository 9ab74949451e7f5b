/**
 * Key lookup benchmarking
 */

export { BenchmarkRunner, type BenchmarkRunnerOptions } from './runner.js';
export { runCli } from './cli.js';
export { parseArguments, USAGE, type CliOptions } from './cli-options.js';
export {
  formatDuration,
  formatIdentityLine,
  formatTimingLine,
  relativeToFastest,
  toCSVReport,
  toJSONReport,
} from './report.js';
