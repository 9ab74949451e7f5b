import { handleError, toError } from '../errors/error-handler.js';
import { parseArguments, USAGE } from './cli-options.js';
import { BenchmarkRunner, type BenchmarkRunnerOptions } from './runner.js';

/**
 * Run the benchmark for the given arguments and return the process exit code.
 *
 * `defaults` seed the runner; command line flags take precedence over them.
 */
export function runCli(args: readonly string[], defaults: BenchmarkRunnerOptions = {}): number {
  try {
    const options = parseArguments(args);

    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const runner = new BenchmarkRunner({
      ...defaults,
      outputFormat: options.format,
      ...(options.iterations !== undefined && { iterations: options.iterations }),
    });
    runner.run();
    return 0;
  } catch (error) {
    handleError(toError(error));
    return 1;
  }
}
