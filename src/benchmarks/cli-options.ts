import { z } from 'zod';

import { OUTPUT_FORMATS } from '../configuration/constants.js';
import type { OutputFormat } from '../core/types.js';
import { ValidationError } from '../errors/custom-errors.js';

export interface CliOptions {
  format: OutputFormat;
  iterations?: number;
  help: boolean;
}

const VALUE_FLAGS = ['--iterations', '--format'] as const;
const KNOWN_FLAGS = new Set<string>([...VALUE_FLAGS, '--help', '-h']);

const cliOptionsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default('console'),
  iterations: z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER))
    .optional(),
  help: z.boolean(),
});

/**
 * Parse `process.argv.slice(2)` style arguments
 */
export function parseArguments(args: readonly string[]): CliOptions {
  const values: Partial<Record<(typeof VALUE_FLAGS)[number], string>> = {};
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (!KNOWN_FLAGS.has(arg)) {
      throw new ValidationError(`Unknown option: ${arg}`);
    }

    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new ValidationError(`Option ${arg} requires a value`);
    }
    if (arg === '--iterations' || arg === '--format') {
      values[arg] = value;
    }
    i++;
  }

  const result = cliOptionsSchema.safeParse({
    format: values['--format'],
    iterations: values['--iterations'],
    help,
  });

  if (!result.success) {
    const fields: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const key = issue.path.join('.');
      (fields[key] ??= []).push(issue.message);
    }
    throw new ValidationError('Invalid command line options', fields);
  }

  const { format, iterations } = result.data;
  return {
    format,
    help: result.data.help,
    ...(iterations !== undefined && { iterations }),
  };
}

export const USAGE = `
Key Lookup Benchmark

Usage: key-lookup-bench [options]

Options:
  --iterations <n>       Lookups per scenario (default: BENCH_ITERATIONS or 1000000)
  --format <format>      Output format (console, json, csv)
  --help, -h             Show this help message

Examples:
  key-lookup-bench
  key-lookup-bench --iterations 10000
  key-lookup-bench --format json
`.trim();
