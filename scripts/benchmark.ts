#!/usr/bin/env node

/**
 * Key lookup benchmark
 *
 * Usage:
 *   tsx scripts/benchmark.ts [options]
 *
 * Examples:
 *   tsx scripts/benchmark.ts                        # 1,000,000 lookups per scenario
 *   tsx scripts/benchmark.ts --iterations 10000
 *   tsx scripts/benchmark.ts --format csv
 */

import { runCli } from '../src/benchmarks/index.js';

process.exitCode = runCli(process.argv.slice(2));
