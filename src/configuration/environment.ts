import { z } from 'zod';

import { DEFAULT_ITERATIONS } from './constants.js';

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  ENABLE_DEBUG_LOGGING: z
    .string()
    .transform((val) => val === 'true')
    .pipe(z.boolean())
    .default('false'),
  BENCH_ITERATIONS: z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER))
    .default(String(DEFAULT_ITERATIONS)),
});

export type Environment = z.infer<typeof environmentSchema>;

export function validateEnvironment(env: Record<string, string | undefined> = {}): Environment {
  try {
    return environmentSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errorMessage = error.errors
        .map((err) => `${err.path.join('.')}: ${err.message}`)
        .join('\n');
      throw new Error(`Environment validation failed:\n${errorMessage}`);
    }
    throw error;
  }
}

export const environment = validateEnvironment(process.env);

export function isProduction(): boolean {
  return environment.NODE_ENV === 'production';
}

export function isTest(): boolean {
  return environment.NODE_ENV === 'test';
}
