/**
 * Configuration Module
 *
 * Loads and validates environment variables for paper-scout.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * The scoring core reads no configuration; these settings cover the
 * CLI, the arXiv source and the output location.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolve } from 'node:path';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Output directory for scored JSON/CSV files
  PAPER_SCOUT_OUT_DIR: z.string().optional(),

  // arXiv export API
  ARXIV_API_URL: z.string().url().default('http://export.arxiv.org/api/query'),
  ARXIV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from an environment.
 *
 * @param source - Environment variables (usually `process.env`)
 * @returns Validated configuration
 * @throws ZodError if a variable is present but invalid
 */
export function loadConfig(source: NodeJS.ProcessEnv) {
  const env: Env = envSchema.parse(source);

  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Output directory (relative paths resolve against the working directory)
    outDir: resolve(env.PAPER_SCOUT_OUT_DIR ?? 'out'),

    // arXiv source
    arxiv: {
      apiUrl: env.ARXIV_API_URL,
      timeoutMs: env.ARXIV_TIMEOUT_MS,
    },
  } as const;
}

// Re-export types
export type Config = ReturnType<typeof loadConfig>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config: Config = loadConfig(process.env);
