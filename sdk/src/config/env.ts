/**
 * Environment Configuration
 *
 * Every environment variable the SDK reads goes through this module. Values are
 * validated with zod once at import time; invalid values are reported and
 * replaced by their defaults so that a bad variable never prevents a session
 * from being created with explicit options.
 *
 * Usage:
 *   import { LOG_LEVEL, envDefaults } from './config/env.js';
 */

import { z } from 'zod';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse boolean env vars
 */
const booleanSchema = z
  .enum(['true', 'false', ''])
  .optional()
  .transform((val) => val === 'true');

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  VERBOSE: booleanSchema,

  // -------------------------------------------------------------------------
  // OAuth client used by the token endpoint
  // -------------------------------------------------------------------------
  ATHENA_CLIENT_ID: z.string().optional(),
  ATHENA_CLIENT_SECRET: z.string().optional(),
  ATHENA_KAIROS_CLIENT_ID: z.string().optional(),
  ATHENA_KAIROS_CLIENT_SECRET: z.string().optional(),

  // -------------------------------------------------------------------------
  // Outbound requests
  // -------------------------------------------------------------------------
  ATHENA_USER_AGENT: optionalString('Fortnite/++Fortnite+Release-11.40-CL-11039906 Windows/10.0.19041.1.256.64bit'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse an environment object. Exposed for tests; the module-level values below
 * are parsed from `process.env`.
 */
export function parseEnv(env: NodeJS.ProcessEnv): { config: EnvConfig; errors: string[] } {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return { config: result.data, errors: [] };
  }

  const errors = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  // Fall back field by field: drop every variable that failed validation and parse again.
  const invalidKeys = new Set(result.error.errors.map((issue) => String(issue.path[0])));
  const sanitized: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!invalidKeys.has(key)) sanitized[key] = value;
  }
  return { config: envSchema.parse(sanitized), errors };
}

const { config: parsedEnv, errors: envErrors } = parseEnv(process.env);

if (envErrors.length > 0) {
  console.error('Environment validation failed:');
  for (const error of envErrors) {
    console.error(`  ${error}`);
  }
}

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const LOG_LEVEL = parsedEnv.LOG_LEVEL ?? 'info';
export const VERBOSE = parsedEnv.VERBOSE;

/**
 * Option defaults contributed by the environment. Options given in code win.
 */
export const envDefaults = {
  client:
    parsedEnv.ATHENA_CLIENT_ID && parsedEnv.ATHENA_CLIENT_SECRET
      ? { clientId: parsedEnv.ATHENA_CLIENT_ID, clientSecret: parsedEnv.ATHENA_CLIENT_SECRET }
      : undefined,
  kairosClient:
    parsedEnv.ATHENA_KAIROS_CLIENT_ID && parsedEnv.ATHENA_KAIROS_CLIENT_SECRET
      ? { clientId: parsedEnv.ATHENA_KAIROS_CLIENT_ID, clientSecret: parsedEnv.ATHENA_KAIROS_CLIENT_SECRET }
      : undefined,
  userAgent: parsedEnv.ATHENA_USER_AGENT,
};

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Check if verbose output (stack traces, metadata) is enabled.
 * Read at call time so tests and long-running processes can toggle it.
 */
export function isVerbose(): boolean {
  return process.env.VERBOSE === 'true' || VERBOSE;
}

/**
 * Check if debug-level logs should be printed.
 */
export function isDebugLevel(): boolean {
  return process.env.LOG_LEVEL === 'debug' || LOG_LEVEL === 'debug';
}
