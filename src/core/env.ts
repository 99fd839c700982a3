/**
 * Environment Detection Utilities
 *
 * Read from process environment variables at call time:
 * - NODE_ENV / VITEST: set by the test runner
 * - GAME_ENV: explicit override
 *
 * Environments are mutually exclusive:
 * - development: local runs (default)
 * - test: automated test runner (Vitest)
 * - production: quiet runs
 */

export type Environment = 'development' | 'test' | 'production'

const NAMED_ENVIRONMENTS: readonly Environment[] = ['development', 'production']

function isEnvironment(value: string | undefined): value is Environment {
  return NAMED_ENVIRONMENTS.some(env => env === value)
}

/**
 * Get the current environment name.
 */
export function getEnvironment(): Environment {
  const vars = process.env

  // Test environment (checked first - highest priority)
  if (vars.NODE_ENV === 'test' || vars.VITEST === 'true') {
    return 'test'
  }

  const explicit = vars.GAME_ENV
  if (isEnvironment(explicit)) {
    return explicit
  }

  if (vars.NODE_ENV === 'production') {
    return 'production'
  }

  return 'development'
}

/** Check if running in development environment. */
export function isDevelopment(): boolean {
  return getEnvironment() === 'development'
}
