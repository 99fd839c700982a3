/**
 * SafeConsole - Development-only logging
 *
 * Outside development, log/warn/info/debug/group calls are no-ops.
 * Errors always reach the console. scoped() tags every line with the
 * subsystem that wrote it.
 */

import { isDevelopment } from './env.ts'

export function log(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

export function warn(...args: unknown[]): void {
  if (isDevelopment()) {
    console.warn(...args)
  }
}

/**
 * Error message (always logs)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

export function info(...args: unknown[]): void {
  if (isDevelopment()) {
    console.info(...args)
  }
}

export function debug(...args: unknown[]): void {
  if (isDevelopment()) {
    console.debug(...args)
  }
}

export function group(label: string): void {
  if (isDevelopment()) {
    console.group(label)
  }
}

export function groupEnd(): void {
  if (isDevelopment()) {
    console.groupEnd()
  }
}

export interface ScopedConsole {
  log(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
  info(...args: unknown[]): void
  debug(...args: unknown[]): void
}

/**
 * Logger whose lines start with `[scope]`
 */
export function scoped(scope: string): ScopedConsole {
  const tag = `[${scope}]`
  return {
    log: (...args) => log(tag, ...args),
    warn: (...args) => warn(tag, ...args),
    error: (...args) => error(tag, ...args),
    info: (...args) => info(tag, ...args),
    debug: (...args) => debug(tag, ...args),
  }
}

export const SafeConsole = {
  log,
  warn,
  error,
  info,
  debug,
  group,
  groupEnd,
  scoped,
}
