import { parseBooleanToken } from './boolean'

/**
 * Minimal scoped logger.
 *
 * Lines are written to the console prefixed with `[scope]`, the same way the
 * rest of the codebase reports from its subsystems. `debug` output is off
 * unless `RECORDKIT_DEBUG` enables it:
 *
 *   RECORDKIT_DEBUG=true        → every scope
 *   RECORDKIT_DEBUG=crud,orm    → only the listed scopes
 */
export type Logger = {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export const DEBUG_ENV_VAR = 'RECORDKIT_DEBUG'

export function isDebugEnabled(scope: string, raw: string | undefined = process.env[DEBUG_ENV_VAR]): boolean {
  if (!raw) return false
  const toggle = parseBooleanToken(raw)
  if (toggle !== null) return toggle
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .some((entry) => entry === '*' || entry === scope)
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug(message, ...details) {
      if (!isDebugEnabled(scope)) return
      console.debug(`${prefix} ${message}`, ...details)
    },
    info(message, ...details) {
      console.info(`${prefix} ${message}`, ...details)
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details)
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details)
    },
  }
}
