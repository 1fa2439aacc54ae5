/**
 * Shared database connection utilities.
 *
 * Every package that needs a database URL or parsed connection options
 * should import from here instead of reading env vars directly.
 *
 * The `prefix` parameter lets each subsystem define its own override:
 *   getDatabaseUrl('TEST')  → TEST_DATABASE_URL > DATABASE_URL > localhost
 *   getDatabaseUrl()        → DATABASE_URL > localhost
 */

export const DEFAULT_DATABASE_URL = 'postgres://localhost:5432/recordkit'

export type ParsedDatabaseConnection = {
  host: string
  port: number
  dbName?: string
  user?: string
  password?: string
}

/**
 * Resolve a database URL from environment variables.
 *
 * Priority: <PREFIX>_DATABASE_URL  →  DATABASE_URL  →  postgres://localhost:5432/recordkit
 */
export function getDatabaseUrl(prefix?: string): string {
  if (prefix) {
    const prefixed = process.env[`${prefix}_DATABASE_URL`]
    if (prefixed) return prefixed
  }
  return process.env.DATABASE_URL || DEFAULT_DATABASE_URL
}

/**
 * Parse a postgres:// URL into the discrete options MikroORM also accepts.
 * Throws when the value is not a URL at all.
 */
export function parseDatabaseUrl(url: string): ParsedDatabaseConnection {
  const parsed = new URL(url)
  const dbName = parsed.pathname ? decodeURIComponent(parsed.pathname.slice(1)) : ''
  return {
    host: parsed.hostname || 'localhost',
    port: parseInt(parsed.port, 10) || 5432,
    dbName: dbName || undefined,
    user: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  }
}
