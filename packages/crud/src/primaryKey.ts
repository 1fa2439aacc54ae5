import { InvalidArgumentError } from './errors'
import type { AtomicKey, PrimaryKey } from './types'

export function isAtomicKey(value: unknown): value is AtomicKey {
  return typeof value === 'string' || typeof value === 'number'
}

function isKeyRecord(value: unknown): value is Readonly<Record<string, AtomicKey>> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  if (proto !== Object.prototype && proto !== null) return false
  return Object.values(value).every(isAtomicKey)
}

export function isPrimaryKey(value: unknown): value is PrimaryKey {
  if (isAtomicKey(value)) return true
  if (Array.isArray(value)) return value.every(isAtomicKey)
  return isKeyRecord(value)
}

/**
 * Render a primary key for messages:
 * - `42` / `'abc'` → verbatim
 * - `[1, 'a']` → `1|a`
 * - `{ orgId: 1, userId: 2 }` → `orgId:1|userId:2`
 */
export function formatPrimaryKey(key: unknown): string {
  if (isAtomicKey(key)) return String(key)
  if (Array.isArray(key) && key.every(isAtomicKey)) return key.map(String).join('|')
  if (isKeyRecord(key)) {
    return Object.entries(key)
      .map(([name, value]) => `${name}:${value}`)
      .join('|')
  }
  throw new InvalidArgumentError('Unrecognized primary key type.')
}

export function normalizeKeyFields(primaryKey: string | readonly string[] | undefined): readonly string[] {
  if (primaryKey === undefined) return ['id']
  const fields = typeof primaryKey === 'string' ? [primaryKey] : primaryKey
  if (fields.length === 0) throw new InvalidArgumentError('At least one primary key field is required.')
  return fields
}

/**
 * Turn a key into an equality filter over the key fields.
 * Tuples are matched positionally, mappings by field name.
 */
export function keyToWhere(key: PrimaryKey, fields: readonly string[]): Record<string, AtomicKey> {
  if (isAtomicKey(key)) {
    if (fields.length !== 1) {
      throw new InvalidArgumentError(`Expected a composite key with ${fields.length} parts, got ${formatPrimaryKey(key)}.`)
    }
    return { [fields[0]]: key }
  }
  if (Array.isArray(key)) {
    if (key.length !== fields.length) {
      throw new InvalidArgumentError(`Expected ${fields.length} key parts, got ${formatPrimaryKey(key)}.`)
    }
    return Object.fromEntries(fields.map((field, index) => [field, key[index]]))
  }
  if (!isKeyRecord(key)) throw new InvalidArgumentError('Unrecognized primary key type.')
  const where: Record<string, AtomicKey> = {}
  for (const field of fields) {
    const part = key[field]
    if (part === undefined) {
      throw new InvalidArgumentError(`Missing key part "${field}" in ${formatPrimaryKey(key)}.`)
    }
    where[field] = part
  }
  return where
}

/**
 * Filter matching any of the given keys: `$in` for single-field keys,
 * `$or` of key matches for composite ones.
 */
export function keysToWhere(keys: readonly PrimaryKey[], fields: readonly string[]): Record<string, unknown> {
  if (fields.length === 1) {
    const values = keys.map((key) => keyToWhere(key, fields)[fields[0]])
    return { [fields[0]]: { $in: values } }
  }
  return { $or: keys.map((key) => keyToWhere(key, fields)) }
}

/** Stable string identity for key values, used by identity maps. */
export function keyIdentity(values: readonly unknown[]): string {
  return JSON.stringify(values)
}
