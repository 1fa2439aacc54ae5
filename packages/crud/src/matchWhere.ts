import { InvalidArgumentError } from './errors'
import { isRecord, readField } from './fields'

/**
 * Evaluates Mongo-style filters (`Where<T>`) against in-memory entities.
 * Mirrors the operator set the database strategies push down to SQL.
 */
export function matchesWhere(item: object, where: unknown): boolean {
  if (where === undefined || where === null) return true
  if (!isRecord(where)) throw new InvalidArgumentError('Filters must be plain objects.')
  return Object.entries(where).every(([key, condition]) => {
    switch (key) {
      case '$and':
        return toList(condition, key).every((part) => matchesWhere(item, part))
      case '$or':
        return toList(condition, key).some((part) => matchesWhere(item, part))
      case '$not':
        return !matchesWhere(item, condition)
      default:
        return matchesValue(readField(item, key), condition)
    }
  })
}

function matchesValue(value: unknown, condition: unknown): boolean {
  if (!isOperatorMap(condition)) return isEqual(value, condition)
  return Object.entries(condition).every(([op, operand]) => applyOperator(op, value, operand))
}

function isOperatorMap(condition: unknown): condition is Record<string, unknown> {
  if (!isRecord(condition)) return false
  const keys = Object.keys(condition)
  return keys.length > 0 && keys.every((key) => key.startsWith('$'))
}

function applyOperator(op: string, value: unknown, operand: unknown): boolean {
  switch (op) {
    case '$eq':
      return isEqual(value, operand)
    case '$ne':
      return !isEqual(value, operand)
    case '$in':
      return toList(operand, op).some((candidate) => isEqual(value, candidate))
    case '$nin':
      return !toList(operand, op).some((candidate) => isEqual(value, candidate))
    case '$gt':
      return compareOrNull(value, operand) === 1
    case '$gte': {
      const order = compareOrNull(value, operand)
      return order === 1 || order === 0
    }
    case '$lt':
      return compareOrNull(value, operand) === -1
    case '$lte': {
      const order = compareOrNull(value, operand)
      return order === -1 || order === 0
    }
    case '$like':
      return typeof value === 'string' && typeof operand === 'string' && likePattern(operand).test(value)
    case '$exists':
      return (value !== undefined && value !== null) === Boolean(operand)
    default:
      throw new InvalidArgumentError(`Unsupported filter operator: ${op}`)
  }
}

function toList(value: unknown, op: string): readonly unknown[] {
  if (!Array.isArray(value)) throw new InvalidArgumentError(`${op} expects an array.`)
  return value
}

function isEqual(left: unknown, right: unknown): boolean {
  if (left === undefined || left === null) return right === undefined || right === null
  if (left instanceof Date && right instanceof Date) return left.getTime() === right.getTime()
  return left === right
}

/** -1 / 0 / 1, or null when the values are not comparable. */
export function compareOrNull(left: unknown, right: unknown): -1 | 0 | 1 | null {
  if (left instanceof Date && right instanceof Date) return sign(left.getTime() - right.getTime())
  if (typeof left === 'number' && typeof right === 'number') return sign(left - right)
  if (typeof left === 'string' && typeof right === 'string') {
    if (left === right) return 0
    return left < right ? -1 : 1
  }
  return null
}

function sign(delta: number): -1 | 0 | 1 {
  if (delta === 0) return 0
  return delta < 0 ? -1 : 1
}

function likePattern(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+*?^${}()|[\]\\]/g, '\\$&')
    .replace(/%/g, '.*')
    .replace(/_/g, '.')
  return new RegExp(`^${source}$`)
}
