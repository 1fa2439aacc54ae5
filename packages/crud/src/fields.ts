export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function readField(item: object, field: string): unknown {
  return Reflect.get(item, field)
}

/** Own enumerable fields of an entity as a plain record. */
export function snapshotOf(item: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(item))
}

export function describeWhere(where: unknown): string {
  if (where === undefined) return '{}'
  try {
    return JSON.stringify(where) ?? String(where)
  } catch {
    return String(where)
  }
}
