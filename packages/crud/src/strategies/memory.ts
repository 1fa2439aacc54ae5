import { NotFoundError, ServiceError } from '../errors'
import { readField, snapshotOf } from '../fields'
import { compareOrNull, matchesWhere } from '../matchWhere'
import { keyIdentity, keyToWhere } from '../primaryKey'
import type { RecordSession } from '../session'
import { resolveJoins, type Executable, type StatementPlan } from '../statement'
import type { EntityConstructor, PrimaryKey } from '../types'

type Snapshot = Record<string, unknown>

export type MemoryStoreOptions = {
  /** Key fields per entity class. Entities not listed use `['id']` */
  primaryKeys?: Iterable<readonly [Function, readonly string[]]>
}

export type MemoryWrite = { entity: Function; identity: string; snapshot: Snapshot }
export type MemoryDelete = { entity: Function; identity: string }

/**
 * In-process table storage shared by any number of sessions.
 *
 * Rows are kept as plain snapshots in insertion order; single-field keys
 * left empty on write get the next value of a per-entity sequence.
 */
export class MemoryStore {
  private readonly tables = new Map<Function, Map<string, Snapshot>>()
  private readonly sequences = new Map<Function, number>()
  private readonly keyFields: Map<Function, readonly string[]>

  constructor(options: MemoryStoreOptions = {}) {
    this.keyFields = new Map(options.primaryKeys ?? [])
  }

  openSession(): MemorySession {
    return new MemorySession(this)
  }

  keyFieldsOf(entity: Function): readonly string[] {
    return this.keyFields.get(entity) ?? ['id']
  }

  rows(entity: Function): Snapshot[] {
    return [...(this.tables.get(entity)?.values() ?? [])].map((row) => ({ ...row }))
  }

  read(entity: Function, identity: string): Snapshot | null {
    const row = this.tables.get(entity)?.get(identity)
    return row ? { ...row } : null
  }

  count(entity: Function): number {
    return this.tables.get(entity)?.size ?? 0
  }

  nextId(entity: Function): number {
    const next = (this.sequences.get(entity) ?? 0) + 1
    this.sequences.set(entity, next)
    return next
  }

  /** Applies a batch of writes and deletes as one unit. */
  apply(writes: readonly MemoryWrite[], deletes: readonly MemoryDelete[]): void {
    for (const { entity, identity, snapshot } of writes) {
      this.table(entity).set(identity, { ...snapshot })
      this.bumpSequence(entity, snapshot)
    }
    for (const { entity, identity } of deletes) {
      this.tables.get(entity)?.delete(identity)
    }
  }

  private table(entity: Function): Map<string, Snapshot> {
    let table = this.tables.get(entity)
    if (!table) {
      table = new Map()
      this.tables.set(entity, table)
    }
    return table
  }

  private bumpSequence(entity: Function, snapshot: Snapshot): void {
    const fields = this.keyFieldsOf(entity)
    if (fields.length !== 1) return
    const value = snapshot[fields[0]]
    if (typeof value === 'number' && value > (this.sequences.get(entity) ?? 0)) {
      this.sequences.set(entity, value)
    }
  }
}

/**
 * Session strategy over a `MemoryStore`.
 *
 * Each session keeps its own identity map, so two sessions on one store
 * behave like two forked EntityManagers on one database. Queries see
 * committed rows plus in-memory edits of instances this session tracks.
 * A commit writes staged items and tracked instances changed since they
 * were loaded; everything else is left to other sessions.
 */
export class MemorySession implements RecordSession {
  private readonly identityMap = new Map<Function, Map<string, object>>()
  // last state read from or written to the store, per tracked instance
  private readonly baselines = new WeakMap<object, Snapshot>()
  private readonly pending = new Set<object>()
  private readonly removed = new Set<object>()

  constructor(private readonly store: MemoryStore) {}

  add(item: object): void {
    this.removed.delete(item)
    this.pending.add(item)
  }

  addAll(items: readonly object[]): void {
    for (const item of items) this.add(item)
  }

  delete(item: object): void {
    this.pending.delete(item)
    this.removed.add(item)
  }

  async commit(): Promise<void> {
    const writes: MemoryWrite[] = []
    const written: Array<{ item: object; identity: string; snapshot: Snapshot }> = []
    const vanished: Array<{ entity: Function; identity: string }> = []
    for (const item of new Set([...this.tracked(), ...this.pending])) {
      if (this.removed.has(item)) continue
      const baseline = this.baselines.get(item)
      if (!this.pending.has(item) && (!baseline || sameSnapshot(baseline, snapshotOf(item)))) continue
      const identity = this.assignIdentity(item)
      // loaded rows deleted by another session are not written back
      if (baseline && this.store.read(item.constructor, identity) === null) {
        vanished.push({ entity: item.constructor, identity })
        continue
      }
      const snapshot = snapshotOf(item)
      writes.push({ entity: item.constructor, identity, snapshot })
      written.push({ item, identity, snapshot })
    }
    const deletes: MemoryDelete[] = []
    for (const item of this.removed) {
      const identity = this.identityOf(item)
      if (identity !== null) deletes.push({ entity: item.constructor, identity })
    }

    this.store.apply(writes, deletes)

    for (const { item, identity, snapshot } of written) this.track(item, identity, snapshot)
    for (const { entity, identity } of [...deletes, ...vanished]) this.identityMap.get(entity)?.delete(identity)
    this.pending.clear()
    this.removed.clear()
  }

  async rollback(): Promise<void> {
    this.pending.clear()
    this.removed.clear()
    for (const [entity, instances] of this.identityMap) {
      for (const [identity, item] of instances) {
        const snapshot = this.store.read(entity, identity)
        if (snapshot) {
          Object.assign(item, snapshot)
          this.baselines.set(item, snapshotOf(item))
        } else {
          instances.delete(identity)
        }
      }
    }
  }

  async refresh(item: object): Promise<void> {
    const entity = item.constructor
    const identity = this.identityOf(item)
    const snapshot = identity === null ? null : this.store.read(entity, identity)
    if (identity === null || snapshot === null) {
      throw new NotFoundError(entity.name, `${entity.name} no longer exists.`)
    }
    Object.assign(item, snapshot)
    this.track(item, identity, snapshotOf(item))
  }

  async get<T extends object>(entity: EntityConstructor<T>, key: PrimaryKey): Promise<T | null> {
    const fields = this.store.keyFieldsOf(entity)
    const where = keyToWhere(key, fields)
    const identity = keyIdentity(fields.map((field) => where[field]))
    const tracked = this.identityMap.get(entity)?.get(identity)
    if (tracked instanceof entity) return tracked
    const snapshot = this.store.read(entity, identity)
    if (!snapshot) return null
    return this.hydrate(entity, identity, snapshot)
  }

  async execute<TRow>(statement: Executable<TRow>): Promise<TRow[]> {
    const plan = statement.toPlan()
    const roots = this.page(plan, this.load(plan.entity, plan.where))
    const rows = await resolveJoins(roots, plan.joins, async (join, values) =>
      this.load(join.entity, { $and: [{ [join.to]: { $in: values } }, join.where ?? {}] }),
    )
    return statement.shapeRows(rows)
  }

  private load(entity: EntityConstructor<object>, where: object | undefined): object[] {
    const fields = this.store.keyFieldsOf(entity)
    return this.store
      .rows(entity)
      .map((snapshot) => {
        const identity = keyIdentity(fields.map((field) => snapshot[field]))
        const tracked = this.identityMap.get(entity)?.get(identity)
        if (!tracked) return this.hydrate(entity, identity, snapshot)
        // unmodified instances pick up changes committed elsewhere
        if (this.isClean(tracked)) {
          Object.assign(tracked, snapshot)
          this.baselines.set(tracked, snapshotOf(tracked))
        }
        return tracked
      })
      .filter((item) => matchesWhere(item, where))
  }

  private page(plan: StatementPlan, items: object[]): object[] {
    const sorted = plan.orderBy.length > 0 ? [...items].sort((a, b) => compareByOrder(a, b, plan.orderBy)) : items
    const start = plan.offset ?? 0
    return plan.limit === undefined ? sorted.slice(start) : sorted.slice(start, start + plan.limit)
  }

  private hydrate<T extends object>(entity: EntityConstructor<T>, identity: string, snapshot: Snapshot): T {
    const item = Object.assign(new entity(), snapshot)
    this.track(item, identity, snapshotOf(item))
    return item
  }

  private isClean(item: object): boolean {
    const baseline = this.baselines.get(item)
    return baseline !== undefined && sameSnapshot(baseline, snapshotOf(item))
  }

  private *tracked(): Iterable<object> {
    for (const instances of this.identityMap.values()) yield* instances.values()
  }

  private track(item: object, identity: string, snapshot: Snapshot): void {
    this.baselines.set(item, snapshot)
    let instances = this.identityMap.get(item.constructor)
    if (!instances) {
      instances = new Map()
      this.identityMap.set(item.constructor, instances)
    }
    instances.set(identity, item)
  }

  private identityOf(item: object): string | null {
    const values = this.store.keyFieldsOf(item.constructor).map((field) => readField(item, field))
    if (values.some((value) => value === undefined || value === null)) return null
    return keyIdentity(values)
  }

  private assignIdentity(item: object): string {
    const existing = this.identityOf(item)
    if (existing !== null) return existing
    const fields = this.store.keyFieldsOf(item.constructor)
    if (fields.length !== 1) {
      throw new ServiceError(`Cannot persist ${item.constructor.name} without a complete primary key.`)
    }
    Object.assign(item, { [fields[0]]: this.store.nextId(item.constructor) })
    return keyIdentity([readField(item, fields[0])])
  }
}

function sameSnapshot(left: Snapshot, right: Snapshot): boolean {
  const keys = new Set([...Object.keys(left), ...Object.keys(right)])
  for (const key of keys) {
    const a = left[key]
    const b = right[key]
    const equal = a instanceof Date && b instanceof Date ? a.getTime() === b.getTime() : a === b
    if (!equal) return false
  }
  return true
}

function compareByOrder(left: object, right: object, orders: readonly object[]): number {
  for (const order of orders) {
    for (const [field, direction] of Object.entries(order)) {
      const factor = String(direction).toLowerCase().startsWith('desc') ? -1 : 1
      const a = readField(left, field)
      const b = readField(right, field)
      if (a === b) continue
      // nulls first in ascending order
      if (a === undefined || a === null) return -factor
      if (b === undefined || b === null) return factor
      const result = compareOrNull(a, b) ?? String(a).localeCompare(String(b))
      if (result !== 0) return result * factor
    }
  }
  return 0
}
