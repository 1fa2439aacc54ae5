import { InvalidArgumentError } from './errors'
import { readField } from './fields'
import { keysToWhere } from './primaryKey'
import type { EntityConstructor, OrderBy, PrimaryKey, Where } from './types'

export const MAX_JOINED_MODELS = 6

type AnyEntity = EntityConstructor<object>

/** Entity classes that may be joined onto a select: zero to six of them. */
export type JoinedEntities =
  | readonly []
  | readonly [AnyEntity]
  | readonly [AnyEntity, AnyEntity]
  | readonly [AnyEntity, AnyEntity, AnyEntity]
  | readonly [AnyEntity, AnyEntity, AnyEntity, AnyEntity]
  | readonly [AnyEntity, AnyEntity, AnyEntity, AnyEntity, AnyEntity]
  | readonly [AnyEntity, AnyEntity, AnyEntity, AnyEntity, AnyEntity, AnyEntity]

export type InstancesOf<T extends readonly unknown[]> = {
  [K in keyof T]: T[K] extends new () => infer E ? E : never
}

/** Scalar rows without joins, `[model, ...joined]` tuples otherwise. */
export type RowOf<TModel, TJoined extends readonly unknown[]> = TJoined extends readonly []
  ? TModel
  : [TModel, ...TJoined]

export type JoinPlan = {
  entity: AnyEntity
  /** Field on the root entity */
  from?: string
  /** Field on the joined entity that must equal `from` */
  to?: string
  where?: object
}

/** Untyped form of a statement, consumed by session strategies. */
export type StatementPlan = {
  entity: AnyEntity
  where?: object
  orderBy: object[]
  limit?: number
  offset?: number
  joins: JoinPlan[]
}

export interface Executable<TRow> {
  toPlan(): StatementPlan
  shapeRows(rows: readonly (readonly object[])[]): TRow[]
}

type StatementState = Omit<StatementPlan, 'entity'>

/**
 * Immutable select builder over one entity, optionally joined with others.
 *
 * Join conditions are explicit equi-joins between a root field and a field of
 * the joined entity:
 *
 * @example
 * ```typescript
 * const stmt = players
 *   .select(Team)
 *   .on(Team, 'teamId', 'id')
 *   .where({ name: 'Ann' })
 * const [[player, team]] = (await players.execute(stmt)).all()
 * ```
 */
export class SelectStatement<TModel extends object, TJoined extends readonly unknown[] = []>
  implements Executable<RowOf<TModel, TJoined>>
{
  private state: StatementState

  constructor(
    readonly entity: EntityConstructor<TModel>,
    joined: readonly AnyEntity[] = [],
  ) {
    if (joined.length > MAX_JOINED_MODELS) {
      throw new InvalidArgumentError(`At most ${MAX_JOINED_MODELS} models can be joined, got ${joined.length}.`)
    }
    this.state = { orderBy: [], joins: joined.map((entity) => ({ entity })) }
  }

  get isJoined(): boolean {
    return this.state.joins.length > 0
  }

  where(filter: Where<TModel>): SelectStatement<TModel, TJoined> {
    return this.narrow(filter)
  }

  /** Restrict the root entity to the given primary keys. */
  whereKeys(keyFields: readonly string[], keys: readonly PrimaryKey[]): SelectStatement<TModel, TJoined> {
    return this.narrow(keysToWhere(keys, keyFields))
  }

  orderBy(...orders: OrderBy<TModel>[]): SelectStatement<TModel, TJoined> {
    return this.with({ orderBy: [...this.state.orderBy, ...orders] })
  }

  limit(limit: number): SelectStatement<TModel, TJoined> {
    return this.with({ limit: assertCount('limit', limit) })
  }

  offset(offset: number): SelectStatement<TModel, TJoined> {
    return this.with({ offset: assertCount('offset', offset) })
  }

  /** Join condition: `root[from] = joined[to]`. */
  on<J extends TJoined[number] & object>(
    entity: EntityConstructor<J>,
    from: keyof TModel & string,
    to: keyof J & string,
  ): SelectStatement<TModel, TJoined> {
    const index = this.joinIndex(entity, (join) => join.from === undefined)
    return this.withJoin(index, { from, to })
  }

  whereJoined<J extends TJoined[number] & object>(
    entity: EntityConstructor<J>,
    filter: Where<J>,
  ): SelectStatement<TModel, TJoined> {
    const index = this.joinIndex(entity, (join) => join.where === undefined)
    const current = this.state.joins[index].where
    return this.withJoin(index, { where: current ? { $and: [current, filter] } : filter })
  }

  toPlan(): StatementPlan {
    return {
      entity: this.entity,
      where: this.state.where,
      orderBy: [...this.state.orderBy],
      limit: this.state.limit,
      offset: this.state.offset,
      joins: this.state.joins.map((join) => ({ ...join })),
    }
  }

  shapeRows(rows: readonly (readonly object[])[]): RowOf<TModel, TJoined>[] {
    const joined = this.isJoined
    return rows.map((row) => {
      // The row arity follows the join list, which TJoined mirrors.
      const shaped: unknown = joined ? [...row] : row[0]
      return shaped as RowOf<TModel, TJoined>
    })
  }

  private narrow(filter: object): SelectStatement<TModel, TJoined> {
    const current = this.state.where
    return this.with({ where: current ? { $and: [current, filter] } : filter })
  }

  private joinIndex(entity: AnyEntity, prefer: (join: JoinPlan) => boolean): number {
    const candidates = this.state.joins
      .map((join, index) => ({ join, index }))
      .filter(({ join }) => join.entity === entity)
    if (candidates.length === 0) {
      throw new InvalidArgumentError(`${entity.name} is not joined in this select.`)
    }
    return (candidates.find(({ join }) => prefer(join)) ?? candidates[0]).index
  }

  private withJoin(index: number, patch: Partial<JoinPlan>): SelectStatement<TModel, TJoined> {
    const joins = this.state.joins.map((join, position) => (position === index ? { ...join, ...patch } : join))
    return this.with({ joins })
  }

  private with(patch: Partial<StatementState>): SelectStatement<TModel, TJoined> {
    const next = new SelectStatement<TModel, TJoined>(this.entity)
    next.state = { ...this.state, ...patch }
    return next
  }
}

function assertCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}.`)
  }
  return value
}

export type ResolvedJoin = JoinPlan & { from: string; to: string }

export type JoinFetcher = (join: ResolvedJoin, values: unknown[]) => Promise<object[]>

/**
 * Executes the joins of a plan as batched equi-joins: one fetch per joined
 * entity with `to $in <root values>`, one output tuple per match. Roots
 * without a match are dropped (inner join).
 */
export async function resolveJoins(
  roots: readonly object[],
  joins: readonly JoinPlan[],
  fetch: JoinFetcher,
): Promise<object[][]> {
  const resolved = joins.map((join): ResolvedJoin => {
    if (join.from === undefined || join.to === undefined) {
      throw new InvalidArgumentError(`Missing join condition for ${join.entity.name}.`)
    }
    return { ...join, from: join.from, to: join.to }
  })
  let rows: object[][] = roots.map((root) => [root])
  for (const join of resolved) {
    const values = [...new Set(rows.map((row) => readField(row[0], join.from)))].filter(
      (value) => value !== undefined && value !== null,
    )
    const matches = values.length > 0 ? await fetch(join, values) : []
    const byValue = new Map<unknown, object[]>()
    for (const match of matches) {
      const value = readField(match, join.to)
      const bucket = byValue.get(value)
      if (bucket) bucket.push(match)
      else byValue.set(value, [match])
    }
    rows = rows.flatMap((row) => (byValue.get(readField(row[0], join.from)) ?? []).map((match) => [...row, match]))
  }
  return rows
}
