import type { FilterQuery } from '@mikro-orm/core'
import type { EntityManager } from '@mikro-orm/postgresql'
import { NotFoundError } from '../errors'
import { keyToWhere } from '../primaryKey'
import type { RecordSession } from '../session'
import { resolveJoins, type Executable, type StatementPlan } from '../statement'
import type { EntityConstructor, PrimaryKey } from '../types'

// Filters are assembled from field names at runtime, which the compiler
// cannot tie back to the entity type MikroORM expects.
function asFilterQuery<T extends object>(where: object | undefined): FilterQuery<T> {
  const filter: unknown = where ?? {}
  return filter as FilterQuery<T>
}

/**
 * Session strategy backed by a MikroORM EntityManager.
 *
 * Pass a fork (`orm.em.fork()`) so the session has its own identity map;
 * the global EntityManager must never be owned by a service.
 */
export class MikroOrmSession implements RecordSession {
  constructor(private readonly em: EntityManager) {}

  add(item: object): void {
    this.em.persist(item)
  }

  addAll(items: readonly object[]): void {
    this.em.persist(items)
  }

  delete(item: object): void {
    this.em.remove(item)
  }

  async commit(): Promise<void> {
    await this.em.flush()
  }

  async rollback(): Promise<void> {
    this.em.clear()
  }

  async refresh(item: object): Promise<void> {
    const refreshed = await this.em.refresh(item)
    if (refreshed === null) {
      const name = item.constructor.name
      throw new NotFoundError(name, `${name} no longer exists.`)
    }
  }

  async get<T extends object>(entity: EntityConstructor<T>, key: PrimaryKey): Promise<T | null> {
    const where = keyToWhere(key, this.keyFieldsOf(entity))
    return this.em.findOne<T>(entity, asFilterQuery<T>(where))
  }

  async execute<TRow>(statement: Executable<TRow>): Promise<TRow[]> {
    const plan = statement.toPlan()
    const roots = await this.findRoots(plan)
    const rows = await resolveJoins(roots, plan.joins, (join, values) =>
      this.em.find<object>(join.entity, asFilterQuery<object>({ $and: [{ [join.to]: { $in: values } }, join.where ?? {}] })),
    )
    return statement.shapeRows(rows)
  }

  private async findRoots(plan: StatementPlan): Promise<object[]> {
    return this.em.find<object>(plan.entity, asFilterQuery<object>(plan.where), {
      orderBy: plan.orderBy,
      limit: plan.limit,
      offset: plan.offset,
    })
  }

  private keyFieldsOf(entity: EntityConstructor<object>): readonly string[] {
    const meta = this.em.getMetadata().find(entity.name)
    if (!meta || meta.primaryKeys.length === 0) return ['id']
    return meta.primaryKeys
  }
}
