import type { EntityClass } from '@mikro-orm/core'
import type { z } from 'zod'

// ============================================================================
// Primary keys
// ============================================================================

export type AtomicKey = string | number

/** Ordered tuple/list of key parts, or a named mapping of key parts. */
export type CompositeKey = readonly AtomicKey[] | Readonly<Record<string, AtomicKey>>

export type PrimaryKey = AtomicKey | CompositeKey

// ============================================================================
// Entities and model definitions
// ============================================================================

/**
 * MikroORM entity class that can be instantiated without arguments.
 * @template T - The entity instance type
 */
export type EntityConstructor<T extends object> = EntityClass<T> & (new () => T)

/**
 * Describes the table model a service works on.
 *
 * @template TModel - The entity type
 * @template TCreate - Input accepted by create operations
 * @template TUpdate - Input accepted by update operations
 */
export type ModelDefinition<TModel extends object, TCreate, TUpdate> = {
  /** The MikroORM entity class */
  entity: EntityConstructor<TModel>
  /** Name used in error messages. Defaults to the class name */
  name?: string
  /** Key field name(s). Defaults to `'id'` */
  primaryKey?: string | readonly string[]
  /** Validates creation input; its output is assigned onto a new entity */
  createSchema: z.ZodType<Partial<TModel>, TCreate>
  /** Validates update input; keys missing from its output are left untouched */
  updateSchema: z.ZodType<Partial<TModel>, TUpdate>
}

// ============================================================================
// Filters and ordering
// ============================================================================

// Mongo-style filter operators, the dialect MikroORM accepts as-is
export type WhereOps<T> = {
  $eq?: T | null
  $ne?: T | null
  $in?: readonly T[]
  $nin?: readonly T[]
  $gt?: T
  $gte?: T
  $lt?: T
  $lte?: T
  $like?: T extends string ? string : never
  $exists?: boolean
}

// A field filter can be a direct value (equals) or ops object
export type WhereValue<T> = T | null | WhereOps<T>

export type Where<T> = {
  [K in keyof T]?: WhereValue<T[K]>
} & {
  $and?: readonly Where<T>[]
  $or?: readonly Where<T>[]
  $not?: Where<T>
}

export enum SortDir {
  Asc = 'asc',
  Desc = 'desc',
}

export type OrderBy<T> = {
  [K in keyof T]?: SortDir | 'asc' | 'desc'
}

export type ListOptions<T> = {
  orderBy?: readonly OrderBy<T>[]
  limit?: number
  offset?: number
}
