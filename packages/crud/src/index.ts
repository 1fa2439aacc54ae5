/**
 * @recordkit/crud
 *
 * Generic CRUD service over MikroORM sessions
 */

export { CrudService } from './crudService'
export type { CrudServiceOptions, SessionBatch } from './crudService'
export {
  ServiceError,
  NotFoundError,
  MultipleResultsFoundError,
  CommitFailedError,
  InvalidArgumentError,
} from './errors'
export { formatPrimaryKey, isPrimaryKey, keyToWhere, keysToWhere } from './primaryKey'
export { ResultSet } from './resultSet'
export type { RecordSession } from './session'
export { SelectStatement, MAX_JOINED_MODELS, resolveJoins } from './statement'
export type { Executable, InstancesOf, JoinedEntities, JoinPlan, RowOf, StatementPlan } from './statement'
export { SortDir } from './types'
export type {
  AtomicKey,
  CompositeKey,
  EntityConstructor,
  ListOptions,
  ModelDefinition,
  OrderBy,
  PrimaryKey,
  Where,
  WhereOps,
  WhereValue,
} from './types'
export { matchesWhere } from './matchWhere'

// Session strategies
export { MikroOrmSession } from './strategies/mikroOrm'
export { MemoryStore, MemorySession } from './strategies/memory'
export type { MemoryStoreOptions } from './strategies/memory'

export { createOrm, openSession } from './orm'
export type { CreateOrmOptions } from './orm'
export { registerCrud, registerCrudService } from './di'
export type { CrudCradle, SessionFactory } from './di'
