import { createLogger, type Logger } from '@recordkit/shared/lib/logger'
import { CommitFailedError, InvalidArgumentError, NotFoundError } from './errors'
import { describeWhere, isRecord } from './fields'
import { formatPrimaryKey, normalizeKeyFields } from './primaryKey'
import { ResultSet } from './resultSet'
import type { RecordSession } from './session'
import { SelectStatement, type Executable, type InstancesOf, type JoinedEntities } from './statement'
import type { ListOptions, ModelDefinition, PrimaryKey, Where } from './types'

export type CrudServiceOptions = {
  logger?: Logger
}

/**
 * Batch accepted by `addToSession()`. Updates pair a loaded item with its changes.
 */
export type SessionBatch<TModel, TCreate, TUpdate> =
  | { operation: 'create'; items: readonly TCreate[]; commit?: boolean }
  | { operation: 'update'; items: readonly (readonly [TModel, TUpdate])[]; commit?: boolean }

/**
 * Base CRUD service over a session.
 *
 * A service owns its session from construction on: the session must not be
 * used anywhere else, and a service instance must not be reused across
 * requests, otherwise uncommitted state leaks between callers.
 *
 * @template TModel - The MikroORM entity
 * @template TCreate - Creation input. Converted to `TModel` in `prepareForCreate()`
 * @template TUpdate - Update input. Converted to a partial record in `prepareForUpdate()`
 * @template TKey - Primary key shape of `TModel`, often `number` or `string`
 *
 * @example
 * ```typescript
 * class PlayerService extends CrudService<Player, PlayerCreate, PlayerUpdate, number> {
 *   constructor(session: RecordSession) {
 *     super(session, playerModel)
 *   }
 *
 *   byName(name: string) {
 *     return this.all({ name })
 *   }
 * }
 * ```
 */
export class CrudService<TModel extends object, TCreate, TUpdate, TKey extends PrimaryKey = PrimaryKey> {
  protected readonly logger: Logger
  private readonly keyFields: readonly string[]

  constructor(
    protected readonly session: RecordSession,
    protected readonly model: ModelDefinition<TModel, TCreate, TUpdate>,
    options: CrudServiceOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('crud')
    this.keyFields = normalizeKeyFields(model.primaryKey)
  }

  get modelName(): string {
    return this.model.name ?? this.model.entity.name
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  /**
   * Select over the model, optionally joined with up to six other entities.
   * Each joined entity needs an explicit condition via `.on()` before execution.
   */
  select<TJoined extends JoinedEntities = []>(...joined: TJoined): SelectStatement<TModel, InstancesOf<TJoined>> {
    return new SelectStatement<TModel, InstancesOf<TJoined>>(this.model.entity, joined)
  }

  async execute<TRow>(statement: Executable<TRow>): Promise<ResultSet<TRow>> {
    return new ResultSet(await this.session.execute(statement))
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async all(where?: Where<TModel>, options: ListOptions<TModel> = {}): Promise<TModel[]> {
    let statement = this.select()
    if (where !== undefined) statement = statement.where(where)
    if (options.orderBy) statement = statement.orderBy(...options.orderBy)
    if (options.limit !== undefined) statement = statement.limit(options.limit)
    if (options.offset !== undefined) statement = statement.offset(options.offset)
    return (await this.execute(statement)).all()
  }

  /**
   * @deprecated Use `all()` instead.
   */
  async getAll(): Promise<TModel[]> {
    return this.all()
  }

  /**
   * @throws NotFoundError when nothing matches
   * @throws MultipleResultsFoundError when more than one item matches
   */
  async one(where: Where<TModel>): Promise<TModel> {
    const result = await this.execute(this.select().where(where).limit(2))
    return result.one(this.describe(where))
  }

  /**
   * @throws MultipleResultsFoundError when more than one item matches
   */
  async oneOrNone(where: Where<TModel>): Promise<TModel | null> {
    const result = await this.execute(this.select().where(where).limit(2))
    return result.oneOrNone(this.describe(where))
  }

  async getByKey(key: TKey): Promise<TModel | null> {
    return this.session.get(this.model.entity, key)
  }

  /**
   * Items with the given keys. Keys without a row are left out silently and
   * the order is whatever the store returns.
   */
  async getByKeys(keys: readonly TKey[]): Promise<TModel[]> {
    if (keys.length === 0) return []
    return (await this.execute(this.select().whereKeys(this.keyFields, keys))).all()
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Creates, commits and refreshes a new item so store-generated fields are set.
   * @throws CommitFailedError
   */
  async create(data: TCreate): Promise<TModel> {
    const item = await this.prepareForCreate(data)
    this.session.add(item)
    await this.safeCommit('Commit failed.')
    await this.session.refresh(item)
    return item
  }

  /**
   * Creates all items with a single commit. Items are not refreshed.
   * @throws CommitFailedError
   */
  async createMultiple(items: readonly TCreate[]): Promise<TModel[]> {
    return this.addToSession({ operation: 'create', items, commit: true })
  }

  /**
   * Stages items using the same flow as `create()` or `updateItem()`.
   *
   * With `commit: true` the session is committed even when `items` is empty,
   * so calls can be chained without tracking when the last one happens.
   * Items are never refreshed, that would take one round-trip per item.
   *
   * @throws CommitFailedError
   * @throws InvalidArgumentError for an unknown operation
   */
  async addToSession(batch: SessionBatch<TModel, TCreate, TUpdate>): Promise<TModel[]> {
    let items: TModel[]
    switch (batch.operation) {
      case 'create':
        items = []
        for (const data of batch.items) items.push(await this.prepareForCreate(data))
        break
      case 'update':
        items = []
        for (const [item, changes] of batch.items) items.push(await this.applyChangesToItem(item, changes))
        break
      default:
        throw new InvalidArgumentError(`Unsupported operation: ${describeOperation(batch)}`)
    }

    this.session.addAll(items)
    if (batch.commit) await this.safeCommit('Commit failed.')
    return items
  }

  /**
   * @throws NotFoundError when no item has the key
   * @throws CommitFailedError
   */
  async update(key: TKey, data: TUpdate): Promise<TModel> {
    const item = await this.getByKey(key)
    if (item === null) throw new NotFoundError(this.formatKey(key))
    return this.updateItem(item, data)
  }

  /**
   * Same as `update()` for an item that is already loaded.
   * @throws CommitFailedError
   */
  async updateItem(item: TModel, data: TUpdate): Promise<TModel> {
    await this.applyChangesToItem(item, data)
    this.session.add(item)
    await this.safeCommit('Update failed.')
    await this.session.refresh(item)
    return item
  }

  /**
   * @throws NotFoundError when no item has the key
   * @throws CommitFailedError
   */
  async deleteByKey(key: TKey): Promise<void> {
    const item = await this.getByKey(key)
    if (item === null) throw new NotFoundError(this.formatKey(key))
    this.session.delete(item)
    await this.safeCommit('Failed to delete item.')
  }

  /** Reloads the item from the store, dropping uncommitted edits. */
  async refresh(item: TModel): Promise<void> {
    await this.session.refresh(item)
  }

  // ==========================================================================
  // Hooks
  // ==========================================================================

  /**
   * Converts creation input into a new, unsaved entity.
   * Override to derive fields or fill defaults.
   */
  protected prepareForCreate(data: TCreate): TModel | Promise<TModel> {
    const values = this.model.createSchema.parse(data)
    return Object.assign(new this.model.entity(), values)
  }

  /**
   * Converts update input into the fields to change. Fields the caller did
   * not set are left out, never reset; `null` is kept as an explicit value.
   * Keys missing from `data` are skipped even when the schema fills in a default.
   */
  protected prepareForUpdate(data: TUpdate): Partial<TModel> | Promise<Partial<TModel>> {
    const parsed = this.model.updateSchema.parse(data)
    const provided = isRecord(data) ? data : null
    const changes: Partial<TModel> = {}
    for (const key of Object.keys(parsed)) {
      if (!isOwnKey(parsed, key)) continue
      if (provided && !Object.prototype.hasOwnProperty.call(provided, key)) continue
      const value = parsed[key]
      if (value !== undefined) changes[key] = value
    }
    return changes
  }

  /** Applies changes in place without committing; returns the same item. */
  protected async applyChangesToItem(item: TModel, data: TUpdate): Promise<TModel> {
    const changes = await this.prepareForUpdate(data)
    return Object.assign(item, changes)
  }

  /**
   * @throws InvalidArgumentError when the key has an unrecognized shape
   */
  formatKey(key: TKey): string {
    return formatPrimaryKey(key)
  }

  /**
   * Commits the session, rolling it back when the commit fails so the
   * service stays usable.
   * @throws CommitFailedError
   */
  protected async safeCommit(message: string): Promise<void> {
    try {
      await this.session.commit()
      this.logger.debug(`${this.modelName}: committed`)
    } catch (error) {
      try {
        await this.session.rollback()
      } catch (rollbackError) {
        this.logger.error(`${this.modelName}: rollback failed`, rollbackError)
      }
      this.logger.error(`${this.modelName}: ${message}`, error)
      throw new CommitFailedError(message, error)
    }
  }

  private describe(where: Where<TModel>): string {
    return `${this.modelName} where ${describeWhere(where)}`
  }
}

function isOwnKey<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(value, key)
}

function describeOperation(batch: unknown): string {
  return isRecord(batch) ? String(batch.operation) : String(batch)
}
