import type { Executable } from './statement'
import type { EntityConstructor, PrimaryKey } from './types'

/**
 * Unit of work a service owns exclusively.
 *
 * Strategies:
 * - `MikroOrmSession`: a forked MikroORM EntityManager
 * - `MemorySession`: in-process store, for tests and prototyping
 */
export interface RecordSession {
  /** Stage an instance for the next commit */
  add(item: object): void
  addAll(items: readonly object[]): void
  /** Stage a deletion for the next commit */
  delete(item: object): void
  /** Persist staged changes; rejects with the underlying failure */
  commit(): Promise<void>
  /** Drop staged changes after a failed commit */
  rollback(): Promise<void>
  /** Reload an instance from the store, discarding uncommitted edits */
  refresh(item: object): Promise<void>
  /** Primary key lookup; `null` when absent */
  get<T extends object>(entity: EntityConstructor<T>, key: PrimaryKey): Promise<T | null>
  /** Run a select; rows come back in query order */
  execute<TRow>(statement: Executable<TRow>): Promise<TRow[]>
}
