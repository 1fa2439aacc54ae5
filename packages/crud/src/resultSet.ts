import { MultipleResultsFoundError, NotFoundError } from './errors'

/**
 * Rows returned by a statement, in query order.
 * @template TRow - Entity for plain selects, tuple for joined ones
 */
export class ResultSet<TRow> implements Iterable<TRow> {
  constructor(private readonly rows: readonly TRow[]) {}

  get length(): number {
    return this.rows.length
  }

  all(): TRow[] {
    return [...this.rows]
  }

  first(): TRow | null {
    return this.rows.length > 0 ? this.rows[0] : null
  }

  /**
   * Exactly one row.
   * @param subject - What was searched for, used in error messages
   */
  one(subject = 'the where clause'): TRow {
    const row = this.oneOrNone(subject)
    if (row === null) throw new NotFoundError(subject, `No items matched ${subject}.`)
    return row
  }

  oneOrNone(subject = 'the where clause'): TRow | null {
    if (this.rows.length > 1) throw new MultipleResultsFoundError(`Multiple items matched ${subject}.`)
    return this.first()
  }

  [Symbol.iterator](): Iterator<TRow> {
    return this.rows[Symbol.iterator]()
  }
}
