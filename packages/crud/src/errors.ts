/**
 * Service Errors
 */

export class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ServiceError'
  }
}

export class NotFoundError extends ServiceError {
  /** Rendering of the key or filter that matched nothing */
  readonly subject: string

  constructor(subject: string, message = `Not found: ${subject}`) {
    super(message)
    this.name = 'NotFoundError'
    this.subject = subject
  }
}

/** A single-row lookup matched more than one row: the filter is not unique. */
export class MultipleResultsFoundError extends ServiceError {
  constructor(message = 'Multiple items matched the where clause.') {
    super(message)
    this.name = 'MultipleResultsFoundError'
  }
}

export class CommitFailedError extends ServiceError {
  constructor(message: string, cause: unknown) {
    super(message, { cause })
    this.name = 'CommitFailedError'
  }
}

export class InvalidArgumentError extends ServiceError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}
