import { asFunction, asValue, type AwilixContainer } from 'awilix'
import type { RecordSession } from './session'

export type SessionFactory = () => RecordSession

export type CrudCradle = {
  openRecordSession: SessionFactory
}

/**
 * CRUD DI registration
 *
 * Registers the session factory services are built with. Resolve services
 * from a request scope (`container.createScope()`); every service gets a
 * session of its own, never shared with another service or request.
 */
export function registerCrud(container: AwilixContainer, opts: { openSession: SessionFactory }): void {
  container.register({
    openRecordSession: asValue(opts.openSession),
  })
}

export function registerCrudService<TService>(
  container: AwilixContainer,
  name: string,
  factory: (session: RecordSession) => TService,
): void {
  container.register({
    [name]: asFunction(({ openRecordSession }: CrudCradle) => factory(openRecordSession())).scoped(),
  })
}
