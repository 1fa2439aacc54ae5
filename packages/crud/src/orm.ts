import 'reflect-metadata'
import { MikroORM, type Options } from '@mikro-orm/postgresql'
import { getDatabaseUrl, parseDatabaseUrl } from '@recordkit/shared/lib/db/connection'
import { createLogger, isDebugEnabled } from '@recordkit/shared/lib/logger'
import { MikroOrmSession } from './strategies/mikroOrm'

const logger = createLogger('orm')

export type CreateOrmOptions = {
  entities: NonNullable<Options['entities']>
  /** Defaults to `getDatabaseUrl()` */
  clientUrl?: string
  /** SQL logging. Defaults to `RECORDKIT_DEBUG` enabling the `orm` scope */
  debug?: boolean
}

/**
 * Initializes MikroORM for PostgreSQL. Schema management stays with the
 * caller (migrations, `orm.schema`).
 */
export async function createOrm(options: CreateOrmOptions) {
  const clientUrl = options.clientUrl ?? getDatabaseUrl()
  // throws on a malformed URL; user and password are never logged
  const { host, port, dbName } = parseDatabaseUrl(clientUrl)
  logger.debug(`Connecting to ${host}:${port}/${dbName ?? ''}`)
  return MikroORM.init({
    entities: options.entities,
    clientUrl,
    debug: options.debug ?? isDebugEnabled('orm'),
  })
}

/**
 * Session with its own identity map, for exactly one service.
 */
export function openSession(orm: Pick<MikroORM, 'em'>): MikroOrmSession {
  return new MikroOrmSession(orm.em.fork())
}
