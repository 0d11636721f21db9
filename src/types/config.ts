import { Type, type Static } from '@sinclair/typebox'

export const LogLevelSchema = Type.Union([
  Type.Literal('trace'),
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('fatal'),
])

/** Configuration schema for localdb.config.json */
export const LocalDbConfigSchema = Type.Object({
  database: Type.Object({
    path: Type.String({ minLength: 1 }),
    /** Empty disables backups. */
    backupDir: Type.String({ default: '' }),
    connectionOptions: Type.Record(
      Type.String(),
      Type.Union([Type.String(), Type.Number(), Type.Boolean()]),
      { default: {} },
    ),
  }),
  migrations: Type.Object({
    dir: Type.String({ minLength: 1, default: './migrations' }),
  }),
  log: Type.Object({
    level: LogLevelSchema,
  }),
})

export type LocalDbConfig = Static<typeof LocalDbConfigSchema>
