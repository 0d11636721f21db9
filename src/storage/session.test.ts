import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import Database from 'better-sqlite3'
import { openSession, type OpenOptions, type Session } from './session.js'
import { SqlSchema } from './schema.js'
import { FallbackVersionStore, PragmaVersionStore, type VersionReader } from './version.js'
import { SessionError } from './errors.js'
import type { Handle } from './interface.js'

const ROOT = 'CREATE TABLE t ( foo TEXT, bar NUMERIC )'
const RENAME = `
ALTER TABLE t RENAME TO p;
ALTER TABLE p ADD COLUMN extra TEXT;
`

class CountingReader implements VersionReader {
  applicationIdCalls = 0
  userVersionCalls = 0

  constructor(private readonly applicationId: number) {}

  getApplicationId(_handle: Handle): number {
    this.applicationIdCalls++
    return this.applicationId
  }

  getUserVersion(_handle: Handle): number {
    this.userVersionCalls++
    return 2
  }
}

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected function to throw')
}

function tables(handle: Handle): string[] {
  return handle
    .all<{ name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
    .map((row) => row.name)
}

/** Write a database outside the session layer, as another program would. */
function seed(file: string, sql: string): void {
  const db = new Database(file)
  try {
    db.exec(sql)
  } finally {
    db.close()
  }
}

describe('openSession', () => {
  let tempDir: string
  let file: string
  const opened: Session[] = []
  const store = new PragmaVersionStore()

  function open(options: Omit<OpenOptions, 'file'> & { file?: string }): Session {
    const session = openSession({ file, ...options })
    opened.push(session)
    return session
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'localdb-session-test-'))
    file = join(tempDir, 'test.db')
  })

  afterEach(() => {
    for (const session of opened.splice(0)) {
      session.close()
    }
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should create a database at version 1 with the schema id', () => {
    const schema = new SqlSchema(ROOT)

    const session = open({ schema })

    expect(store.getApplicationId(session.handle())).toBe(schema.applicationId)
    expect(store.getUserVersion(session.handle())).toBe(1)
    expect(session.applicationId).toBe(schema.applicationId)
    expect(session.schemaVersion).toBe(1)
    expect(session.file).toBe(file)
    expect(tables(session.handle())).toEqual(['t'])
  })

  it('should upgrade an existing database to the latest version', () => {
    const first = open({ schema: new SqlSchema(ROOT) })
    first.close()

    const schema = new SqlSchema(ROOT).defineUpgrade(2, RENAME)
    const session = open({ schema })

    session.handle().run('INSERT INTO p (foo, bar, extra) VALUES (?, ?, ?)', ['f', 2, 'foobar'])
    expect(store.getUserVersion(session.handle())).toBe(2)
    expect(store.getApplicationId(session.handle())).toBe(schema.applicationId)
  })

  it('should reopen a current database without changes', () => {
    const schema = new SqlSchema(ROOT)
    const first = open({ schema })
    first.handle().run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['kept', 1])
    first.close()

    const again = open({ schema })

    expect(store.getUserVersion(again.handle())).toBe(1)
    expect(again.handle().all('SELECT foo FROM t')).toEqual([{ foo: 'kept' }])
  })

  it('should leave the database as found when an upgrade fails', () => {
    const first = open({ schema: new SqlSchema(ROOT) })
    first.close()

    const broken = new SqlSchema(ROOT)
      .defineUpgrade(2, 'CREATE TABLE u (c TEXT);')
      .defineUpgrade(3, 'ALTER TABLE nowhere RENAME TO v;')
    expect(() => openSession({ file, schema: broken })).toThrow('no such table: nowhere')

    const after = open({ schema: new SqlSchema(ROOT) })
    expect(store.getUserVersion(after.handle())).toBe(1)
    expect(tables(after.handle())).toEqual(['t'])
  })

  it('should refuse a database created for another schema', () => {
    const other = open({ schema: new SqlSchema('CREATE TABLE other (c TEXT)') })
    const otherId = other.applicationId
    other.close()

    const err = thrown(() => openSession({ file, schema: new SqlSchema(ROOT) }))

    expect(err).toBeInstanceOf(SessionError)
    expect(err).toMatchObject({ code: 'IDENTITY_MISMATCH' })

    const check = open({ schema: new SqlSchema('CREATE TABLE other (c TEXT)') })
    expect(check.applicationId).toBe(otherId)
    expect(store.getApplicationId(check.handle())).toBe(otherId)
  })

  it('should refuse a database newer than the schema', () => {
    const newer = open({ schema: new SqlSchema(ROOT).defineUpgrade(2, RENAME) })
    newer.close()

    expect(thrown(() => openSession({ file, schema: new SqlSchema(ROOT) }))).toMatchObject({
      code: 'VERSION_TOO_NEW',
      message: 'user_version (2) is higher than the schema version (1)',
    })
  })

  it('should adopt a legacy database through a fallback reader, once', () => {
    seed(file, 'CREATE TABLE p (foo TEXT, bar NUMERIC, extra TEXT)')

    const schema = new SqlSchema(ROOT).defineUpgrade(2, RENAME).defineUpgrade(3, 'ALTER TABLE p ADD COLUMN more TEXT')
    const reader = new CountingReader(schema.applicationId)
    const legacy = new FallbackVersionStore(new PragmaVersionStore(), reader)

    const session = open({ schema, versionStore: legacy })

    expect(reader.applicationIdCalls).toBe(1)
    expect(reader.userVersionCalls).toBe(1)
    session.handle().run('INSERT INTO p (foo, bar, extra, more) VALUES (?, ?, ?, ?)', ['f', 2, 'foo', 'bar'])
    expect(legacy.getApplicationId(session.handle())).toBe(schema.applicationId)
    expect(legacy.getUserVersion(session.handle())).toBe(3)
    session.close()

    open({ schema, versionStore: legacy })

    expect(reader.applicationIdCalls).toBe(1)
    expect(reader.userVersionCalls).toBe(1)
  })

  describe('backups', () => {
    let backupDir: string

    beforeEach(() => {
      backupDir = join(tempDir, 'backups')
    })

    it('should copy the database before upgrading it', () => {
      const first = open({ schema: new SqlSchema(ROOT) })
      first.handle().run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['before', 1])
      first.close()
      const original = readFileSync(file)

      open({ schema: new SqlSchema(ROOT).defineUpgrade(2, RENAME), backupDir })

      expect(readFileSync(join(backupDir, 'test.before_v2_upgrade.db')).equals(original)).toBe(true)
    })

    it('should not back up a database that is already current', () => {
      const schema = new SqlSchema(ROOT)
      const first = open({ schema })
      first.close()

      open({ schema, backupDir })

      expect(existsSync(backupDir)).toBe(false)
    })

    it('should not upgrade when the backup cannot be written', () => {
      const first = open({ schema: new SqlSchema(ROOT) })
      first.close()
      writeFileSync(backupDir, 'not a directory')

      const upgrade = new SqlSchema(ROOT).defineUpgrade(2, RENAME)
      const err = thrown(() => openSession({ file, schema: upgrade, backupDir }))

      expect(err).toMatchObject({ code: 'BACKUP_FAILED' })

      const check = open({ schema: new SqlSchema(ROOT) })
      expect(store.getUserVersion(check.handle())).toBe(1)
    })

    it('should never back up an in-memory database', () => {
      const session = open({
        schema: new SqlSchema(ROOT),
        backupDir,
        connectionOptions: { mode: 'memory' },
      })

      expect(session.schemaVersion).toBe(1)
      expect(existsSync(backupDir)).toBe(false)
    })
  })

  it('should keep the session schema apart from later registrations', () => {
    const schema = new SqlSchema(ROOT)
    const session = open({ schema })

    schema.defineUpgrade(2, RENAME)

    expect(session.schemaVersion).toBe(1)
  })

  it('should apply explicit connection options over embedded ones', () => {
    const session = open({
      schema: new SqlSchema(ROOT),
      file: `${file}?_foreign_keys=off`,
      connectionOptions: { _foreign_keys: 'on' },
    })

    expect(session.handle().get('PRAGMA foreign_keys')).toEqual({ foreign_keys: 1 })
    expect(session.file).toBe(file)
  })

  it('should record when the session was opened', () => {
    const before = Date.now()
    const session = open({ schema: new SqlSchema(ROOT) })

    expect(session.openedAt.getTime()).toBeGreaterThanOrEqual(before)
    expect(session.openedAt.getTime()).toBeLessThanOrEqual(Date.now())
  })

  it('should cache statements on the root handle', async () => {
    const session = open({ schema: new SqlSchema(ROOT) })

    const insert = await session.statements.prepare('INSERT INTO t (foo, bar) VALUES (?, ?)')
    insert.run(['a', 1])
    expect(await session.statements.prepare('INSERT INTO t (foo, bar) VALUES (?, ?)')).toBe(insert)

    session.close()
    expect(insert.isClosed).toBe(true)
  })

  it('should run transactions against the opened database', () => {
    const session = open({ schema: new SqlSchema(ROOT) })

    session.wrapTx((tx) => {
      tx.run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['in tx', 1])
    })
    expect(() =>
      session.wrapTx((tx) => {
        tx.run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['lost', 2])
        throw new Error('abort')
      }),
    ).toThrow('abort')

    expect(session.handle().all('SELECT foo FROM t')).toEqual([{ foo: 'in tx' }])
  })

  it('should keep root writes out of a transaction whose work is asynchronous', async () => {
    const session = open({ schema: new SqlSchema(ROOT) })
    let openGate: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      openGate = resolve
    })
    const pending: Promise<void>[] = []

    const err = thrown(() =>
      session.wrapTx((tx) => {
        const task = (async () => {
          tx.run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['tx', 1])
          await gate
          throw new Error('abort')
        })()
        pending.push(task)
        return task
      }),
    )
    session.handle().run('INSERT INTO t (foo, bar) VALUES (?, ?)', ['root', 2])
    openGate()

    expect(err).toMatchObject({ code: 'ASYNC_WORK' })
    await expect(pending[0]).rejects.toThrow('abort')
    expect(session.handle().all('SELECT foo FROM t')).toEqual([{ foo: 'root' }])
  })
})
