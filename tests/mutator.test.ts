import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'path'

import { isInstallerError } from '../src/core/errors.js'
import type { Executor } from '../src/core/fs-ops.js'
import { localExecutor } from '../src/core/fs-ops.js'
import { GuardedMutator } from '../src/core/mutator.js'
import { PrivilegeStrategy } from '../src/core/privilege.js'
import type { RunContext } from '../src/types.js'
import { caught, makeTmpDir, testContext, treeOf } from './helpers.js'

describe('GuardedMutator', () => {
  let tmp: string
  let root: string

  beforeEach(async () => {
    tmp = await makeTmpDir('mutator-test-')
    root = path.join(tmp, 'root')
    await fs.ensureDir(root)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('journals missing parents outermost first, then the file', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'a', 'b', 'f.txt')

    await m.writeFile(file, 'hello')

    expect(await fs.readFile(file, 'utf8')).toBe('hello')
    expect(m.journal.readAll()).toEqual([
      { kind: 'DirCreated', targetPath: path.join(root, 'a') },
      { kind: 'DirCreated', targetPath: path.join(root, 'a', 'b') },
      { kind: 'FileCreated', targetPath: file },
    ])
  })

  it('backs up an existing file before overwriting it', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'f.txt')
    await fs.writeFile(file, 'A')

    const record = await m.writeFile(file, 'B', { mode: 0o600 })

    const backupPath = path.join(tmp, 'state', 'run1', file.replace(/^\/+/, ''))
    expect(record).toEqual({ kind: 'FileModified', targetPath: file, backupPath })
    expect(await fs.readFile(file, 'utf8')).toBe('B')
    expect((await fs.stat(file)).mode & 0o777).toBe(0o600)
    expect(await fs.readFile(backupPath, 'utf8')).toBe('A')
  })

  it('persists the record before the writer runs', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'f.txt')
    let seen = ''

    await m.mutateFile(file, async (p) => {
      seen = await fs.readFile(ctx.journalPath, 'utf8')
      await fs.writeFile(p, 'x')
    })

    expect(seen).toBe(`CREATED|${file}\n`)
  })

  it('keeps the journal entry when the mutation fails', async () => {
    const { ctx, logger } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'f.txt')

    const err = await caught(() => m.mutateFile(file, async () => {
      throw new Error('disk on fire')
    }, 'write config'))

    expect(isInstallerError(err, 'MutationFailed')).toBe(true)
    expect(isInstallerError(err) && err.action).toBe('write config')
    expect(m.journal.readAll()).toEqual([{ kind: 'FileCreated', targetPath: file }])
    expect(logger.messages('error')).toEqual([`Failed to write config: ${file}: disk on fire`])
  })

  it('never touches the target when the backup fails', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'f.txt')
    await fs.writeFile(file, 'A')
    vi.spyOn(fs, 'copy').mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied')
    })

    const err = await caught(() => m.writeFile(file, 'B'))

    expect(isInstallerError(err, 'BackupFailed')).toBe(true)
    expect(await fs.readFile(file, 'utf8')).toBe('A')
    expect(m.journal.exists()).toBe(false)
  })

  it('leaves existing directories and files alone', async () => {
    const { ctx, logger } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const file = path.join(root, 'config.json')
    await fs.writeFile(file, '{"mine":true}')

    expect(await m.ensureDirectory(root)).toBeUndefined()
    expect(await m.writeFileIfAbsent(file, '{}')).toBeUndefined()

    expect(await fs.readFile(file, 'utf8')).toBe('{"mine":true}')
    expect(m.journal.exists()).toBe(false)
    expect(logger.messages('verbose')).toEqual([`Exists:  ${root}`, `${file} already exists (preserved)`])
  })

  it('creates directories with the requested mode', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const dir = path.join(root, 'private')

    expect(await m.ensureDirectory(dir, { mode: 0o700 })).toEqual({ kind: 'DirCreated', targetPath: dir })
    expect((await fs.stat(dir)).mode & 0o777).toBe(0o700)
  })

  it('replaces a directory with a copy and journals it as a directory', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const src = path.join(tmp, 'bundle')
    const dest = path.join(root, 'app')
    await fs.outputFile(path.join(src, 'main.js'), 'new')
    await fs.outputFile(path.join(dest, 'stale.js'), 'old')

    const record = await m.copyInto(src, dest)

    expect(record.kind).toBe('DirModified')
    expect(await treeOf(dest)).toEqual({ 'main.js': 'new' })
  })

  it('journals what was replaced, not what replaces it', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const src = path.join(tmp, 'single.conf')
    const dest = path.join(root, 'conf')
    await fs.writeFile(src, 'flat')
    await fs.outputFile(path.join(dest, 'nested.conf'), 'old')

    const record = await m.copyInto(src, dest)

    expect(record).toEqual({
      kind: 'DirModified',
      targetPath: dest,
      backupPath: path.join(tmp, 'state', 'run1', dest.replace(/^\/+/, '')),
    })
    expect(await fs.readFile(dest, 'utf8')).toBe('flat')
  })

  it('creates a symlink as a file record', async () => {
    const { ctx } = testContext(tmp)
    const m = new GuardedMutator(ctx)
    const link = path.join(root, 'bin', 'app')

    await m.symlink(link, '/opt/app/launcher')

    expect(await fs.readlink(link)).toBe('/opt/app/launcher')
    expect(m.journal.readAll().map(r => r.kind)).toEqual(['DirCreated', 'FileCreated'])
  })

  it('hands the writer the executor chosen for the path', async () => {
    const { ctx, logger } = testContext(tmp)
    const used: string[] = []
    const elevated: Executor = {
      ...localExecutor,
      elevated: true,
      async writeFile(file, content, mode) {
        used.push(file)
        await localExecutor.writeFile(file, content, mode)
      },
    }
    const sys = path.join(root, 'sys')
    const m = new GuardedMutator(ctx, { privilege: new PrivilegeStrategy([sys], localExecutor, elevated) })

    await m.writeFile(path.join(sys, 'a.conf'), 'a')
    await m.writeFile(path.join(root, 'b.conf'), 'b')

    expect(used).toEqual([path.join(sys, 'a.conf')])
    expect(logger.messages('verbose')).toContain(`  Executing (sudo): write file: ${path.join(sys, 'a.conf')}`)
    expect(logger.messages('verbose')).toContain(`  Executing: write file: ${path.join(root, 'b.conf')}`)
  })

  describe('dry-run', () => {
    const scenario = async (ctx: RunContext) => {
      const m = new GuardedMutator(ctx)
      await m.ensureDirectory(path.join(root, 'D'))
      await m.writeFile(path.join(root, 'D', 'x.txt'), 'x')
      await m.writeFile(path.join(root, 'F'), 'B')
      await m.writeFile(path.join(root, 'F'), 'C')
      await m.writeFileIfAbsent(path.join(root, 'D', 'x.txt'), 'again')
      await m.symlink(path.join(root, 'L'), path.join(root, 'F'))
      return m
    }

    it('changes nothing on disk and journals the same records as a real run', async () => {
      await fs.writeFile(path.join(root, 'F'), 'A')
      const before = await treeOf(root)

      const dry = testContext(tmp, { dryRun: true })
      const dryMutator = await scenario(dry.ctx)

      expect(await treeOf(root)).toEqual(before)
      expect(await fs.pathExists(path.join(tmp, 'state'))).toBe(false)

      const real = testContext(tmp)
      const realMutator = await scenario(real.ctx)

      expect(dryMutator.journal.pending()).toEqual(realMutator.journal.readAll())
      const intents = (l: typeof dry.logger) => l.messages('verbose').filter(m => m.startsWith('Intent: '))
      expect(intents(dry.logger)).toEqual(intents(real.logger))
      expect(dry.logger.messages('info')).toContain(`[DRY-RUN] Would write file: ${path.join(root, 'F')}`)
    })

    it('sees directories a builder declared as already built', async () => {
      const build = async (ctx: RunContext) => {
        const m = new GuardedMutator(ctx)
        const app = path.join(root, 'App')
        await m.mutateDirectory(app, (p, exec) => exec.mkdirp(path.join(p, 'inner')))
        m.declareBuilt([path.join(app, 'inner')])
        await m.writeFile(path.join(app, 'inner', 'run'), '#!/bin/sh')
        return m
      }

      const dryMutator = await build(testContext(tmp, { dryRun: true }).ctx)
      const realMutator = await build(testContext(tmp).ctx)

      expect(dryMutator.journal.pending()).toEqual([
        { kind: 'DirCreated', targetPath: path.join(root, 'App') },
        { kind: 'FileCreated', targetPath: path.join(root, 'App', 'inner', 'run') },
      ])
      expect(realMutator.journal.readAll()).toEqual(dryMutator.journal.pending())
    })
  })
})
