import { describe, it, expect, beforeEach, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'path'

import { createFileLogger, installLogPath, tryAppendAudit } from '../src/core/audit.js'
import { createRunContext, formatRunId, uniqueRunId } from '../src/core/context.js'
import { createConsoleLogger, fanOut, formatTagged } from '../src/core/logger.js'
import type { Result } from '../src/types.js'
import { makeTmpDir, memoryLogger, testContext } from './helpers.js'

describe('run context', () => {
  let tmp: string

  beforeEach(async () => {
    tmp = await makeTmpDir('context-test-')
  })

  it('names runs by local time', () => {
    expect(formatRunId(new Date(2024, 0, 5, 9, 3, 7))).toBe('20240105-090307')
  })

  it('suffixes a run id whose directory already exists', async () => {
    await fs.ensureDir(path.join(tmp, '20240105-090307'))
    await fs.ensureDir(path.join(tmp, '20240105-090307-2'))

    expect(uniqueRunId(tmp, '20240105-090307')).toBe('20240105-090307-3')
    expect(uniqueRunId(tmp, '20240105-100000')).toBe('20240105-100000')
  })

  it('is frozen and derives the journal path from the state directory', () => {
    const ctx = createRunContext({ stateDir: path.join(tmp, 'st'), logger: memoryLogger(), now: new Date(2024, 0, 5, 9, 3, 7) })

    expect(ctx.journalPath).toBe(path.join(tmp, 'st', 'manifest.txt'))
    expect(ctx.runId).toBe('20240105-090307')
    expect(ctx.dryRun).toBe(false)
    expect(ctx.privilegedRoots).toEqual(['/Applications', '/usr'])
    expect(Object.isFrozen(ctx)).toBe(true)
  })

  it('attaches the install log only for a real install', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const stateDir = path.join(tmp, 'st')

    createRunContext({ stateDir, reverseMode: true }).logger.info('previewing')
    createRunContext({ stateDir, dryRun: true }).logger.info('simulating')
    expect(fs.pathExistsSync(installLogPath({ stateDir }))).toBe(false)

    createRunContext({ stateDir }).logger.info('installing')
    expect(write).toHaveBeenCalledTimes(3)
    write.mockRestore()

    expect(fs.readFileSync(installLogPath({ stateDir }), 'utf8')).toMatch(/\] INFO installing\n$/)
  })
})

describe('logging', () => {
  it('pads level tags to a fixed width', () => {
    expect(formatTagged('info', 'hello')).toBe('[INFO]    hello')
    expect(formatTagged('verbose', 'x')).toBe('[VERBOSE] x')
  })

  it('sends errors to stderr and everything else to stdout', () => {
    const out: string[] = []
    const err: string[] = []
    const logger = createConsoleLogger({
      stdout: { write: (s: string) => out.push(s) > 0 },
      stderr: { write: (s: string) => err.push(s) > 0 },
    })

    logger.success('done')
    logger.error('bad')

    expect(out).toEqual(['[OK]      done\n'])
    expect(err).toEqual(['[ERROR]   bad\n'])
  })

  it('fans out to every sink', () => {
    const a = memoryLogger()
    const b = memoryLogger()

    fanOut(a, b).warn('careful')

    expect(a.entries).toEqual([{ level: 'warn', msg: 'careful' }])
    expect(b.entries).toEqual([{ level: 'warn', msg: 'careful' }])
  })

  it('appends timestamped lines to the log file', async () => {
    const tmp = await makeTmpDir('log-test-')
    const file = installLogPath({ stateDir: tmp })
    const logger = createFileLogger(file, () => new Date('2024-01-05T09:03:07.000Z'))

    logger.info('first')
    logger.verbose('second')

    expect(await fs.readFile(file, 'utf8')).toBe(
      '[2024-01-05T09:03:07.000Z] INFO first\n[2024-01-05T09:03:07.000Z] VERBOSE second\n',
    )
  })
})

describe('audit', () => {
  const result = (): Result => ({
    ok: true,
    operation: 'install',
    dryRun: false,
    startedAt: '2024-01-05T09:03:07.000Z',
    finishedAt: '2024-01-05T09:03:08.000Z',
    durationMs: 1000,
    steps: [],
    warnings: [],
    errors: [],
  })

  it('turns a write failure into a warning', async () => {
    const tmp = await makeTmpDir('audit-test-')
    // A file where the state directory should be.
    await fs.writeFile(path.join(tmp, 'state'), '')
    const { ctx, logger } = testContext(tmp)

    const r = await tryAppendAudit(ctx, result())

    expect(r.warnings).toHaveLength(1)
    expect(r.warnings[0]).toMatch(/^Failed to write audit log: /)
    expect(logger.messages('warn')).toHaveLength(1)
  })
})
