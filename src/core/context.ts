import fs from 'fs-extra'
import path from 'path'

import { createFileLogger, installLogPath } from './audit.js'
import { createConsoleLogger, fanOut } from './logger.js'
import type { Logger, RunContext } from '../types.js'

export const DEFAULT_STATE_DIRNAME = '.install-backups'
export const JOURNAL_FILENAME = 'manifest.txt'
export const DEFAULT_PRIVILEGED_ROOTS: readonly string[] = ['/Applications', '/usr']

export interface RunContextOptions {
  dryRun?: boolean
  reverseMode?: boolean
  /**
   * Default: `<cwd>/.install-backups`.
   */
  stateDir?: string
  privilegedRoots?: readonly string[]
  /**
   * Default: console logger, plus `<stateDir>/install.log` for a real install.
   * A reversal attaches the file only once confirmed; see `ReversalDeps`.
   */
  logger?: Logger
  runId?: string
  now?: Date
}

function pad(n: number) {
  return String(n).padStart(2, '0')
}

/**
 * Local time as `YYYYMMDD-HHMMSS`.
 */
export function formatRunId(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
}

/**
 * Suffixes `-2`, `-3`, ... until no run directory of that name exists.
 */
export function uniqueRunId(stateDir: string, base: string): string {
  let id = base
  for (let n = 2; fs.pathExistsSync(path.join(stateDir, id)); n++) {
    id = `${base}-${n}`
  }
  return id
}

export function createRunContext(opts: RunContextOptions = {}): RunContext {
  const dryRun = opts.dryRun ?? false
  const stateDir = path.resolve(opts.stateDir ?? path.join(process.cwd(), DEFAULT_STATE_DIRNAME))
  const runId = opts.runId ?? uniqueRunId(stateDir, formatRunId(opts.now ?? new Date()))
  const reverseMode = opts.reverseMode ?? false
  const logger = opts.logger ?? (dryRun || reverseMode
    ? createConsoleLogger()
    : fanOut(createConsoleLogger(), createFileLogger(installLogPath({ stateDir }))))

  return Object.freeze({
    dryRun,
    reverseMode,
    stateDir,
    journalPath: path.join(stateDir, JOURNAL_FILENAME),
    runId,
    privilegedRoots: Object.freeze([...(opts.privilegedRoots ?? DEFAULT_PRIVILEGED_ROOTS)]),
    logger,
  })
}

export function backupRunDir(ctx: Pick<RunContext, 'stateDir' | 'runId'>) {
  return path.join(ctx.stateDir, ctx.runId)
}
