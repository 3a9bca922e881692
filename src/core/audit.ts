import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from './errors.js'
import type { LogLevel } from './logger.js'
import type { Logger, Result, RunContext } from '../types.js'

export function installLogPath(ctx: Pick<RunContext, 'stateDir'>) {
  return path.join(ctx.stateDir, 'install.log')
}

export function auditLogPath(ctx: Pick<RunContext, 'stateDir'>) {
  return path.join(ctx.stateDir, 'audit.log.jsonl')
}

/**
 * Appends `[<iso time>] LEVEL message` lines. Writes are synchronous so the
 * log order always matches the order of the mutations it describes.
 */
export function createFileLogger(logPath: string, now: () => Date = () => new Date()): Logger {
  const write = (level: LogLevel) => (msg: string) => {
    fs.ensureDirSync(path.dirname(logPath))
    fs.appendFileSync(logPath, `[${now().toISOString()}] ${level.toUpperCase()} ${msg}\n`, 'utf8')
  }
  return {
    info: write('info'),
    verbose: write('verbose'),
    success: write('success'),
    warn: write('warn'),
    error: write('error'),
  }
}

export async function appendAudit(logPath: string, result: Result) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(result) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * One JSON line per run. Never fails the run; a write error becomes a warning.
 */
export async function tryAppendAudit(ctx: RunContext, result: Result): Promise<Result> {
  if (ctx.dryRun) return result
  const logPath = auditLogPath(ctx)
  try {
    await appendAudit(logPath, result)
  } catch (e) {
    const msg = errorMessage(e)
    result.warnings.push(`Failed to write audit log: ${msg}`)
    ctx.logger.warn(`Failed to write audit log ${logPath}: ${msg}`)
  }
  return result
}
