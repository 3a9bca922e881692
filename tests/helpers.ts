import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { createRunContext } from '../src/core/context.js'
import type { RunContextOptions } from '../src/core/context.js'
import type { ApprovalGate } from '../src/core/gate.js'
import type { LogLevel } from '../src/core/logger.js'
import type { Decision, Logger, RunContext } from '../src/types.js'

export async function makeTmpDir(prefix = 'installer-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export interface MemoryLogger extends Logger {
  entries: { level: LogLevel; msg: string }[]
  messages(level?: LogLevel): string[]
}

export function memoryLogger(): MemoryLogger {
  const entries: { level: LogLevel; msg: string }[] = []
  const push = (level: LogLevel) => (msg: string) => {
    entries.push({ level, msg })
  }
  return {
    entries,
    messages(level) {
      return entries.filter(e => level === undefined || e.level === level).map(e => e.msg)
    },
    info: push('info'),
    verbose: push('verbose'),
    success: push('success'),
    warn: push('warn'),
    error: push('error'),
  }
}

export interface TestContext {
  ctx: RunContext
  logger: MemoryLogger
}

/**
 * Run context over `<tmp>/state` with run id `run1`, no privileged roots and a
 * memory logger.
 */
export function testContext(tmp: string, opts: RunContextOptions = {}): TestContext {
  const logger = memoryLogger()
  const ctx = createRunContext({
    stateDir: path.join(tmp, 'state'),
    runId: 'run1',
    privilegedRoots: [],
    logger,
    ...opts,
  })
  return { ctx, logger }
}

/**
 * Answers from a script; an exhausted script declines.
 */
export class ScriptedGate implements ApprovalGate {
  readonly calls: string[] = []

  constructor(private readonly confirms: Decision[] = [], private readonly phrases: string[] = []) {}

  static approving(): ScriptedGate {
    return new ScriptedGate(Array<Decision>(20).fill('approved'), Array<string>(20).fill('REVERSE'))
  }

  async confirm(title: string): Promise<Decision> {
    this.calls.push(`confirm:${title}`)
    return this.confirms.shift() ?? 'declined'
  }

  async confirmPhrase(_message: string, phrase: string): Promise<Decision> {
    this.calls.push(`phrase:${phrase}`)
    return this.phrases.shift() === phrase ? 'approved' : 'declined'
  }
}

/**
 * Relative path -> 'dir', 'link:<target>' or file content, for comparing
 * whole trees.
 */
export async function treeOf(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {}
  const walk = async (dir: string) => {
    for (const name of (await fs.readdir(dir)).sort()) {
      const abs = path.join(dir, name)
      const rel = path.relative(root, abs)
      const st = await fs.lstat(abs)
      if (st.isSymbolicLink()) {
        out[rel] = `link:${await fs.readlink(abs)}`
      } else if (st.isDirectory()) {
        out[rel] = 'dir'
        await walk(abs)
      } else {
        out[rel] = await fs.readFile(abs, 'utf8')
      }
    }
  }
  await walk(root)
  return out
}

export async function caught(fn: () => unknown): Promise<unknown> {
  try {
    await fn()
  } catch (e) {
    return e
  }
  throw new Error('expected an error')
}
