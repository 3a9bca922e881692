import { execa } from 'execa'
import path from 'path'

import type { Executor } from './fs-ops.js'
import { localExecutor } from './fs-ops.js'
import type { RunContext } from '../types.js'

async function sudo(args: string[], input?: string) {
  await execa('sudo', args, input === undefined ? {} : { input, stdout: 'ignore' })
}

function octal(mode: number) {
  return mode.toString(8)
}

/**
 * Runs every operation through `sudo` so the invoking user can touch system
 * directories. The installer itself is never run as root.
 */
export const elevatedExecutor: Executor = {
  elevated: true,
  async mkdirp(dir, mode) {
    await sudo(['mkdir', '-p', dir])
    if (mode !== undefined) await sudo(['chmod', octal(mode), dir])
  },
  async writeFile(file, content, mode) {
    await sudo(['mkdir', '-p', path.dirname(file)])
    await sudo(['tee', file], content)
    if (mode !== undefined) await sudo(['chmod', octal(mode), file])
  },
  async copy(from, to) {
    await sudo(['mkdir', '-p', path.dirname(to)])
    await sudo(['cp', '-a', from, to])
  },
  async symlink(target, linkPath) {
    await sudo(['mkdir', '-p', path.dirname(linkPath)])
    await sudo(['ln', '-sfn', target, linkPath])
  },
  async remove(p) {
    await sudo(['rm', '-rf', p])
  },
}

export function isUnderRoot(p: string, root: string): boolean {
  const target = path.resolve(p)
  const base = path.resolve(root)
  return target === base || target.startsWith(base.endsWith(path.sep) ? base : base + path.sep)
}

/**
 * Chooses the executor for a single path. Callers ask for every mutation
 * separately; the answer depends only on the path prefix.
 */
export class PrivilegeStrategy {
  constructor(
    private readonly roots: readonly string[],
    private readonly local: Executor = localExecutor,
    private readonly elevated: Executor = elevatedExecutor,
  ) {}

  static fromContext(ctx: RunContext): PrivilegeStrategy {
    return new PrivilegeStrategy(ctx.privilegedRoots)
  }

  requiresElevation(p: string): boolean {
    return this.roots.some(root => isUnderRoot(p, root))
  }

  executorFor(p: string): Executor {
    return this.requiresElevation(p) ? this.elevated : this.local
  }
}
