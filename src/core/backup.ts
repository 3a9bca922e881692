import path from 'path'

import { backupRunDir } from './context.js'
import { errorMessage, InstallerError } from './errors.js'
import { copyPreserving } from './fs-ops.js'
import { lexists, lstatOrUndefined } from './fs.js'
import type { RunContext } from '../types.js'

export type BackupResult =
  | { preserved: false }
  | { preserved: true; backupPath: string; isDirectory: boolean }

export const LAYERS_DIRNAME = '.layers'

function related(a: string, b: string) {
  return a === b || a.startsWith(b + path.sep) || b.startsWith(a + path.sep)
}

/**
 * Pre-mutation snapshots for one run, under `<stateDir>/<runId>/` mirroring
 * each absolute path. A path that overlaps an earlier snapshot of this run
 * (same path, ancestor or descendant) goes to the next layer,
 * `<runDir>/.layers/<n>/`, so snapshots never nest inside each other.
 *
 * Backups are never deleted here, nor by reversal.
 */
export class BackupStore {
  readonly runDir: string
  private readonly layers: string[][] = []
  /**
   * Dry-run only: paths earlier simulated mutations would have created.
   */
  private readonly simulated = new Map<string, { isDirectory: boolean }>()

  constructor(private readonly ctx: RunContext) {
    this.runDir = backupRunDir(ctx)
  }

  private layerRoot(n: number) {
    return n === 0 ? this.runDir : path.join(this.runDir, LAYERS_DIRNAME, String(n))
  }

  private claimLocation(targetAbs: string): string {
    let n = 0
    while (this.layers[n]?.some(taken => related(taken, targetAbs))) n++
    ;(this.layers[n] ??= []).push(targetAbs)
    return path.join(this.layerRoot(n), targetAbs.replace(/^[/\\]+/, ''))
  }

  /**
   * Marks a path as present for the rest of a dry-run.
   */
  recordSimulated(targetAbs: string, isDirectory: boolean) {
    if (this.ctx.dryRun) this.simulated.set(path.resolve(targetAbs), { isDirectory })
  }

  async exists(targetAbs: string): Promise<boolean> {
    return this.simulated.has(path.resolve(targetAbs)) || await lexists(targetAbs)
  }

  async snapshot(target: string): Promise<BackupResult> {
    const targetAbs = path.resolve(target)
    const { logger } = this.ctx
    if (targetAbs === path.parse(targetAbs).root) {
      throw new InstallerError('BackupFailed', `Refusing to snapshot filesystem root ${targetAbs}`, {
        targetPath: targetAbs,
        action: 'snapshot',
      })
    }

    const st = await lstatOrUndefined(targetAbs).catch((e: unknown) => {
      throw new InstallerError('BackupFailed', `Cannot inspect ${targetAbs} before backup: ${errorMessage(e)}`, {
        targetPath: targetAbs,
        action: 'snapshot',
        cause: e,
      })
    })
    const sim = this.simulated.get(targetAbs)

    if (!st && !sim) {
      logger.verbose(`No existing path to back up: ${targetAbs}`)
      return { preserved: false }
    }

    const isDirectory = st ? st.isDirectory() : sim?.isDirectory ?? false
    const backupPath = this.claimLocation(targetAbs)

    if (this.ctx.dryRun) {
      logger.verbose(`[DRY-RUN] Would back up: ${targetAbs} -> ${backupPath}`)
      return { preserved: true, backupPath, isDirectory }
    }

    try {
      await copyPreserving(targetAbs, backupPath)
    } catch (e) {
      throw new InstallerError('BackupFailed', `Failed to back up ${targetAbs} to ${backupPath}: ${errorMessage(e)}`, {
        targetPath: targetAbs,
        action: 'snapshot',
        cause: e,
      })
    }
    logger.verbose(`Backed up${isDirectory ? ' directory' : ''}: ${targetAbs} -> ${backupPath}`)
    return { preserved: true, backupPath, isDirectory }
  }
}
