import path from 'path'

import { BackupStore } from './backup.js'
import { errorMessage, InstallerError, isInstallerError } from './errors.js'
import type { Executor } from './fs-ops.js'
import { isDirectory } from './fs.js'
import { Journal } from './journal.js'
import { PrivilegeStrategy } from './privilege.js'
import type { MutationRecord, RunContext } from '../types.js'

/**
 * Performs the actual change. Receives the absolute target and the executor
 * the privilege strategy picked for it.
 */
export type MutationWriter = (targetAbs: string, exec: Executor) => Promise<void>

export interface GuardedMutatorDeps {
  journal?: Journal
  backups?: BackupStore
  privilege?: PrivilegeStrategy
}

export interface ModeOptions {
  mode?: number
}

type Family = 'file' | 'dir'

/**
 * The only sanctioned way for installer phases to change the filesystem.
 *
 * Every call: snapshot the target, append the journal record, then mutate
 * (or only log, in dry-run). The journal entry is written before the mutation
 * and is kept if the mutation fails, so the journal may over-report intent but
 * never under-reports a completed change.
 */
export class GuardedMutator {
  readonly journal: Journal
  readonly backups: BackupStore
  readonly privilege: PrivilegeStrategy

  constructor(private readonly ctx: RunContext, deps: GuardedMutatorDeps = {}) {
    this.journal = deps.journal ?? new Journal(ctx)
    this.backups = deps.backups ?? new BackupStore(ctx)
    this.privilege = deps.privilege ?? PrivilegeStrategy.fromContext(ctx)
  }

  async mutateFile(target: string, writer: MutationWriter, action = 'write file'): Promise<MutationRecord> {
    return await this.mutate('file', target, writer, action)
  }

  async mutateDirectory(target: string, builder: MutationWriter, action = 'build directory'): Promise<MutationRecord> {
    return await this.mutate('dir', target, builder, action)
  }

  /**
   * Creates the directory (and any missing ancestors, outermost first) with a
   * journal entry each. Returns undefined when it already exists.
   */
  async ensureDirectory(dir: string, opts: ModeOptions = {}): Promise<MutationRecord | undefined> {
    const abs = path.resolve(dir)
    if (await this.backups.exists(abs)) {
      this.ctx.logger.verbose(`Exists:  ${abs}`)
      return undefined
    }
    return await this.mutateDirectory(abs, (p, exec) => exec.mkdirp(p, opts.mode), 'create directory')
  }

  async writeFile(file: string, content: string, opts: ModeOptions = {}): Promise<MutationRecord> {
    return await this.mutateFile(file, (p, exec) => exec.writeFile(p, content, opts.mode))
  }

  /**
   * Leaves an existing file untouched and unjournaled.
   */
  async writeFileIfAbsent(file: string, content: string, opts: ModeOptions = {}): Promise<MutationRecord | undefined> {
    const abs = path.resolve(file)
    if (await this.backups.exists(abs)) {
      this.ctx.logger.verbose(`${abs} already exists (preserved)`)
      return undefined
    }
    return await this.writeFile(abs, content, opts)
  }

  /**
   * Replaces `target` with a copy of `source` (file or directory tree).
   */
  async copyInto(source: string, target: string): Promise<MutationRecord> {
    const from = path.resolve(source)
    const copy: MutationWriter = async (p, exec) => {
      await exec.remove(p)
      await exec.copy(from, p)
    }
    if (await isDirectory(from)) {
      return await this.mutateDirectory(target, copy, `copy directory from ${from}`)
    }
    return await this.mutateFile(target, copy, `copy file from ${from}`)
  }

  /**
   * Tells a dry-run which directories a builder would have created inside its
   * target, so later calls see them as existing. No effect on a real run.
   */
  declareBuilt(dirs: readonly string[]) {
    for (const dir of dirs) this.backups.recordSimulated(dir, true)
  }

  async symlink(linkPath: string, target: string): Promise<MutationRecord> {
    return await this.mutateFile(linkPath, (p, exec) => exec.symlink(target, p), `symlink to ${target}`)
  }

  private async mutate(family: Family, target: string, writer: MutationWriter, action: string): Promise<MutationRecord> {
    const abs = path.resolve(target)
    const { logger } = this.ctx

    const parent = path.dirname(abs)
    if (parent !== abs) await this.ensureDirectory(parent)

    logger.verbose(`Intent: ${action}: ${abs}`)

    let record: MutationRecord
    try {
      const backup = await this.backups.snapshot(abs)
      record = backup.preserved
        ? { kind: backup.isDirectory ? 'DirModified' : 'FileModified', targetPath: abs, backupPath: backup.backupPath }
        : { kind: family === 'dir' ? 'DirCreated' : 'FileCreated', targetPath: abs }
    } catch (e) {
      logger.error(`Backup failed, not touching ${abs}: ${errorMessage(e)}`)
      if (isInstallerError(e)) throw e
      throw new InstallerError('BackupFailed', `Failed to back up ${abs}: ${errorMessage(e)}`, { targetPath: abs, action, cause: e })
    }

    this.journal.append(record)

    if (this.ctx.dryRun) {
      logger.info(`[DRY-RUN] Would ${action}: ${abs}`)
      this.backups.recordSimulated(abs, family === 'dir')
      return record
    }

    const exec = this.privilege.executorFor(abs)
    logger.verbose(`  Executing${exec.elevated ? ' (sudo)' : ''}: ${action}: ${abs}`)
    try {
      await writer(abs, exec)
    } catch (e) {
      logger.error(`Failed to ${action}: ${abs}: ${errorMessage(e)}`)
      throw new InstallerError('MutationFailed', `Failed to ${action}: ${abs}: ${errorMessage(e)}`, { targetPath: abs, action, cause: e })
    }
    logger.verbose(`  Completed: ${action}: ${abs} (${record.kind})`)
    return record
  }
}
