import fs from 'fs-extra'
import path from 'path'

import { tryAppendAudit } from './audit.js'
import { errorMessage, InstallerError } from './errors.js'
import { formatPlan } from './format-plan.js'
import { lexists, isSymlink } from './fs.js'
import type { ApprovalGate } from './gate.js'
import { REVERSE_CONFIRMATION_PHRASE } from './gate.js'
import { isModified, Journal } from './journal.js'
import { fanOut } from './logger.js'
import { PrivilegeStrategy } from './privilege.js'
import type { Logger, MutationRecord, Result, RunContext, Step } from '../types.js'

export type ReversalState = 'Idle' | 'Loaded' | 'Previewed' | 'Confirmed' | 'Executing' | 'Done' | 'Aborted'

/**
 * A command-line symlink the installer registers. Removed after the record
 * loop when it still points at `target`; it is never journaled.
 */
export interface LauncherLink {
  link: string
  target: string
}

export interface ReversalDeps {
  gate: ApprovalGate
  journal?: Journal
  privilege?: PrivilegeStrategy
  launcherLinks?: LauncherLink[]
  /**
   * Joins the context logger from `execute()` on, so a declined or empty
   * reversal leaves no trace in it. Ignored in dry-run.
   */
  executionLog?: Logger
}

export interface ReversalReport {
  processed: number
  failed: number
  steps: Step[]
  /**
   * Root of the backup store; nothing under it is deleted.
   */
  backupStore: string
  /**
   * Run directories the journal's backups live in, in first-seen order.
   */
  backupRunDirs: string[]
  errors: string[]
}

export type ReversalOutcome =
  | { status: 'done'; report: ReversalReport }
  | { status: 'aborted' }

function nowIso() {
  return new Date().toISOString()
}

function runDirOf(stateDir: string, backupPath: string): string | undefined {
  const rel = path.relative(stateDir, backupPath)
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return undefined
  return path.join(stateDir, rel.split(path.sep)[0])
}

async function pointsAt(link: string, target: string): Promise<boolean> {
  if (!await isSymlink(link)) return false
  const dest = await fs.readlink(link)
  return path.resolve(path.dirname(link), dest) === path.resolve(target)
}

/**
 * Replays the journal backward.
 *
 * Idle -> Loaded -> Previewed -> Confirmed -> Executing -> Done, with Aborted
 * reachable from Previewed (first gate declined) or Confirmed (wrong phrase).
 * Every record is undone independently, newest first, with no compaction: a
 * path modified N times is restored N times and ends at its oldest backup.
 */
export class ReversalEngine {
  private _state: ReversalState = 'Idle'
  private records: MutationRecord[] = []
  private readonly journal: Journal
  private readonly privilege: PrivilegeStrategy
  private readonly gate: ApprovalGate
  private readonly launcherLinks: LauncherLink[]
  private readonly executionLog: Logger | undefined
  private logger: Logger

  constructor(private readonly ctx: RunContext, deps: ReversalDeps) {
    this.logger = ctx.logger
    this.executionLog = deps.executionLog
    this.gate = deps.gate
    this.journal = deps.journal ?? new Journal(ctx)
    this.privilege = deps.privilege ?? PrivilegeStrategy.fromContext(ctx)
    this.launcherLinks = deps.launcherLinks ?? []
  }

  get state(): ReversalState {
    return this._state
  }

  private expectState(...allowed: ReversalState[]) {
    if (!allowed.includes(this._state)) {
      throw new Error(`Reversal is ${this._state}; expected ${allowed.join(' or ')}`)
    }
  }

  /**
   * Throws NoJournal when no forward run ever wrote a journal.
   */
  load(): readonly MutationRecord[] {
    this.expectState('Idle')
    this.records = this.journal.readAll()
    this._state = 'Loaded'
    this.ctx.logger.info(`Journal: ${this.journal.filePath} (${this.records.length} record(s))`)
    return this.records
  }

  preview(): string {
    this.expectState('Loaded')
    const plan = formatPlan(this.records)
    const { logger } = this.ctx
    logger.info('The following operations will be reversed:')
    for (const line of plan.split('\n')) logger.info(`  ${line}`)
    logger.warn(`This will undo ${this.records.length} recorded operation(s).`)
    this._state = 'Previewed'
    return plan
  }

  async confirm(): Promise<ReversalState> {
    this.expectState('Previewed')
    const first = await this.gate.confirm('Reversal', `Undo ${this.records.length} recorded operation(s) from ${this.journal.filePath}.`)
    if (first === 'declined') {
      this.ctx.logger.info('Reversal cancelled.')
      this._state = 'Aborted'
      return this._state
    }
    this._state = 'Confirmed'

    const second = await this.gate.confirmPhrase(
      'FINAL CONFIRMATION: all changes listed above will be reversed.',
      REVERSE_CONFIRMATION_PHRASE,
    )
    if (second === 'declined') {
      this.ctx.logger.info('Reversal cancelled (confirmation text did not match).')
      this._state = 'Aborted'
    }
    return this._state
  }

  async execute(): Promise<ReversalReport> {
    this.expectState('Confirmed')
    this._state = 'Executing'
    if (this.executionLog && !this.ctx.dryRun) this.logger = fanOut(this.ctx.logger, this.executionLog)
    const { logger } = this
    logger.info('Reversing changes...')

    const steps: Step[] = []
    const errors: string[] = []
    for (let i = this.records.length - 1; i >= 0; i--) {
      const step = await this.undo(this.records[i])
      steps.push(step)
      if (step.status === 'failed' && step.error) errors.push(step.error)
    }

    for (const l of this.launcherLinks) {
      try {
        await this.removeLauncherLink(l)
      } catch (e) {
        const msg = `Failed to remove symlink ${l.link}: ${errorMessage(e)}`
        logger.error(msg)
        errors.push(msg)
      }
    }

    const backupRunDirs: string[] = []
    for (const r of this.records) {
      const dir = isModified(r) ? runDirOf(this.ctx.stateDir, r.backupPath) : undefined
      if (dir && !backupRunDirs.includes(dir)) backupRunDirs.push(dir)
    }

    const report: ReversalReport = {
      processed: steps.length,
      failed: steps.filter(s => s.status === 'failed').length,
      steps,
      backupStore: this.ctx.stateDir,
      backupRunDirs,
      errors,
    }

    this._state = 'Done'
    if (report.failed || errors.length) {
      logger.warn(`Reversal finished with ${report.failed} failed record(s) out of ${report.processed}.`)
    } else {
      logger.success(`Reversal complete: ${report.processed} record(s) processed.`)
    }
    logger.info(`Backups are preserved in: ${report.backupStore}`)
    for (const d of backupRunDirs) logger.verbose(`  ${d}`)
    logger.info('You may delete them manually when satisfied.')
    return report
  }

  async run(): Promise<ReversalOutcome> {
    const startedAt = nowIso()
    const startedMs = Date.now()
    const records = this.load()

    if (!records.length) {
      this.ctx.logger.warn('Journal is empty; nothing to reverse.')
      this._state = 'Done'
      return {
        status: 'done',
        report: { processed: 0, failed: 0, steps: [], backupStore: this.ctx.stateDir, backupRunDirs: [], errors: [] },
      }
    }

    this.preview()
    if (await this.confirm() === 'Aborted') return { status: 'aborted' }

    const report = await this.execute()
    const result: Result = {
      ok: report.errors.length === 0,
      operation: 'reverse',
      dryRun: this.ctx.dryRun,
      startedAt,
      finishedAt: nowIso(),
      durationMs: Date.now() - startedMs,
      steps: report.steps,
      warnings: [],
      errors: report.errors,
    }
    await tryAppendAudit(this.ctx, result)
    return { status: 'done', report }
  }

  private async undo(r: MutationRecord): Promise<Step> {
    const { logger } = this
    const { dryRun } = this.ctx
    const target = r.targetPath
    const exec = this.privilege.executorFor(target)
    const sudo = exec.elevated ? ' (sudo)' : ''
    const step: Step = { kind: r.kind, message: '', status: 'planned', paths: { target } }

    try {
      if (!isModified(r)) {
        step.message = r.kind === 'DirCreated' ? 'Remove created directory' : 'Remove created file'
        if (!await lexists(target)) {
          logger.verbose(`Already absent: ${target}`)
          step.status = 'skipped'
          return step
        }
        if (dryRun) {
          logger.info(`[DRY-RUN] Would remove${sudo}: ${target}`)
          step.status = 'skipped'
          return step
        }
        await exec.remove(target)
        logger.success(`Removed${r.kind === 'DirCreated' ? ' directory' : ''}${sudo}: ${target}`)
        step.status = 'executed'
        return step
      }

      step.message = r.kind === 'DirModified' ? 'Restore directory from backup' : 'Restore file from backup'
      step.paths = { target, backup: r.backupPath }
      if (!await lexists(r.backupPath)) {
        throw new InstallerError('BackupNotFound', `Backup not found: ${r.backupPath} (cannot restore ${target})`, {
          targetPath: target,
          action: 'restore',
        })
      }
      if (dryRun) {
        logger.info(`[DRY-RUN] Would restore${sudo}: ${target} <- ${r.backupPath}`)
        step.status = 'skipped'
        return step
      }
      await exec.remove(target)
      await exec.copy(r.backupPath, target)
      logger.success(`Restored${r.kind === 'DirModified' ? ' directory' : ''}${sudo}: ${target}`)
      step.status = 'executed'
      return step
    } catch (e) {
      const err = e instanceof InstallerError
        ? e
        : new InstallerError('MutationFailed', `Failed to ${step.message.toLowerCase()}: ${target}: ${errorMessage(e)}`, {
          targetPath: target,
          action: step.message,
          cause: e,
        })
      logger.error(err.message)
      step.status = 'failed'
      step.error = `${err.code}: ${err.message}`
      return step
    }
  }

  private async removeLauncherLink(l: LauncherLink) {
    const { logger } = this
    if (!await pointsAt(l.link, l.target)) return
    if (this.ctx.dryRun) {
      logger.info(`[DRY-RUN] Would remove symlink: ${l.link}`)
      return
    }
    await this.privilege.executorFor(l.link).remove(l.link)
    logger.success(`Removed symlink: ${l.link}`)
  }
}
