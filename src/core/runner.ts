import { tryAppendAudit } from './audit.js'
import { errorMessage } from './errors.js'
import type { ApprovalGate } from './gate.js'
import { GuardedMutator } from './mutator.js'
import type { InstallerConfig } from '../cli/config.js'
import type { Logger, Result, RunContext, Step } from '../types.js'

export interface PhaseContext {
  run: RunContext
  config: InstallerConfig
  mutator: GuardedMutator
  logger: Logger
  env: NodeJS.ProcessEnv
  /**
   * Effective user id of the installer process, when the platform has one.
   */
  uid: number | undefined
  /**
   * Non-fatal problem; ends up in Result.warnings.
   */
  warn(msg: string): void
}

/**
 * One step of a forward installation. Phases touch the filesystem only
 * through `pc.mutator`.
 */
export interface InstallPhase {
  name: string
  title: string
  description: string
  /**
   * Ask the approval gate before running. Default true.
   */
  gated?: boolean
  run(pc: PhaseContext): Promise<void>
}

export interface RunInstallInput {
  ctx: RunContext
  config: InstallerConfig
  phases: InstallPhase[]
  gate: ApprovalGate
  mutator?: GuardedMutator
  env?: NodeJS.ProcessEnv
  uid?: number
}

export type InstallStatus = 'completed' | 'declined' | 'failed'

export interface InstallOutcome {
  status: InstallStatus
  result: Result
}

function nowIso() {
  return new Date().toISOString()
}

/**
 * Runs phases in order, each behind its approval gate. A decline or a failure
 * stops the run; mutations of earlier phases stay journaled and are only
 * undone by an explicit reversal.
 */
export async function runInstall(input: RunInstallInput): Promise<InstallOutcome> {
  const { ctx, config, phases, gate } = input
  const logger = ctx.logger
  const startedAt = nowIso()
  const startedMs = Date.now()

  const result: Result = {
    ok: true,
    operation: 'install',
    dryRun: ctx.dryRun,
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    steps: [],
    warnings: [],
    errors: [],
  }

  const pc: PhaseContext = {
    run: ctx,
    config,
    mutator: input.mutator ?? new GuardedMutator(ctx),
    logger,
    env: input.env ?? process.env,
    uid: input.uid ?? process.getuid?.(),
    warn(msg) {
      result.warnings.push(msg)
      logger.warn(msg)
    },
  }

  if (ctx.dryRun) logger.warn('[DRY-RUN MODE] No changes will be made.')
  logger.verbose(`Backup directory: ${pc.mutator.backups.runDir}`)
  logger.verbose(`Journal: ${ctx.journalPath}`)

  let status: InstallStatus = 'completed'
  for (const [i, phase] of phases.entries()) {
    const label = `Phase ${i + 1}/${phases.length}: ${phase.title}`
    const step: Step = { kind: phase.name, message: phase.title, status: 'planned' }
    result.steps.push(step)
    logger.info(label)

    if (phase.gated !== false && await gate.confirm(phase.title, phase.description) === 'declined') {
      logger.warn(`Declined: ${phase.title}; aborting installer`)
      step.status = 'skipped'
      status = 'declined'
      break
    }

    try {
      await phase.run(pc)
      step.status = 'executed'
      logger.success(`${label} complete`)
    } catch (e) {
      step.status = 'failed'
      step.error = errorMessage(e)
      result.ok = false
      result.errors.push(`${phase.name}: ${step.error}`)
      logger.error(`${label} failed: ${step.error}`)
      status = 'failed'
      break
    }
  }

  result.finishedAt = nowIso()
  result.durationMs = Date.now() - startedMs
  await tryAppendAudit(ctx, result)

  if (status === 'completed') {
    logger.success(result.warnings.length ? 'Installation completed with warnings (see above)' : 'Installation complete!')
    logger.info(`  Application:    ${config.installDir}`)
    logger.info(`  Data:           ${config.userDataDir}`)
    logger.info(`  Backups:        ${pc.mutator.backups.runDir}`)
    logger.info(`  Journal:        ${ctx.journalPath}`)
    logger.info('To undo this installation run with --reverse')
  }
  logger.info(`[installer] install ${status} (${result.durationMs}ms)`)
  return { status, result }
}
